import { describe, it } from "node:test";
import assert from "node:assert/strict";

import { trace } from "@opentelemetry/api";
import { BasicTracerProvider, InMemorySpanExporter, SimpleSpanProcessor } from "@opentelemetry/sdk-trace-base";

import { Semaphore } from "./concurrency.js";
import type { NodeDefinition } from "./node-executor.js";
import { executeNode } from "./node-executor.js";
import { setLogLevel } from "./observability.js";
import { FanOutScheduler } from "./scheduler.js";
import type { Evidence } from "./state.js";
import { initializeState } from "./state.js";

setLogLevel("error");

const spans = new InMemorySpanExporter();
const tracerProvider = new BasicTracerProvider();
tracerProvider.addSpanProcessor(new SimpleSpanProcessor(spans));
trace.setGlobalTracerProvider(tracerProvider);

const snapshot = initializeState({ runId: "run-s", target: { repoRef: "." }, criteria: [] });

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

function finding(goal: string): Evidence {
  return { goal, found: true, location: ".", confidence: 1, rationale: goal };
}

describe("executeNode", () => {
  it("returns the node's delta", async () => {
    const node: NodeDefinition = { id: "ok", run: () => ({ evidence: { repo: [finding("a")] } }) };
    const outcome = await executeNode(node, snapshot, { timeoutMs: 1_000 });
    assert.equal(outcome.status, "ok");
    assert.equal(outcome.delta.evidence?.["repo"]?.length, 1);
  });

  it("turns a thrown error into one error entry", async () => {
    const node: NodeDefinition = {
      id: "boom",
      run: () => {
        throw new Error("disk on fire");
      },
    };
    const outcome = await executeNode(node, snapshot, { timeoutMs: 1_000 });
    assert.equal(outcome.status, "failed");
    assert.deepEqual(outcome.delta, { errors: ["boom: disk on fire"] });
  });

  it("marks a slow node timed out and aborts its signal", async () => {
    let aborted = false;
    const node: NodeDefinition = {
      id: "slow",
      run: async (_state, ctx) => {
        ctx.signal.addEventListener("abort", () => {
          aborted = true;
        });
        await delay(200);
        return {};
      },
    };
    const outcome = await executeNode(node, snapshot, { timeoutMs: 20 });
    assert.equal(outcome.status, "timed_out");
    assert.deepEqual(outcome.delta, { errors: ["slow: NodeTimeout: did not finish within 20ms"] });
    assert.equal(aborted, true);
  });

  it("rejects a malformed return value", async () => {
    const node: NodeDefinition = {
      id: "odd",
      run: async () => JSON.parse('{"verdict": 3}'),
    };
    const outcome = await executeNode(node, snapshot, { timeoutMs: 1_000 });
    assert.equal(outcome.status, "failed");
    assert.deepEqual(outcome.delta, { errors: ["odd: MalformedDelta: returned a value that is not a state delta"] });
  });
});

describe("FanOutScheduler", () => {
  it("waits for every node, including failures, before merging", async () => {
    const scheduler = new FanOutScheduler({ workerPoolSize: 4, nodeTimeoutMs: 1_000 });
    const stage = {
      id: "collect",
      nodes: [
        { id: "a", run: async () => { await delay(30); return { evidence: { a: [finding("a")] } }; } },
        { id: "b", run: async () => { throw new Error("unreachable source"); } },
        { id: "c", run: () => ({ evidence: { c: [finding("c")] } }) },
      ],
    } satisfies { id: string; nodes: NodeDefinition[] };

    const result = await scheduler.runStage(stage, snapshot);
    assert.deepEqual(Object.keys(result.state.evidence).sort(), ["a", "c"]);
    assert.deepEqual(result.state.errors, ["b: unreachable source"]);
    assert.deepEqual(result.outcomes.map((o) => o.status), ["ok", "failed", "ok"]);
  });

  it("never runs more nodes at once than the pool allows", async () => {
    let running = 0;
    let peak = 0;
    const nodes: NodeDefinition[] = Array.from({ length: 6 }, (_, i) => ({
      id: `n${i}`,
      run: async () => {
        running += 1;
        peak = Math.max(peak, running);
        await delay(10);
        running -= 1;
        return { evidence: { [`n${i}`]: [finding(`n${i}`)] } };
      },
    }));
    const scheduler = new FanOutScheduler({ workerPoolSize: 2, nodeTimeoutMs: 1_000 });
    const result = await scheduler.runStage({ id: "wide", nodes }, snapshot);
    assert.equal(peak, 2);
    assert.equal(Object.keys(result.state.evidence).length, 6);
  });

  it("folds deltas in declaration order whatever the completion order", async () => {
    const scheduler = new FanOutScheduler({ workerPoolSize: 3, nodeTimeoutMs: 1_000 });
    const result = await scheduler.runStage(
      {
        id: "errors",
        nodes: [
          { id: "late", run: async () => { await delay(25); return { errors: ["late"] }; } },
          { id: "early", run: () => ({ errors: ["early"] }) },
        ],
      },
      snapshot,
    );
    assert.deepEqual(result.state.errors, ["late", "early"]);
  });
});

describe("FanOutScheduler tracing", () => {
  it("opens one span for the stage and one per node", async () => {
    spans.reset();
    const scheduler = new FanOutScheduler({ workerPoolSize: 2, nodeTimeoutMs: 1_000 });
    await scheduler.runStage(
      {
        id: "collect",
        nodes: [
          { id: "a", run: () => ({}) },
          { id: "b", run: () => ({}) },
        ],
      },
      snapshot,
    );
    assert.deepEqual(
      spans
        .getFinishedSpans()
        .map((span) => span.name)
        .sort(),
      ["audit.node.a", "audit.node.b", "audit.stage.collect"],
    );
  });
});

describe("Semaphore", () => {
  it("hands permits to waiters in order", async () => {
    const semaphore = new Semaphore(1);
    const order: string[] = [];
    const first = await semaphore.acquire();
    const second = semaphore.acquire().then((release) => {
      order.push("second");
      release();
    });
    assert.equal(semaphore.pending, 1);
    order.push("first");
    first();
    first();
    await second;
    assert.deepEqual(order, ["first", "second"]);
    assert.equal(semaphore.used, 0);
  });
});
