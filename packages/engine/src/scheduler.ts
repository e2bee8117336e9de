/**
 * Fan-out/fan-in scheduler.
 *
 * Every node of a stage runs against the same snapshot, at most
 * `workerPoolSize` at a time. The barrier waits for every outcome (a
 * failed or timed-out node still yields an error delta) and only then
 * folds the deltas into the next snapshot. Deltas are folded in the
 * stage's declaration order, so the arrival order of appended entries is
 * reproducible as well.
 */

import { Semaphore } from "./concurrency.js";
import type { NodeDefinition, NodeOutcome } from "./node-executor.js";
import { executeNode } from "./node-executor.js";
import { emitStructuredLog, engineTelemetry, engineTracer, markSpanError, markSpanOk } from "./observability.js";
import type { AuditState } from "./state.js";
import { mergeState } from "./state.js";

export interface StageDefinition {
  id: string;
  nodes: NodeDefinition[];
}

export interface StageResult {
  stageId: string;
  state: AuditState;
  outcomes: NodeOutcome[];
}

export interface SchedulerOptions {
  workerPoolSize: number;
  nodeTimeoutMs: number;
}

export class FanOutScheduler {
  private readonly pool: Semaphore;

  constructor(private readonly options: SchedulerOptions) {
    this.pool = new Semaphore(options.workerPoolSize);
  }

  async runStage(stage: StageDefinition, snapshot: AuditState, signal?: AbortSignal): Promise<StageResult> {
    return engineTracer.startActiveSpan(`audit.stage.${stage.id}`, { attributes: { "audit.stage_id": stage.id } }, async (span) => {
      try {
        engineTelemetry.stageRunsTotal.add(1, { stage_id: stage.id });
        emitStructuredLog("engine", "debug", "stage dispatched", { stage: stage.id, nodes: stage.nodes.map((n) => n.id) });

        const outcomes = await Promise.all(
          stage.nodes.map((node) =>
            this.pool.run(() => executeNode(node, snapshot, { timeoutMs: this.options.nodeTimeoutMs, signal })),
          ),
        );

        const state = outcomes.reduce((acc, outcome) => mergeState(acc, outcome.delta), snapshot);
        const failed = outcomes.filter((o) => o.status !== "ok").map((o) => o.nodeId);
        span.setAttribute("audit.failed_nodes", failed.length);
        emitStructuredLog("engine", "info", "stage barrier resolved", { stage: stage.id, failed });
        markSpanOk();
        return { stageId: stage.id, state, outcomes };
      } catch (err) {
        markSpanError(err);
        throw err;
      } finally {
        span.end();
      }
    });
  }
}
