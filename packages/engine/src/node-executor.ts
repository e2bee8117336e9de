import type { LogLevel } from "@tribunal/config";
import { MalformedDelta, NodeTimeout, errorMessage, formatErrorEntry } from "./errors.js";
import { emitStructuredLog, engineTelemetry, engineTracer, markSpanError, markSpanOk } from "./observability.js";
import type { AuditState, StateDelta } from "./state.js";
import { isStateDelta } from "./state.js";

export interface NodeContext {
  nodeId: string;
  /** Aborted when the node times out or the run is cancelled. */
  signal: AbortSignal;
  log: (message: string, level?: LogLevel, extra?: Record<string, unknown>) => void;
}

/** One unit of work: a read-only snapshot in, a delta out. */
export interface NodeDefinition {
  id: string;
  description?: string;
  /** Overrides the stage's per-node timeout. */
  timeoutMs?: number;
  run: (snapshot: AuditState, context: NodeContext) => StateDelta | Promise<StateDelta>;
}

export type NodeStatus = "ok" | "failed" | "timed_out";

export interface NodeOutcome {
  nodeId: string;
  status: NodeStatus;
  delta: StateDelta;
  durationMs: number;
}

export interface ExecuteNodeOptions {
  timeoutMs: number;
  /** Run-level cancellation. */
  signal?: AbortSignal;
}

function failureDelta(nodeId: string, err: unknown): StateDelta {
  return { errors: [formatErrorEntry(nodeId, err)] };
}

/**
 * Run one node against a snapshot. Never rejects: an exception, a timeout
 * or a malformed return value becomes a delta holding a single error entry.
 */
export async function executeNode(
  node: NodeDefinition,
  snapshot: AuditState,
  options: ExecuteNodeOptions,
): Promise<NodeOutcome> {
  const timeoutMs = node.timeoutMs ?? options.timeoutMs;
  const start = process.hrtime.bigint();

  return engineTracer.startActiveSpan(`audit.node.${node.id}`, { attributes: { "audit.node_id": node.id } }, async (span) => {
    const controller = new AbortController();
    const onRunAbort = () => controller.abort(options.signal?.reason);
    options.signal?.addEventListener("abort", onRunAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const err = new NodeTimeout(`did not finish within ${timeoutMs}ms`);
        controller.abort(err);
        reject(err);
      }, timeoutMs);
    });

    const context: NodeContext = {
      nodeId: node.id,
      signal: controller.signal,
      log: (message, level = "info", extra = {}) => emitStructuredLog("engine", level, message, { node: node.id, ...extra }),
    };

    let outcome: NodeOutcome;
    try {
      const result: unknown = await Promise.race([Promise.resolve().then(() => node.run(snapshot, context)), timeout]);
      if (!isStateDelta(result)) {
        throw new MalformedDelta("returned a value that is not a state delta");
      }
      outcome = { nodeId: node.id, status: "ok", delta: result, durationMs: 0 };
      markSpanOk();
    } catch (err) {
      const status: NodeStatus = err instanceof NodeTimeout ? "timed_out" : "failed";
      outcome = { nodeId: node.id, status, delta: failureDelta(node.id, err), durationMs: 0 };
      engineTelemetry.nodeFailuresTotal.add(1, { node_id: node.id, status });
      markSpanError(err);
      emitStructuredLog("engine", "warn", "node failed", { node: node.id, status, error: errorMessage(err) });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onRunAbort);
      span.end();
    }

    outcome.durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    engineTelemetry.nodeDurationMs.record(outcome.durationMs, { node_id: node.id, status: outcome.status });
    return outcome;
  });
}
