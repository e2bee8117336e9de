/**
 * Staged execution graph.
 *
 * Stages are fan-out groups; after each barrier a router picks the next
 * stage from the merged state. Stages run strictly one after another and
 * the graph must be acyclic. All structural checks happen in `compile`,
 * so a graph that compiles cannot hit an undefined stage at run time.
 */

import { ConfigurationError, RunCancelled, RunTimeout, formatErrorEntry } from "./errors.js";
import type { NodeDefinition } from "./node-executor.js";
import { emitStructuredLog, engineTracer, markSpanError, markSpanOk } from "./observability.js";
import type { RouteRule } from "./router.js";
import { ConditionalRouter, edge } from "./router.js";
import type { SchedulerOptions, StageDefinition } from "./scheduler.js";
import { FanOutScheduler } from "./scheduler.js";
import type { AuditState } from "./state.js";
import { mergeState } from "./state.js";

export type RunStatus = "completed" | "terminated" | "timed_out" | "cancelled";

export interface TerminalDefinition {
  id: string;
  status: Exclude<RunStatus, "timed_out" | "cancelled">;
}

export interface GraphRunOptions {
  /** Global deadline; remaining stages are abandoned once it passes. */
  runTimeoutMs: number;
  signal?: AbortSignal;
}

export interface GraphRunResult {
  status: RunStatus;
  state: AuditState;
  visitedStages: string[];
  /** Terminal stage reached, absent when the run timed out or was cancelled. */
  terminal?: string;
}

export type CompileOptions = SchedulerOptions;

export class StageGraphBuilder {
  private entry?: string;
  private readonly stages = new Map<string, StageDefinition>();
  private readonly routers = new Map<string, ConditionalRouter>();
  private readonly terminals = new Map<string, TerminalDefinition>();

  setEntry(stageId: string): this {
    this.entry = stageId;
    return this;
  }

  addStage(id: string, nodes: NodeDefinition[]): this {
    if (this.stages.has(id) || this.terminals.has(id)) {
      throw new ConfigurationError(`stage "${id}" is defined twice`);
    }
    this.stages.set(id, { id, nodes: [...nodes] });
    return this;
  }

  addTerminal(id: string, status: TerminalDefinition["status"]): this {
    if (this.stages.has(id) || this.terminals.has(id)) {
      throw new ConfigurationError(`stage "${id}" is defined twice`);
    }
    this.terminals.set(id, { id, status });
    return this;
  }

  addEdge(from: string, to: string): this {
    return this.addRouter(edge(from, to));
  }

  addConditionalRoute(from: string, rules: RouteRule[], otherwise: string): this {
    return this.addRouter(new ConditionalRouter({ from, rules, otherwise }));
  }

  private addRouter(router: ConditionalRouter): this {
    if (this.routers.has(router.from)) {
      throw new ConfigurationError(`stage "${router.from}" already has an outgoing route`);
    }
    this.routers.set(router.from, router);
    return this;
  }

  compile(options: CompileOptions): CompiledStageGraph {
    const entry = this.entry;
    if (!entry || !this.stages.has(entry)) {
      throw new ConfigurationError(`entry stage "${entry ?? ""}" is not defined`);
    }
    if (this.terminals.size === 0) {
      throw new ConfigurationError("graph has no terminal stage");
    }

    for (const stage of this.stages.values()) {
      if (stage.nodes.length === 0) {
        throw new ConfigurationError(`stage "${stage.id}" has no nodes`);
      }
      const nodeIds = new Set<string>();
      for (const node of stage.nodes) {
        if (nodeIds.has(node.id)) {
          throw new ConfigurationError(`stage "${stage.id}" references node "${node.id}" twice`);
        }
        nodeIds.add(node.id);
      }
      if (!this.routers.has(stage.id)) {
        throw new ConfigurationError(`stage "${stage.id}" has no outgoing route`);
      }
    }

    for (const router of this.routers.values()) {
      if (!this.stages.has(router.from)) {
        throw new ConfigurationError(`route starts at undefined stage "${router.from}"`);
      }
      for (const target of router.targets()) {
        if (!this.stages.has(target) && !this.terminals.has(target)) {
          throw new ConfigurationError(`route from "${router.from}" targets undefined stage "${target}"`);
        }
      }
    }

    this.assertAcyclicAndReachable(entry);

    return new CompiledStageGraph(
      entry,
      new Map(this.stages),
      new Map(this.routers),
      new Map(this.terminals),
      new FanOutScheduler(options),
    );
  }

  private assertAcyclicAndReachable(entry: string): void {
    const visiting = new Set<string>();
    const done = new Set<string>();

    const visit = (id: string, path: string[]): void => {
      if (this.terminals.has(id) || done.has(id)) return;
      if (visiting.has(id)) {
        throw new ConfigurationError(`stage graph has a cycle: ${[...path, id].join(" -> ")}`);
      }
      visiting.add(id);
      for (const target of this.routers.get(id)?.targets() ?? []) {
        visit(target, [...path, id]);
      }
      visiting.delete(id);
      done.add(id);
    };
    visit(entry, []);

    const unreachable = [...this.stages.keys()].filter((id) => !done.has(id));
    if (unreachable.length > 0) {
      throw new ConfigurationError(`stages unreachable from "${entry}": ${unreachable.join(", ")}`);
    }
  }
}

export class CompiledStageGraph {
  constructor(
    readonly entry: string,
    private readonly stages: ReadonlyMap<string, StageDefinition>,
    private readonly routers: ReadonlyMap<string, ConditionalRouter>,
    private readonly terminals: ReadonlyMap<string, TerminalDefinition>,
    private readonly scheduler: FanOutScheduler,
  ) {}

  async run(initial: AuditState, options: GraphRunOptions): Promise<GraphRunResult> {
    return engineTracer.startActiveSpan("audit.run", { attributes: { "audit.run_id": initial.runId } }, async (span) => {
      const controller = new AbortController();
      const onCallerAbort = () => controller.abort(options.signal?.reason);
      if (options.signal?.aborted) {
        onCallerAbort();
      } else {
        options.signal?.addEventListener("abort", onCallerAbort, { once: true });
      }

      let timer: NodeJS.Timeout | undefined;
      const deadline = new Promise<"timeout">((resolve) => {
        timer = setTimeout(() => resolve("timeout"), options.runTimeoutMs);
      });
      const cancelled = new Promise<"cancelled">((resolve) => {
        if (controller.signal.aborted) resolve("cancelled");
        controller.signal.addEventListener("abort", () => resolve("cancelled"), { once: true });
      });

      let state = initial;
      const visitedStages: string[] = [];
      let current = this.entry;

      const abandon = (outcome: "timeout" | "cancelled", stageId: string): GraphRunResult => {
        const err =
          outcome === "timeout"
            ? new RunTimeout(`run exceeded ${options.runTimeoutMs}ms; abandoned stage "${stageId}"`)
            : new RunCancelled(`run was cancelled; abandoned stage "${stageId}"`);
        if (!controller.signal.aborted) controller.abort(err);
        state = mergeState(state, { errors: [formatErrorEntry("run", err)] });
        emitStructuredLog("engine", "error", outcome === "timeout" ? "run timed out" : "run cancelled", {
          stage: stageId,
          visitedStages,
        });
        markSpanError(err);
        return { status: outcome === "timeout" ? "timed_out" : "cancelled", state, visitedStages };
      };

      try {
        for (;;) {
          const terminal = this.terminals.get(current);
          if (terminal) {
            emitStructuredLog("engine", "info", "run reached terminal stage", { terminal: terminal.id, status: terminal.status });
            markSpanOk();
            return { status: terminal.status, state, visitedStages, terminal: terminal.id };
          }

          const stage = this.stages.get(current);
          const router = this.routers.get(current);
          if (!stage || !router) {
            throw new ConfigurationError(`stage "${current}" is not defined`);
          }
          if (controller.signal.aborted) {
            return abandon("cancelled", stage.id);
          }

          const outcome = await Promise.race([this.scheduler.runStage(stage, state, controller.signal), deadline, cancelled]);
          if (outcome === "timeout" || outcome === "cancelled") {
            return abandon(outcome, stage.id);
          }

          state = outcome.state;
          visitedStages.push(stage.id);
          const decision = router.route(state);
          emitStructuredLog("engine", "debug", "route selected", { from: stage.id, next: decision.next, rule: decision.ruleId });
          current = decision.next;
        }
      } finally {
        clearTimeout(timer);
        options.signal?.removeEventListener("abort", onCallerAbort);
        span.end();
      }
    });
  }
}
