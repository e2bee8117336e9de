/**
 * The audit run: collectors fan out, evidence is cross-checked, every
 * reviewer role judges every criterion, and the chief justice synthesizes
 * the verdict set.
 *
 *   collect ──> aggregate ──┬──> judge ──> synthesize ──> end
 *                           └──> terminal_error   (no evidence, errors recorded)
 */

import type { AuditConfig, Rubric, RubricCriterion } from "@tribunal/config";
import { Semaphore } from "./concurrency.js";
import { AuditError, CollectionError, errorMessage } from "./errors.js";
import type { OpinionGenerator } from "./generator.js";
import type { CompiledStageGraph, RunStatus } from "./graph.js";
import { StageGraphBuilder } from "./graph.js";
import type { NodeDefinition } from "./node-executor.js";
import { RetryPolicy } from "./retry-policy.js";
import type { RoleVariant } from "./roles.js";
import { ROLE_VARIANTS } from "./roles.js";
import type { AuditState, AuditTarget, CriterionVerdict, Evidence, JudicialOpinion, StateDelta } from "./state.js";
import { allEvidence, initializeState } from "./state.js";
import { StructuredExtractionAdapter, opinionPayloadSchema } from "./structured-extraction.js";
import { synthesize } from "./synthesis.js";

/* ------------------------------------------------------------------ */
/*  Collaborators                                                      */
/* ------------------------------------------------------------------ */

/** Reads one source and returns its findings; throws CollectionError when the source is unusable. */
export type EvidenceCollector = (sourceRef: string, signal: AbortSignal) => Promise<Evidence[]>;

export interface AuditCollectors {
  repo: EvidenceCollector;
  doc?: EvidenceCollector;
}

export type EngineSettings = Pick<
  AuditConfig,
  "workerPoolSize" | "maxConcurrentCalls" | "nodeTimeoutMs" | "runTimeoutMs" | "maxAttempts" | "baseBackoffMs"
>;

export interface AuditEngineOptions {
  settings: EngineSettings;
  rubric: Rubric;
  collectors: AuditCollectors;
  generator: OpinionGenerator;
  /** Upper bound of one rate-limit backoff. */
  maxBackoffMs?: number;
}

export interface AuditRequest {
  runId: string;
  target: AuditTarget;
  signal?: AbortSignal;
}

export interface AuditRunResult {
  runId: string;
  status: RunStatus;
  state: AuditState;
  visitedStages: string[];
  verdicts: CriterionVerdict[];
  errors: string[];
}

export const STAGES = {
  collect: "collect",
  aggregate: "aggregate",
  judge: "judge",
  synthesize: "synthesize",
  end: "end",
  terminalError: "terminal_error",
} as const;

export const MANIFEST_GOAL = "repository_manifest";
export const CROSS_REFERENCE_GOAL = "cross_reference";

/* ------------------------------------------------------------------ */
/*  Nodes                                                              */
/* ------------------------------------------------------------------ */

export function collectorNode(
  id: string,
  evidenceKey: string,
  collector: EvidenceCollector,
  sourceRef: (target: AuditTarget) => string | undefined,
): NodeDefinition {
  return {
    id,
    description: `collects evidence under "${evidenceKey}"`,
    async run(snapshot, ctx) {
      const ref = sourceRef(snapshot.target);
      if (ref === undefined) {
        ctx.log("no source configured; skipped", "debug");
        return {};
      }
      let items: Evidence[];
      try {
        items = await collector(ref, ctx.signal);
      } catch (err) {
        if (err instanceof AuditError) throw err;
        throw new CollectionError(`${ref}: ${errorMessage(err)}`);
      }
      ctx.log("evidence collected", "info", { key: evidenceKey, count: items.length });
      return { evidence: { [evidenceKey]: items } };
    },
  };
}

function normalizePath(value: string): string {
  return value.trim().replace(/^\.\//, "");
}

/**
 * Checks file paths the document claims against the repository manifest.
 * Unverifiable claims become one high-severity finding tagged with every
 * criterion judged on the document.
 */
export function evidenceAggregatorNode(): NodeDefinition {
  return {
    id: "evidence_aggregator",
    run(snapshot) {
      const manifest = new Set(
        (snapshot.evidence["repo"] ?? [])
          .filter((item) => item.goal === MANIFEST_GOAL && item.found)
          .flatMap((item) => (item.content ?? "").split("\n").map(normalizePath))
          .filter((line) => line.length > 0),
      );
      const claims = (snapshot.evidence["doc"] ?? []).filter((item) => item.goal === CROSS_REFERENCE_GOAL && item.content);
      if (manifest.size === 0 || claims.length === 0) {
        return {};
      }

      const claimed = [...new Set(claims.flatMap((item) => (item.content ?? "").split(",").map(normalizePath)))]
        .filter((entry) => entry.length > 0)
        .sort();
      const verified = claimed.filter((entry) => manifest.has(entry));
      const hallucinated = claimed.filter((entry) => !manifest.has(entry));
      const docCriteria = snapshot.criteria.filter((criterion) => criterion.targetArtifact === "doc").map((c) => c.id);
      const location = snapshot.target.docRef ?? "doc";

      const findings: Evidence[] = [];
      if (hallucinated.length > 0) {
        findings.push({
          goal: "hallucinated_paths",
          found: true,
          location,
          confidence: 0.9,
          severity: "high",
          rationale: `Document cites ${hallucinated.length} path(s) absent from the repository.`,
          content: hallucinated.join(", "),
          criterionIds: docCriteria,
        });
      }
      if (verified.length > 0) {
        findings.push({
          goal: "verified_paths",
          found: true,
          location,
          confidence: 0.9,
          severity: "low",
          rationale: `Document cites ${verified.length} path(s) present in the repository.`,
          content: verified.join(", "),
          criterionIds: docCriteria,
        });
      }
      return { evidence: { cross_ref: findings } };
    },
  };
}

/** Evidence shown to a judge: the criterion's target source plus anything tagged for it. */
export function evidenceForCriterion(state: AuditState, criterion: RubricCriterion): Evidence[] {
  const fromTarget = state.evidence[criterion.targetArtifact] ?? [];
  const tagged = allEvidence(state).filter(
    (item) => (item.criterionIds ?? []).includes(criterion.id) && !fromTarget.includes(item),
  );
  return [...fromTarget, ...tagged];
}

export function judgeNode(
  variant: RoleVariant,
  rubric: Rubric,
  generator: OpinionGenerator,
  adapter: StructuredExtractionAdapter,
): NodeDefinition {
  const schema = opinionPayloadSchema(rubric.scoreScale);
  return {
    id: variant.nodeId,
    description: `${variant.role} opinions for every criterion`,
    async run(snapshot, ctx) {
      const results = await Promise.all(
        snapshot.criteria.map(async (criterion) => {
          const evidence = evidenceForCriterion(snapshot, criterion);
          const extracted = await adapter.extract({
            sourceId: `${variant.nodeId}/${criterion.id}`,
            schema,
            call: (signal) =>
              generator.generate({ role: variant.role, criterion, evidence, scale: rubric.scoreScale }, signal),
            signal: ctx.signal,
          });
          const opinion: JudicialOpinion = {
            criterionId: criterion.id,
            role: variant.role,
            score: extracted.value.score,
            rationale: extracted.value.rationale,
            citedEvidence: extracted.value.citations,
            degraded: extracted.degraded,
          };
          return { opinion, errors: extracted.errors };
        }),
      );
      const delta: StateDelta = {
        opinions: results.map((result) => result.opinion),
        errors: results.flatMap((result) => result.errors),
      };
      ctx.log("opinions rendered", "info", {
        role: variant.role,
        degraded: results.filter((result) => result.opinion.degraded).length,
      });
      return delta;
    },
  };
}

export function chiefJusticeNode(rubric: Rubric): NodeDefinition {
  return {
    id: "chief_justice",
    run(snapshot) {
      return { finalResult: synthesize(snapshot.criteria, allEvidence(snapshot), snapshot.opinions, rubric) };
    },
  };
}

/* ------------------------------------------------------------------ */
/*  Graph + engine                                                     */
/* ------------------------------------------------------------------ */

export function noEvidenceWithErrors(state: AuditState): boolean {
  return allEvidence(state).length === 0 && state.errors.length > 0;
}

export function buildAuditGraph(options: AuditEngineOptions): CompiledStageGraph {
  const { settings, rubric, collectors, generator } = options;
  const adapter = new StructuredExtractionAdapter({
    retry: new RetryPolicy({
      maxAttempts: settings.maxAttempts,
      baseDelayMs: settings.baseBackoffMs,
      maxDelayMs: options.maxBackoffMs ?? 30_000,
    }),
    limiter: new Semaphore(settings.maxConcurrentCalls),
  });

  const collect = [collectorNode("repo_investigator", "repo", collectors.repo, (target) => target.repoRef)];
  if (collectors.doc) {
    collect.push(collectorNode("doc_analyst", "doc", collectors.doc, (target) => target.docRef));
  }

  return new StageGraphBuilder()
    .setEntry(STAGES.collect)
    .addStage(STAGES.collect, collect)
    .addStage(STAGES.aggregate, [evidenceAggregatorNode()])
    .addStage(
      STAGES.judge,
      ROLE_VARIANTS.map((variant) => judgeNode(variant, rubric, generator, adapter)),
    )
    .addStage(STAGES.synthesize, [chiefJusticeNode(rubric)])
    .addTerminal(STAGES.end, "completed")
    .addTerminal(STAGES.terminalError, "terminated")
    .addEdge(STAGES.collect, STAGES.aggregate)
    .addConditionalRoute(
      STAGES.aggregate,
      [{ id: "no_evidence", when: noEvidenceWithErrors, next: STAGES.terminalError }],
      STAGES.judge,
    )
    .addEdge(STAGES.judge, STAGES.synthesize)
    .addEdge(STAGES.synthesize, STAGES.end)
    .compile({ workerPoolSize: settings.workerPoolSize, nodeTimeoutMs: settings.nodeTimeoutMs });
}

/** Compiled audit graph bound to one immutable configuration; reusable across runs. */
export class AuditEngine {
  private readonly graph: CompiledStageGraph;

  constructor(private readonly options: AuditEngineOptions) {
    this.graph = buildAuditGraph(options);
  }

  async run(request: AuditRequest): Promise<AuditRunResult> {
    const initial = initializeState({
      runId: request.runId,
      target: request.target,
      criteria: this.options.rubric.criteria,
    });
    const result = await this.graph.run(initial, {
      runTimeoutMs: this.options.settings.runTimeoutMs,
      signal: request.signal,
    });
    return {
      runId: request.runId,
      status: result.status,
      state: result.state,
      visitedStages: result.visitedStages,
      verdicts: [...(result.state.finalResult?.verdicts ?? [])],
      errors: [...result.state.errors],
    };
  }
}

export async function runAudit(options: AuditEngineOptions, request: AuditRequest): Promise<AuditRunResult> {
  return new AuditEngine(options).run(request);
}
