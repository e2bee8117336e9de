import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { JudicialRole } from "@tribunal/config";
import { validateRubric } from "@tribunal/config";
import type { AuditCollectors, EngineSettings } from "./audit-graph.js";
import { AuditEngine, MANIFEST_GOAL, CROSS_REFERENCE_GOAL, evidenceAggregatorNode, runAudit } from "./audit-graph.js";
import { CollectionError } from "./errors.js";
import type { OpinionGenerator, OpinionRequest } from "./generator.js";
import { setLogLevel } from "./observability.js";
import type { Evidence } from "./state.js";
import { initializeState, mergeState } from "./state.js";

setLogLevel("error");

const rubric = validateRubric({
  version: "test",
  roleWeights: { process: { Prosecutor: 1, Defense: 1, TechLead: 1 } },
  criteria: [{ id: "git_forensic_analysis", name: "Git Forensic Analysis", category: "process", targetArtifact: "repo" }],
});

const settings: EngineSettings = {
  workerPoolSize: 4,
  maxConcurrentCalls: 2,
  nodeTimeoutMs: 1_000,
  runTimeoutMs: 5_000,
  maxAttempts: 3,
  baseBackoffMs: 0,
};

const repoEvidence: Evidence[] = [
  { goal: "git_history", found: true, location: ".git", confidence: 0.9, rationale: "12 commits" },
  { goal: "required_file:README.md", found: true, location: "README.md", confidence: 1, rationale: "present" },
  { goal: "required_file:package.json", found: true, location: "package.json", confidence: 1, rationale: "present" },
];

class FixedScoreGenerator implements OpinionGenerator {
  readonly requests: OpinionRequest[] = [];

  constructor(private readonly scores: Partial<Record<JudicialRole, number | string>>) {}

  async generate(request: OpinionRequest): Promise<string> {
    this.requests.push(request);
    const score = this.scores[request.role];
    if (typeof score === "string") return score;
    return JSON.stringify({ score, rationale: `${request.role} reviewed ${request.criterion.id}`, citations: [".git"] });
  }
}

const collectors: AuditCollectors = {
  repo: async () => repoEvidence,
  doc: async () => {
    throw new CollectionError("doc unreachable");
  },
};

describe("runAudit", () => {
  it("scores the criterion from three roles and records the failed collector once", async () => {
    const generator = new FixedScoreGenerator({ Prosecutor: 5, Defense: 3, TechLead: 4 });
    const result = await runAudit(
      { settings, rubric, collectors, generator },
      { runId: "run-e2e", target: { repoRef: "/work/repo", docRef: "/work/report.md" } },
    );

    assert.equal(result.status, "completed");
    assert.deepEqual(result.visitedStages, ["collect", "aggregate", "judge", "synthesize"]);
    assert.equal(result.state.evidence["repo"]?.length, 3);
    assert.equal(result.verdicts.length, 1);
    assert.equal(result.verdicts[0]?.finalScore, 4);
    assert.equal(result.verdicts[0]?.dissent, undefined);
    assert.deepEqual(result.errors, ["doc_analyst: CollectionError: doc unreachable"]);
    assert.equal(result.state.finalResult?.overallScore, 4);
    assert.equal(generator.requests.length, 3);
  });

  it("ends at the error terminal when no evidence was collected", async () => {
    const generator = new FixedScoreGenerator({ Prosecutor: 5, Defense: 5, TechLead: 5 });
    const engine = new AuditEngine({
      settings,
      rubric,
      collectors: {
        repo: async () => {
          throw new Error("ENOENT: no such directory");
        },
      },
      generator,
    });
    const result = await engine.run({ runId: "run-empty", target: { repoRef: "/missing" } });

    assert.equal(result.status, "terminated");
    assert.deepEqual(result.visitedStages, ["collect", "aggregate"]);
    assert.deepEqual(result.verdicts, []);
    assert.deepEqual(result.errors, ["repo_investigator: CollectionError: /missing: ENOENT: no such directory"]);
    assert.equal(generator.requests.length, 0);
  });

  it("substitutes one degraded opinion when a role never conforms", async () => {
    const generator = new FixedScoreGenerator({ Prosecutor: "I refuse to answer.", Defense: 3, TechLead: 4 });
    const result = await runAudit(
      { settings, rubric, collectors: { repo: collectors.repo }, generator },
      { runId: "run-degraded", target: { repoRef: "/work/repo" } },
    );

    const degraded = result.state.opinions.filter((opinion) => opinion.degraded);
    assert.equal(degraded.length, 1);
    assert.equal(degraded[0]?.role, "Prosecutor");
    assert.equal(result.errors.length, 1);
    assert.match(result.errors[0] ?? "", /^prosecutor\/git_forensic_analysis: GenerationError: /);
    // Defense 3 and TechLead 4 share the weight: 3.5 rounds up.
    assert.equal(result.verdicts[0]?.finalScore, 4);
    assert.deepEqual(result.verdicts[0]?.absentRoles, ["Prosecutor"]);
  });
});

describe("evidenceAggregatorNode", () => {
  it("flags document paths missing from the manifest", async () => {
    const criteria = [
      { id: "report_accuracy", name: "Report Accuracy", category: "documentation", targetArtifact: "doc" },
      { id: "git_forensic_analysis", name: "Git Forensic Analysis", category: "process", targetArtifact: "repo" },
    ];
    const state = mergeState(initializeState({ runId: "r", target: { repoRef: ".", docRef: "report.md" }, criteria }), {
      evidence: {
        repo: [{ goal: MANIFEST_GOAL, found: true, location: ".", confidence: 1, rationale: "files", content: "src/graph.ts\nsrc/state.ts" }],
        doc: [
          {
            goal: CROSS_REFERENCE_GOAL,
            found: true,
            location: "report.md",
            confidence: 0.8,
            rationale: "paths",
            content: "./src/graph.ts, src/parallel.ts",
          },
        ],
      },
    });
    const delta = await evidenceAggregatorNode().run(state, {
      nodeId: "evidence_aggregator",
      signal: new AbortController().signal,
      log: () => undefined,
    });
    assert.deepEqual(delta.evidence?.["cross_ref"], [
      {
        goal: "hallucinated_paths",
        found: true,
        location: "report.md",
        confidence: 0.9,
        severity: "high",
        rationale: "Document cites 1 path(s) absent from the repository.",
        content: "src/parallel.ts",
        criterionIds: ["report_accuracy"],
      },
      {
        goal: "verified_paths",
        found: true,
        location: "report.md",
        confidence: 0.9,
        severity: "low",
        rationale: "Document cites 1 path(s) present in the repository.",
        content: "src/graph.ts",
        criterionIds: ["report_accuracy"],
      },
    ]);
  });
});
