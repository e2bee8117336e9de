import { describe, it } from "node:test";
import assert from "node:assert/strict";

import type { JudicialRole, RubricCriterion } from "@tribunal/config";
import { stableStringify } from "./stable-stringify.js";
import type { Evidence, JudicialOpinion } from "./state.js";
import type { SynthesisRubric } from "./synthesis.js";
import { overallScore, roundHalfUp, synthesize, synthesizeCriterion } from "./synthesis.js";

const rubric: SynthesisRubric = {
  scoreScale: { min: 1, max: 5 },
  synthesis: { factCeiling: 3, dissentThreshold: 2, confirmationConfidence: 0.75 },
  roleWeights: {
    process: { Prosecutor: 1, Defense: 1, TechLead: 1 },
    security: { Prosecutor: 2, Defense: 1, TechLead: 1 },
  },
};

const history: RubricCriterion = { id: "git_forensic_analysis", name: "Git Forensic Analysis", category: "process", targetArtifact: "repo" };
const tooling: RubricCriterion = { id: "safe_tool_engineering", name: "Safe Tool Engineering", category: "security", targetArtifact: "repo" };

function opinions(criterionId: string, scores: Partial<Record<JudicialRole, number>>, degraded: JudicialRole[] = []): JudicialOpinion[] {
  return Object.entries(scores).flatMap(([role, score]) =>
    role === "Prosecutor" || role === "Defense" || role === "TechLead"
      ? [{ criterionId, role, score: score ?? 0, rationale: `${role} view`, citedEvidence: [], degraded: degraded.includes(role) }]
      : [],
  );
}

function highSeverity(overrides: Partial<Evidence> = {}): Evidence {
  return {
    goal: "shell_execution",
    found: true,
    location: "src/run.ts",
    confidence: 0.9,
    rationale: "raw shell call",
    severity: "high",
    criterionIds: ["git_forensic_analysis"],
    ...overrides,
  };
}

describe("roundHalfUp", () => {
  it("rounds halves up and clamps to the scale", () => {
    const scale = rubric.scoreScale;
    assert.equal(roundHalfUp(3.5, scale), 4);
    assert.equal(roundHalfUp(2.5, scale), 3);
    assert.equal(roundHalfUp(3.49, scale), 3);
    assert.equal(roundHalfUp(0.2, scale), 1);
    assert.equal(roundHalfUp(7, scale), 5);
  });
});

describe("fact override", () => {
  it("caps unanimous top scores at the ceiling", () => {
    const verdict = synthesizeCriterion(history, [highSeverity()], opinions(history.id, { Prosecutor: 5, Defense: 5, TechLead: 5 }), rubric);
    assert.equal(verdict.finalScore, 3);
    assert.deepEqual(verdict.factOverride, { ceiling: 3, evidenceLocations: ["src/run.ts"] });
    assert.equal(verdict.dissent, undefined);
  });

  it("ignores unconfirmed or untagged findings", () => {
    const unanimous = opinions(history.id, { Prosecutor: 5, Defense: 5, TechLead: 5 });
    const weak = synthesizeCriterion(history, [highSeverity({ confidence: 0.5 })], unanimous, rubric);
    const elsewhere = synthesizeCriterion(history, [highSeverity({ criterionIds: ["other"] })], unanimous, rubric);
    const medium = synthesizeCriterion(history, [highSeverity({ severity: "medium" })], unanimous, rubric);
    assert.deepEqual([weak.finalScore, elsewhere.finalScore, medium.finalScore], [5, 5, 5]);
    assert.equal(weak.factOverride, undefined);
  });

  it("names the overruled roles in the dissent", () => {
    const verdict = synthesizeCriterion(history, [highSeverity()], opinions(history.id, { Prosecutor: 5, Defense: 1, TechLead: 5 }), rubric);
    assert.equal(verdict.finalScore, 2);
    assert.equal(
      verdict.dissent,
      "Score spread 4 exceeds threshold 2; outlying: Prosecutor (5), TechLead (5) against final score 2. Fact override capped Prosecutor, TechLead at 3 (evidence: src/run.ts).",
    );
  });
});

describe("dissent detection", () => {
  it("attaches a dissent when the spread exceeds the threshold", () => {
    const verdict = synthesizeCriterion(history, [], opinions(history.id, { Prosecutor: 1, Defense: 5, TechLead: 3 }), rubric);
    assert.equal(verdict.finalScore, 3);
    assert.equal(
      verdict.dissent,
      "Score spread 4 exceeds threshold 2; outlying: Prosecutor (1), Defense (5) against final score 3.",
    );
  });

  it("stays silent for a narrow spread", () => {
    const verdict = synthesizeCriterion(history, [], opinions(history.id, { Prosecutor: 3, Defense: 4, TechLead: 3 }), rubric);
    assert.equal(verdict.finalScore, 3);
    assert.equal(verdict.dissent, undefined);
  });
});

describe("missing-opinion policy", () => {
  it("redistributes the weight of a degraded role", () => {
    const verdict = synthesizeCriterion(
      tooling,
      [],
      opinions(tooling.id, { Prosecutor: 3, Defense: 5, TechLead: 4 }, ["Prosecutor"]),
      rubric,
    );
    assert.equal(verdict.finalScore, 5);
    assert.deepEqual(verdict.absentRoles, ["Prosecutor"]);
    assert.deepEqual(verdict.opinions.map((o) => o.role), ["Defense", "TechLead"]);
  });

  it("applies the category weights", () => {
    const verdict = synthesizeCriterion(tooling, [], opinions(tooling.id, { Prosecutor: 2, Defense: 5, TechLead: 3 }), rubric);
    // (2*2 + 5 + 3) / 4 = 3
    assert.equal(verdict.finalScore, 3);
  });

  it("marks a criterion without any opinion as unscored", () => {
    const verdict = synthesizeCriterion(history, [], opinions(history.id, { Defense: 3 }, ["Defense"]), rubric);
    assert.equal(verdict.finalScore, "unscored");
    assert.equal(verdict.unscoredReason, "no reviewer opinion available for any role");
    assert.deepEqual(verdict.absentRoles, ["Prosecutor", "Defense", "TechLead"]);
  });
});

describe("synthesize", () => {
  it("gives byte-identical output for any opinion order", () => {
    const all = [
      ...opinions(history.id, { Prosecutor: 1, Defense: 5, TechLead: 3 }),
      ...opinions(tooling.id, { Prosecutor: 2, Defense: 4, TechLead: 4 }),
    ];
    const evidence = [highSeverity()];
    const first = stableStringify(synthesize([tooling, history], evidence, all, rubric));
    const second = stableStringify(synthesize([history, tooling], evidence, [...all].reverse(), rubric));
    assert.equal(first, second);
  });

  it("orders verdicts by criterion id and averages scored ones", () => {
    const result = synthesize(
      [tooling, history],
      [],
      [...opinions(history.id, { Prosecutor: 4, Defense: 4, TechLead: 4 }), ...opinions(tooling.id, { Defense: 3 })],
      rubric,
    );
    assert.deepEqual(result.verdicts.map((v) => [v.criterionId, v.finalScore]), [
      ["git_forensic_analysis", 4],
      ["safe_tool_engineering", 3],
    ]);
    assert.equal(result.overallScore, 3.5);
  });
});

describe("overallScore", () => {
  it("is null when nothing was scored", () => {
    assert.equal(overallScore([]), null);
  });
});
