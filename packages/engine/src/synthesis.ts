/**
 * Synthesis / arbitration.
 *
 * Turns the opinions of every reviewer role into one verdict per rubric
 * criterion. Pure: the output depends only on the rubric, the evidence
 * and the opinions, never on their arrival order.
 *
 * Rules, applied in order:
 *   1. fact override   confirmed high-severity evidence caps every score at the ceiling
 *   2. role weighting  weighted mean over the category's weight row, rounded half-up
 *   3. missing roles   absent or degraded roles drop out, their weight is redistributed
 *   4. dissent         spread of pre-clamp scores above the threshold is explained
 */

import type { JudicialRole, Rubric, RubricCriterion, ScoreScale } from "@tribunal/config";
import { JUDICIAL_ROLES } from "@tribunal/config";
import type { AuditResult, CriterionVerdict, Evidence, FactOverride, JudicialOpinion } from "./state.js";
import { sortOpinions } from "./state.js";

export type SynthesisRubric = Pick<Rubric, "scoreScale" | "synthesis" | "roleWeights">;

/** Round half-up to the nearest score, clamped to the scale. */
export function roundHalfUp(value: number, scale: ScoreScale): number {
  // The epsilon keeps 3.4999999999 from a float sum on the 3.5 side.
  const rounded = Math.floor(value + 0.5 + 1e-9);
  return Math.min(scale.max, Math.max(scale.min, rounded));
}

export function isConfirmedHighSeverity(evidence: Evidence, criterionId: string, minConfidence: number): boolean {
  return (
    evidence.found &&
    evidence.severity === "high" &&
    (evidence.criterionIds ?? []).includes(criterionId) &&
    evidence.confidence >= minConfidence
  );
}

/** One non-degraded opinion per role; duplicates resolve to the first in canonical order. */
function contributingOpinions(criterionId: string, opinions: readonly JudicialOpinion[]): Map<JudicialRole, JudicialOpinion> {
  const byRole = new Map<JudicialRole, JudicialOpinion>();
  for (const opinion of sortOpinions(opinions)) {
    if (opinion.criterionId !== criterionId || opinion.degraded) continue;
    if (!byRole.has(opinion.role)) byRole.set(opinion.role, opinion);
  }
  return byRole;
}

function describeDissent(
  scores: Array<{ role: JudicialRole; score: number }>,
  finalScore: number,
  threshold: number,
  override: FactOverride | undefined,
): string | undefined {
  const values = scores.map((entry) => entry.score);
  const spread = Math.max(...values) - Math.min(...values);
  if (spread <= threshold) return undefined;

  const distance = (score: number) => Math.abs(score - finalScore);
  const furthest = Math.max(...values.map(distance));
  const outliers = scores
    .filter((entry) => distance(entry.score) === furthest)
    .map((entry) => `${entry.role} (${entry.score})`);

  let text = `Score spread ${spread} exceeds threshold ${threshold}; outlying: ${outliers.join(", ")} against final score ${finalScore}.`;
  if (override) {
    const overruled = scores.filter((entry) => entry.score > override.ceiling).map((entry) => entry.role);
    if (overruled.length > 0) {
      text += ` Fact override capped ${overruled.join(", ")} at ${override.ceiling} (evidence: ${override.evidenceLocations.join(", ")}).`;
    }
  }
  return text;
}

export function synthesizeCriterion(
  criterion: RubricCriterion,
  evidence: readonly Evidence[],
  opinions: readonly JudicialOpinion[],
  rubric: SynthesisRubric,
): CriterionVerdict {
  const { scoreScale, synthesis } = rubric;
  const weights = rubric.roleWeights[criterion.category];
  const byRole = contributingOpinions(criterion.id, opinions);

  const present = JUDICIAL_ROLES.filter((role) => byRole.has(role));
  const absentRoles = JUDICIAL_ROLES.filter((role) => !byRole.has(role));
  const contributing = present.flatMap((role) => {
    const opinion = byRole.get(role);
    return opinion ? [opinion] : [];
  });

  const base = { criterionId: criterion.id, criterionName: criterion.name, absentRoles: [...absentRoles] };

  if (!weights) {
    return { ...base, finalScore: "unscored", opinions: contributing, unscoredReason: `no role weights for category "${criterion.category}"` };
  }
  if (contributing.length === 0) {
    return { ...base, finalScore: "unscored", opinions: [], unscoredReason: "no reviewer opinion available for any role" };
  }

  const confirmed = evidence.filter((item) => isConfirmedHighSeverity(item, criterion.id, synthesis.confirmationConfidence));
  const factOverride: FactOverride | undefined =
    confirmed.length > 0
      ? { ceiling: synthesis.factCeiling, evidenceLocations: [...new Set(confirmed.map((item) => item.location))].sort() }
      : undefined;

  let weighted = 0;
  let totalWeight = 0;
  for (const opinion of contributing) {
    const weight = weights[opinion.role];
    const effective = factOverride ? Math.min(opinion.score, factOverride.ceiling) : opinion.score;
    weighted += weight * effective;
    totalWeight += weight;
  }
  const finalScore = roundHalfUp(weighted / totalWeight, scoreScale);

  const dissent = describeDissent(
    contributing.map((opinion) => ({ role: opinion.role, score: opinion.score })),
    finalScore,
    synthesis.dissentThreshold,
    factOverride,
  );

  return {
    ...base,
    finalScore,
    opinions: contributing,
    ...(factOverride ? { factOverride } : {}),
    ...(dissent ? { dissent } : {}),
  };
}

/** Mean of the scored verdicts to one decimal, `null` when none was scored. */
export function overallScore(verdicts: readonly CriterionVerdict[]): number | null {
  const scores = verdicts.flatMap((verdict) => (typeof verdict.finalScore === "number" ? [verdict.finalScore] : []));
  if (scores.length === 0) return null;
  const mean = scores.reduce((sum, score) => sum + score, 0) / scores.length;
  return Math.round(mean * 10) / 10;
}

/** Verdict set for every criterion, ordered by criterion id. */
export function synthesize(
  criteria: readonly RubricCriterion[],
  evidence: readonly Evidence[],
  opinions: readonly JudicialOpinion[],
  rubric: SynthesisRubric,
): AuditResult {
  const verdicts = [...criteria]
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
    .map((criterion) => synthesizeCriterion(criterion, evidence, opinions, rubric));
  return { verdicts, overallScore: overallScore(verdicts) };
}
