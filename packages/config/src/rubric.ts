/**
 * Rubric document types and loader.
 *
 * Reads and validates the rubric JSON that lists the evaluation
 * criteria, the role weight vector of each criterion category, the
 * discrete score scale and the arbitration parameters.
 */

import { readFile } from "node:fs/promises";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export const JUDICIAL_ROLES = ["Prosecutor", "Defense", "TechLead"] as const;

/** Closed set of reviewer roles. */
export type JudicialRole = (typeof JUDICIAL_ROLES)[number];

export type RoleWeights = Record<JudicialRole, number>;

export interface ScoreScale {
  min: number;
  max: number;
}

export interface SynthesisRules {
  /** Score ceiling applied to every opinion when a confirmed high-severity finding exists. */
  factCeiling: number;
  /** Spread (max - min) above which a dissent explanation is attached. */
  dissentThreshold: number;
  /** Minimum evidence confidence for a high-severity finding to count as confirmed. */
  confirmationConfidence: number;
}

export interface RubricCriterion {
  id: string;
  name: string;
  category: string;
  /** Evidence source the criterion is mainly judged on (`repo`, `doc`, ...). */
  targetArtifact: string;
  forensicInstruction?: string;
  successPattern?: string;
  failurePattern?: string;
}

export interface Rubric {
  version: string;
  scoreScale: ScoreScale;
  synthesis: SynthesisRules;
  roleWeights: Record<string, RoleWeights>;
  criteria: RubricCriterion[];
}

export const DEFAULT_SCORE_SCALE: ScoreScale = { min: 1, max: 5 };

export const DEFAULT_SYNTHESIS_RULES: SynthesisRules = {
  factCeiling: 3,
  dissentThreshold: 2,
  confirmationConfidence: 0.75,
};

export function isJudicialRole(value: unknown): value is JudicialRole {
  return JUDICIAL_ROLES.some((role) => role === value);
}

/* ------------------------------------------------------------------ */
/*  Validation                                                         */
/* ------------------------------------------------------------------ */

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function finiteNumber(value: unknown, label: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new Error(`${label} must be a finite number`);
  }
  return value;
}

function readScale(value: unknown): ScoreScale {
  if (value === undefined) return { ...DEFAULT_SCORE_SCALE };
  if (!isRecord(value)) throw new Error("scoreScale must be an object");
  const min = finiteNumber(value["min"], "scoreScale.min");
  const max = finiteNumber(value["max"], "scoreScale.max");
  if (!Number.isInteger(min) || !Number.isInteger(max) || min >= max) {
    throw new Error("scoreScale must have integer bounds with min < max");
  }
  return { min, max };
}

function readSynthesis(value: unknown, scale: ScoreScale): SynthesisRules {
  if (value !== undefined && !isRecord(value)) throw new Error("synthesis must be an object");
  const block: Record<string, unknown> = isRecord(value) ? value : {};
  const rules: SynthesisRules = {
    factCeiling:
      block["factCeiling"] === undefined
        ? DEFAULT_SYNTHESIS_RULES.factCeiling
        : finiteNumber(block["factCeiling"], "synthesis.factCeiling"),
    dissentThreshold:
      block["dissentThreshold"] === undefined
        ? DEFAULT_SYNTHESIS_RULES.dissentThreshold
        : finiteNumber(block["dissentThreshold"], "synthesis.dissentThreshold"),
    confirmationConfidence:
      block["confirmationConfidence"] === undefined
        ? DEFAULT_SYNTHESIS_RULES.confirmationConfidence
        : finiteNumber(block["confirmationConfidence"], "synthesis.confirmationConfidence"),
  };
  if (rules.factCeiling < scale.min || rules.factCeiling > scale.max) {
    throw new Error(`synthesis.factCeiling must lie within the score scale ${scale.min}-${scale.max}`);
  }
  if (rules.dissentThreshold < 0) {
    throw new Error("synthesis.dissentThreshold must not be negative");
  }
  if (rules.confirmationConfidence < 0 || rules.confirmationConfidence > 1) {
    throw new Error("synthesis.confirmationConfidence must lie within 0-1");
  }
  return rules;
}

function readRoleWeights(value: unknown): Record<string, RoleWeights> {
  if (!isRecord(value)) throw new Error("Rubric missing required key: roleWeights");
  const table: Record<string, RoleWeights> = {};
  for (const [category, row] of Object.entries(value)) {
    if (!isRecord(row)) throw new Error(`roleWeights.${category} must be an object`);
    for (const role of Object.keys(row)) {
      if (!isJudicialRole(role)) throw new Error(`roleWeights.${category} names unknown role: ${role}`);
    }
    const weight = (role: JudicialRole): number => {
      const value = finiteNumber(row[role], `roleWeights.${category}.${role}`);
      if (value <= 0) throw new Error(`roleWeights.${category}.${role} must be positive`);
      return value;
    };
    table[category] = { Prosecutor: weight("Prosecutor"), Defense: weight("Defense"), TechLead: weight("TechLead") };
  }
  return table;
}

function optionalString(value: unknown, label: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new Error(`${label} must be a string`);
  return value;
}

function readCriteria(value: unknown, roleWeights: Record<string, RoleWeights>): RubricCriterion[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new Error("Rubric criteria must be a non-empty array");
  }
  const seen = new Set<string>();
  return value.map((entry, index) => {
    if (!isRecord(entry)) throw new Error(`criteria[${index}] must be an object`);
    const { id, name, category, targetArtifact } = entry;
    if (typeof id !== "string" || typeof name !== "string" || typeof category !== "string") {
      throw new Error(`criteria[${index}] must include id, name, and category`);
    }
    if (seen.has(id)) throw new Error(`Duplicate criterion id: ${id}`);
    seen.add(id);
    if (!roleWeights[category]) {
      throw new Error(`criteria[${index}] category "${category}" has no roleWeights entry`);
    }
    return {
      id,
      name,
      category,
      targetArtifact: optionalString(targetArtifact, `criteria[${index}].targetArtifact`) ?? "repo",
      forensicInstruction: optionalString(entry["forensicInstruction"], `criteria[${index}].forensicInstruction`),
      successPattern: optionalString(entry["successPattern"], `criteria[${index}].successPattern`),
      failurePattern: optionalString(entry["failurePattern"], `criteria[${index}].failurePattern`),
    };
  });
}

/**
 * Validate raw rubric JSON and return it with defaults filled in.
 * Throws on the first defect found.
 */
export function validateRubric(data: unknown): Rubric {
  if (!isRecord(data)) {
    throw new Error("Rubric must be a non-null object");
  }
  const version = data["version"];
  if (typeof version !== "string") {
    throw new Error("Rubric missing required key: version");
  }
  const scoreScale = readScale(data["scoreScale"]);
  const synthesis = readSynthesis(data["synthesis"], scoreScale);
  const roleWeights = readRoleWeights(data["roleWeights"]);
  const criteria = readCriteria(data["criteria"], roleWeights);
  return { version, scoreScale, synthesis, roleWeights, criteria };
}

/* ------------------------------------------------------------------ */
/*  Loader                                                             */
/* ------------------------------------------------------------------ */

/** Load and validate a rubric document. */
export async function loadRubric(rubricPath: string): Promise<Rubric> {
  const raw = await readFile(rubricPath, "utf-8");
  const data: unknown = JSON.parse(raw);
  return validateRubric(data);
}
