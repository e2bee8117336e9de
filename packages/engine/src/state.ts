/**
 * Audit state store.
 *
 * A state is an immutable snapshot. Nodes never touch it; they return a
 * delta, and `mergeState` folds the delta into a fresh snapshot using one
 * policy per field:
 *
 *   evidence     keyed-union   union of keys, sequences concatenated on collision
 *   opinions     append        arrival order kept; `sortOpinions` gives the observable order
 *   errors       append
 *   finalResult  set-once      a differing second value is recorded as a MergeConflict
 *
 * Keyed-union and append are associative and commutative up to
 * `canonicalState`, so the result of a fan-out group does not depend on
 * completion order.
 */

import type { JudicialRole, RubricCriterion } from "@tribunal/config";
import { isJudicialRole } from "@tribunal/config";
import { MergeConflict, formatErrorEntry } from "./errors.js";
import { stableStringify } from "./stable-stringify.js";

/* ------------------------------------------------------------------ */
/*  Types                                                              */
/* ------------------------------------------------------------------ */

export type Severity = "low" | "medium" | "high";

/** A structured finding about the audited artifact. */
export interface Evidence {
  goal: string;
  found: boolean;
  location: string;
  confidence: number;
  rationale: string;
  content?: string;
  severity?: Severity;
  /** Criteria this finding bears on; only tagged evidence can trigger the fact override. */
  criterionIds?: string[];
}

/** One reviewer role's score and rationale for one criterion. */
export interface JudicialOpinion {
  criterionId: string;
  role: JudicialRole;
  score: number;
  rationale: string;
  citedEvidence: string[];
  /** Placeholder written after the attempt budget ran out; counts as absent in synthesis. */
  degraded: boolean;
}

export interface FactOverride {
  ceiling: number;
  evidenceLocations: string[];
}

export interface CriterionVerdict {
  criterionId: string;
  criterionName: string;
  finalScore: number | "unscored";
  /** Non-degraded opinions that entered aggregation, in role order. */
  opinions: JudicialOpinion[];
  absentRoles: JudicialRole[];
  unscoredReason?: string;
  factOverride?: FactOverride;
  dissent?: string;
}

export interface AuditResult {
  verdicts: CriterionVerdict[];
  overallScore: number | null;
}

export interface AuditTarget {
  repoRef: string;
  docRef?: string;
}

export interface AuditState {
  readonly runId: string;
  readonly target: Readonly<AuditTarget>;
  readonly criteria: readonly RubricCriterion[];
  readonly evidence: Readonly<Record<string, readonly Evidence[]>>;
  readonly opinions: readonly JudicialOpinion[];
  readonly errors: readonly string[];
  readonly finalResult?: AuditResult;
}

/** Partial state contribution produced by one node. */
export interface StateDelta {
  evidence?: Record<string, Evidence[]>;
  opinions?: JudicialOpinion[];
  errors?: string[];
  finalResult?: AuditResult;
}

export interface StateInit {
  runId: string;
  target: AuditTarget;
  criteria: readonly RubricCriterion[];
}

/* ------------------------------------------------------------------ */
/*  Construction + merge                                               */
/* ------------------------------------------------------------------ */

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const item of Object.values(value)) {
      deepFreeze(item);
    }
  }
  return value;
}

function cloneJson<T>(value: T): T {
  return structuredClone(value);
}

/** Create the initial snapshot of a run with empty containers. */
export function initializeState(init: StateInit): AuditState {
  const state: AuditState = {
    runId: init.runId,
    target: cloneJson(init.target),
    criteria: cloneJson([...init.criteria]),
    evidence: {},
    opinions: [],
    errors: [],
  };
  return deepFreeze(state);
}

/**
 * Fold one delta into a snapshot. Neither input is modified or aliased.
 * Once `finalResult` is set the evidence and opinions are frozen: later
 * contributions to them are dropped and recorded as a conflict.
 */
export function mergeState(state: AuditState, delta: StateDelta): AuditState {
  const sealed = state.finalResult !== undefined;
  const errors = [...state.errors, ...(delta.errors ?? [])];
  const lateEntries = Object.keys(delta.evidence ?? {}).length > 0 || (delta.opinions ?? []).length > 0;
  if (sealed && lateEntries) {
    errors.push(formatErrorEntry("state", new MergeConflict("state is read-only after final_result")));
  }

  const evidence: Record<string, Evidence[]> = {};
  for (const [key, items] of Object.entries(state.evidence)) {
    evidence[key] = [...items];
  }
  if (!sealed) {
    for (const [key, items] of Object.entries(delta.evidence ?? {})) {
      evidence[key] = [...(evidence[key] ?? []), ...cloneJson(items)];
    }
  }

  let finalResult = state.finalResult;
  if (delta.finalResult !== undefined) {
    if (finalResult === undefined) {
      finalResult = cloneJson(delta.finalResult);
    } else if (stableStringify(finalResult) !== stableStringify(delta.finalResult)) {
      errors.push(
        formatErrorEntry("state", new MergeConflict("final_result is already set; the first value is kept")),
      );
    }
  }

  const next: AuditState = {
    runId: state.runId,
    target: state.target,
    criteria: state.criteria,
    evidence,
    opinions: sealed ? [...state.opinions] : [...state.opinions, ...cloneJson(delta.opinions ?? [])],
    errors,
    ...(finalResult !== undefined ? { finalResult } : {}),
  };
  return deepFreeze(next);
}

/* ------------------------------------------------------------------ */
/*  Observable ordering                                                */
/* ------------------------------------------------------------------ */

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Deterministic order for any externally visible opinion sequence: criterion id, then role. */
export function compareOpinions(a: JudicialOpinion, b: JudicialOpinion): number {
  return (
    compareStrings(a.criterionId, b.criterionId) ||
    compareStrings(a.role, b.role) ||
    compareStrings(stableStringify(a), stableStringify(b))
  );
}

export function sortOpinions(opinions: readonly JudicialOpinion[]): JudicialOpinion[] {
  return [...opinions].sort(compareOpinions);
}

export function allEvidence(state: AuditState): Evidence[] {
  return Object.keys(state.evidence)
    .sort(compareStrings)
    .flatMap((key) => state.evidence[key] ?? []);
}

export interface CanonicalState {
  runId: string;
  evidence: Array<[string, string[]]>;
  opinions: string[];
  errors: string[];
  finalResult: string | null;
}

/**
 * Order-free view of a snapshot. Two snapshots reached by folding the same
 * deltas in different orders have equal canonical views.
 */
export function canonicalState(state: AuditState): CanonicalState {
  return {
    runId: state.runId,
    evidence: Object.keys(state.evidence)
      .sort(compareStrings)
      .map((key): [string, string[]] => [key, (state.evidence[key] ?? []).map((item) => stableStringify(item)).sort(compareStrings)]),
    opinions: sortOpinions(state.opinions).map((opinion) => stableStringify(opinion)),
    errors: [...state.errors].sort(compareStrings),
    finalResult: state.finalResult === undefined ? null : stableStringify(state.finalResult),
  };
}

/* ------------------------------------------------------------------ */
/*  Delta validation                                                   */
/* ------------------------------------------------------------------ */

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === "object" && input !== null && !Array.isArray(input);
}

function isStringArray(input: unknown): input is string[] {
  return Array.isArray(input) && input.every((item) => typeof item === "string");
}

export function isEvidence(input: unknown): input is Evidence {
  if (!isRecord(input)) return false;
  return (
    typeof input.goal === "string" &&
    typeof input.found === "boolean" &&
    typeof input.location === "string" &&
    typeof input.rationale === "string" &&
    typeof input.confidence === "number" &&
    input.confidence >= 0 &&
    input.confidence <= 1 &&
    (input.content === undefined || typeof input.content === "string") &&
    (input.severity === undefined || input.severity === "low" || input.severity === "medium" || input.severity === "high") &&
    (input.criterionIds === undefined || isStringArray(input.criterionIds))
  );
}

export function isJudicialOpinion(input: unknown): input is JudicialOpinion {
  if (!isRecord(input)) return false;
  return (
    typeof input.criterionId === "string" &&
    isJudicialRole(input.role) &&
    typeof input.score === "number" &&
    Number.isInteger(input.score) &&
    typeof input.rationale === "string" &&
    isStringArray(input.citedEvidence) &&
    typeof input.degraded === "boolean"
  );
}

function isAuditResult(input: unknown): input is AuditResult {
  return (
    isRecord(input) &&
    Array.isArray(input.verdicts) &&
    (input.overallScore === null || typeof input.overallScore === "number")
  );
}

/** Check that a node's return value has the shape of a state delta. */
export function isStateDelta(input: unknown): input is StateDelta {
  if (!isRecord(input)) return false;
  const allowed = new Set(["evidence", "opinions", "errors", "finalResult"]);
  if (!Object.keys(input).every((key) => allowed.has(key))) return false;
  if (input.evidence !== undefined) {
    if (!isRecord(input.evidence)) return false;
    if (!Object.values(input.evidence).every((items) => Array.isArray(items) && items.every(isEvidence))) {
      return false;
    }
  }
  if (input.opinions !== undefined && !(Array.isArray(input.opinions) && input.opinions.every(isJudicialOpinion))) {
    return false;
  }
  if (input.errors !== undefined && !isStringArray(input.errors)) return false;
  if (input.finalResult !== undefined && !isAuditResult(input.finalResult)) return false;
  return true;
}
