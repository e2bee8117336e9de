/**
 * @tribunal/config: environment configuration and the rubric document.
 */

export {
  type AuditConfig,
  type Environment,
  type LogLevel,
  REPO_ROOT,
  isLogLevel,
  loadConfig,
} from "./config.js";

export {
  type JudicialRole,
  type RoleWeights,
  type Rubric,
  type RubricCriterion,
  type ScoreScale,
  type SynthesisRules,
  DEFAULT_SCORE_SCALE,
  DEFAULT_SYNTHESIS_RULES,
  JUDICIAL_ROLES,
  isJudicialRole,
  loadRubric,
  validateRubric,
} from "./rubric.js";
