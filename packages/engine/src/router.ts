import { ConfigurationError, errorMessage } from "./errors.js";
import { emitStructuredLog } from "./observability.js";
import type { AuditState } from "./state.js";

export interface RouteRule {
  id: string;
  when: (state: AuditState) => boolean;
  next: string;
}

export interface RouterDefinition {
  /** Stage whose barrier this router follows. */
  from: string;
  /** Evaluated in order; the first match wins. */
  rules: RouteRule[];
  /** Taken when no rule matches, which makes the mapping total. */
  otherwise: string;
}

export interface RouteDecision {
  next: string;
  ruleId: string;
}

export const FALLBACK_RULE_ID = "otherwise";

/**
 * Pure `(state) -> next stage` function over a fixed list of predicates.
 * Totality is checked when the router is built: a router without a
 * fallback target is rejected instead of failing on some later state.
 */
export class ConditionalRouter {
  readonly from: string;
  private readonly rules: readonly RouteRule[];
  private readonly otherwise: string;

  constructor(definition: RouterDefinition) {
    if (!definition.from) {
      throw new ConfigurationError("router must name the stage it follows");
    }
    if (typeof definition.otherwise !== "string" || definition.otherwise.length === 0) {
      throw new ConfigurationError(`router after "${definition.from}" has no fallback target`);
    }
    const ids = new Set<string>();
    for (const rule of definition.rules) {
      if (!rule.id || !rule.next) {
        throw new ConfigurationError(`router after "${definition.from}" has a rule without id or target`);
      }
      if (ids.has(rule.id) || rule.id === FALLBACK_RULE_ID) {
        throw new ConfigurationError(`router after "${definition.from}" repeats rule id "${rule.id}"`);
      }
      ids.add(rule.id);
    }
    this.from = definition.from;
    this.rules = [...definition.rules];
    this.otherwise = definition.otherwise;
  }

  /** Every stage this router can select. */
  targets(): string[] {
    return Array.from(new Set([...this.rules.map((rule) => rule.next), this.otherwise]));
  }

  route(state: AuditState): RouteDecision {
    for (const rule of this.rules) {
      let matched = false;
      try {
        matched = rule.when(state);
      } catch (err) {
        emitStructuredLog("engine", "warn", "route predicate threw; treated as no match", {
          from: this.from,
          rule: rule.id,
          error: errorMessage(err),
        });
      }
      if (matched) {
        return { next: rule.next, ruleId: rule.id };
      }
    }
    return { next: this.otherwise, ruleId: FALLBACK_RULE_ID };
  }
}

/** Router with a single unconditional transition. */
export function edge(from: string, to: string): ConditionalRouter {
  return new ConditionalRouter({ from, rules: [], otherwise: to });
}
