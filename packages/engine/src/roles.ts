import type { JudicialRole } from "@tribunal/config";

/** One reviewer persona. Adding a role adds a row here and a weight column in the rubric. */
export interface RoleVariant {
  role: JudicialRole;
  /** Id of the judge node that produces this role's opinions. */
  nodeId: string;
  /** Prompt registry entry holding the persona's system prompt. */
  promptId: string;
  /** One-line stance repeated in the user message. */
  stance: string;
}

export const ROLE_VARIANTS: readonly RoleVariant[] = [
  {
    role: "Prosecutor",
    nodeId: "prosecutor",
    promptId: "prosecutor",
    stance: "Look for gaps, shortcuts and security flaws; trust nothing the evidence does not show.",
  },
  {
    role: "Defense",
    nodeId: "defense",
    promptId: "defense",
    stance: "Credit effort, intent and partial progress the evidence supports.",
  },
  {
    role: "TechLead",
    nodeId: "tech_lead",
    promptId: "tech_lead",
    stance: "Judge architectural soundness and maintainability pragmatically.",
  },
];

export function roleVariant(role: JudicialRole): RoleVariant {
  const variant = ROLE_VARIANTS.find((entry) => entry.role === role);
  if (!variant) {
    throw new Error(`No role variant registered for ${role}`);
  }
  return variant;
}
