/**
 * Selection constraint type definitions
 *
 * The wizard collaborator lets a person pick bullets per role from the ranked
 * lists. These shapes describe the structural rules those picks must satisfy.
 */

import type { BulletRecord } from "./candidates";

/**
 * Role name → exact number of bullets to select for that role.
 */
export type SelectionRequirements = Record<string, number>;

/**
 * Total selected lines compared with the page line budget.
 */
export type LineBudgetStatus = "under" | "exact" | "over";

/**
 * Relative score band used for color-coding a ranked list.
 */
export type ScoreBand = "high" | "medium" | "low";

/**
 * A role whose selected bullet count differs from its requirement.
 */
export type SelectionViolation = {
  role: string;
  required: number;
  selected: number;
};

/**
 * Input for assembling document template fields.
 */
export type TemplateFieldsInput = {
  /** Final ordered bullets per role */
  bulletsByRole: Record<string, BulletRecord[]>;
  /** Final ordered, already budgeted skill lines */
  skillLines: string[];
  /** Optional job title per role */
  titles?: Record<string, string>;
  /** Optional placeholder prefix per role (defaults to a derived prefix) */
  prefixes?: Record<string, string>;
};
