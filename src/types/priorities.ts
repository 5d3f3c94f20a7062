/**
 * Priority extraction type definitions
 */

export type PrioritySection = "must_have" | "nice_to_have";

/**
 * Requirement phrases extracted from one job description, split by the
 * section header they appeared under.
 */
export type PrioritySet = {
  mustHave: string[];
  niceToHave: string[];
};
