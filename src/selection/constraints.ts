/**
 * Selection constraints — structural rules for the picks made from ranked lists
 *
 * Every role needs an exact number of bullets and the selected bullets
 * together should fill the page line budget exactly.
 */

import type {
  BulletRecord,
  LineBudgetStatus,
  ScoreBand,
  SelectionRequirements,
  SelectionViolation,
} from "@/types";
import {
  DEFAULT_LINE_BUDGET,
  SCORE_BAND_HIGH_THRESHOLD,
  SCORE_BAND_MEDIUM_THRESHOLD,
} from "@/constants";

export type SelectionStats = {
  totalBullets: number;
  totalLines: number;
  totalSkills: number;
};

/**
 * Default pick: the first `count` entries of a ranked list.
 */
export function preselectTopBullets<T>(ranked: readonly T[], count: number): T[] {
  return count > 0 ? ranked.slice(0, count) : [];
}

/**
 * Line cost of a single bullet; anything that is not a finite number costs 0.
 */
export function bulletLineCost(bullet: Pick<BulletRecord, "lines">): number {
  return typeof bullet.lines === "number" && Number.isFinite(bullet.lines)
    ? bullet.lines
    : 0;
}

export function countSelectedLines(bullets: ReadonlyArray<Pick<BulletRecord, "lines">>): number {
  return bullets.reduce((sum, bullet) => sum + bulletLineCost(bullet), 0);
}

/**
 * @example
 * lineBudgetStatus(21) // "exact"
 * lineBudgetStatus(19) // "under"
 */
export function lineBudgetStatus(
  totalLines: number,
  budget: number = DEFAULT_LINE_BUDGET,
): LineBudgetStatus {
  if (totalLines === budget) {
    return "exact";
  }
  return totalLines > budget ? "over" : "under";
}

/**
 * Roles whose selected count differs from the required count.
 * Roles with a requirement but no selection count as 0 selected.
 *
 * @returns Violations in requirement order; empty when the selection is valid
 */
export function validateSelection(
  requirements: SelectionRequirements,
  selected: Record<string, readonly unknown[]>,
): SelectionViolation[] {
  const violations: SelectionViolation[] = [];
  for (const [role, required] of Object.entries(requirements)) {
    const count = selected[role]?.length ?? 0;
    if (count !== required) {
      violations.push({ role, required, selected: count });
    }
  }
  return violations;
}

/**
 * Relative band of a score within a ranked list's score range.
 * When every score is equal the band is "high".
 */
export function scoreBand(score: number, allScores: readonly number[]): ScoreBand {
  const max = allScores.length > 0 ? Math.max(...allScores) : 1;
  const min = allScores.length > 0 ? Math.min(...allScores) : 0;
  const fraction = max === min ? 1 : (score - min) / (max - min);

  if (fraction > SCORE_BAND_HIGH_THRESHOLD) {
    return "high";
  }
  return fraction > SCORE_BAND_MEDIUM_THRESHOLD ? "medium" : "low";
}

/**
 * Totals over the final selection.
 */
export function selectionStats(
  bulletsByRole: Record<string, ReadonlyArray<Pick<BulletRecord, "lines">>>,
  skillLines: readonly string[],
): SelectionStats {
  const groups = Object.values(bulletsByRole);
  return {
    totalBullets: groups.reduce((sum, bullets) => sum + bullets.length, 0),
    totalLines: groups.reduce((sum, bullets) => sum + countSelectedLines(bullets), 0),
    totalSkills: skillLines.length,
  };
}
