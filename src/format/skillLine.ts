/**
 * Skill line formatting — "Category [a, b, c]" strings under a character budget
 */

import type { ParsedSkillLine, SkillLineStatus } from "@/types";
import {
  DEFAULT_SKILL_LINE_LIMIT,
  ELLIPSIS,
  MIN_TRUNCATED_SKILL_CHARS,
  OVERFLOW_MARKER_CHARS,
  SINGLE_SKILL_FRAME_CHARS,
  SKILL_LINE_FALLBACK,
  SKILL_LINE_PATTERN,
  SKILL_LINE_WARNING_MARGIN,
} from "@/constants";

/**
 * Length in code points, so astral characters count once.
 */
function charLength(text: string): number {
  return [...text].length;
}

/**
 * @example
 * formatSkillLine("Databases", ["PostgreSQL", "Redis"]) // "Databases [PostgreSQL, Redis]"
 */
export function formatSkillLine(category: string, skills: string[]): string {
  return `${category} [${skills.join(", ")}]`;
}

/**
 * Formats a skill line that fits within `limit` characters (code points).
 *
 * - no skills: ""
 * - a single long skill is cut and ends with "..."
 * - several skills are dropped from the end; " +N]" records how many
 *   when there is room for it
 * - otherwise "<category> [...]"
 *
 * @example
 * fitSkillLine("Cloud Platforms", ["AWS", "Azure", "GCP", "Kubernetes", "Docker", "Terraform"])
 * // "Cloud Platforms [AWS, Azure, GCP, Kubernetes +2]"
 */
export function fitSkillLine(
  category: string,
  skills: string[],
  limit: number = DEFAULT_SKILL_LINE_LIMIT,
): string {
  if (skills.length === 0) {
    return "";
  }

  const formatted = formatSkillLine(category, skills);
  if (charLength(formatted) <= limit) {
    return formatted;
  }

  if (skills.length === 1) {
    const available = limit - charLength(category) - SINGLE_SKILL_FRAME_CHARS;
    if (available > MIN_TRUNCATED_SKILL_CHARS) {
      const truncated =
        Array.from(skills[0]).slice(0, available - ELLIPSIS.length).join("") + ELLIPSIS;
      return `${category} [${truncated}]`;
    }
  } else {
    const kept = [...skills];
    while (kept.length > 0 && charLength(formatSkillLine(category, kept)) > limit) {
      kept.pop();
    }

    if (kept.length > 0) {
      const fitted = formatSkillLine(category, kept);
      const dropped = skills.length - kept.length;
      if (dropped > 0 && charLength(fitted) + OVERFLOW_MARKER_CHARS <= limit) {
        return `${fitted.slice(0, -1)} +${dropped}]`;
      }
      return fitted;
    }
  }

  return `${category} ${SKILL_LINE_FALLBACK}`;
}

/**
 * Recovers category and skills from a formatted line.
 * A value without a bracketed list is returned as a category with no skills.
 */
export function parseSkillLine(value: string): ParsedSkillLine {
  const trimmed = value.trim();
  const match = SKILL_LINE_PATTERN.exec(trimmed);
  if (!match) {
    return { category: value, skills: [] };
  }
  return {
    category: match[1].trim(),
    skills: match[2].trim().split(",").map((skill) => skill.trim()),
  };
}

/**
 * Classifies a line length against the character budget.
 */
export function skillLineStatus(
  length: number,
  limit: number = DEFAULT_SKILL_LINE_LIMIT,
): SkillLineStatus {
  if (length <= 0) {
    return "empty";
  }
  if (length > limit) {
    return "over";
  }
  if (length > limit - SKILL_LINE_WARNING_MARGIN) {
    return "warning";
  }
  return "ok";
}
