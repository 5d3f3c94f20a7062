/**
 * Template fields — flat placeholder map for the document template
 *
 * Placeholders:
 * - <PREFIX>_TITLE, <PREFIX>_P1.._P5 per role
 * - SKILL_1..SKILL_4
 * Unused slots are present with an empty string.
 */

import type { TemplateFieldsInput } from "@/types";
import { BULLET_SLOTS_PER_ROLE, SKILL_FIELD_PREFIX, SKILL_SLOTS } from "@/constants";

/**
 * @example
 * deriveTemplatePrefix("Medical Classifier") // "MEDICALCLASSIFIER"
 * deriveTemplatePrefix("Fact-Check AI") // "FACTCHECKAI"
 */
export function deriveTemplatePrefix(role: string): string {
  return role.toUpperCase().replace(/[ -]/g, "");
}

export function buildTemplateFields(input: TemplateFieldsInput): Record<string, string> {
  const fields: Record<string, string> = {};

  for (const [role, bullets] of Object.entries(input.bulletsByRole)) {
    const prefix = input.prefixes?.[role] ?? deriveTemplatePrefix(role);
    fields[`${prefix}_TITLE`] = input.titles?.[role]?.trim() ?? "";

    bullets.forEach((bullet, i) => {
      fields[`${prefix}_P${i + 1}`] = bullet.bullet;
    });
    for (let slot = bullets.length + 1; slot <= BULLET_SLOTS_PER_ROLE; slot++) {
      fields[`${prefix}_P${slot}`] = "";
    }
  }

  for (let slot = 1; slot <= SKILL_SLOTS; slot++) {
    fields[`${SKILL_FIELD_PREFIX}${slot}`] = input.skillLines[slot - 1] ?? "";
  }

  return fields;
}
