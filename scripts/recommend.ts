#!/usr/bin/env tsx
/**
 * Manual runner: rank a profile against a job description
 *
 * Usage:
 *   npx tsx scripts/recommend.ts <profile.json> <job.txt>
 *
 * Example:
 *   LOG_LEVEL=debug npx tsx scripts/recommend.ts tests/fixtures/profile.json job.txt
 *
 * Prints:
 * - ranked bullets per role with score and evidence phrases
 * - recommended skill lines fitted to the line budget
 *
 * Uses TEI backends when EMBEDDINGS_URL / RERANKER_URL are set,
 * in-process fallbacks otherwise.
 */

import * as fs from "fs";
import { createEngine } from "@/engine";
import { loadProfile } from "@/profile";
import { fitSkillLine } from "@/format";
import * as logger from "@/logger";

const [profilePath, jobPath] = process.argv.slice(2);
if (!profilePath || !jobPath) {
  console.error("Usage: npx tsx scripts/recommend.ts <profile.json> <job.txt>");
  process.exit(1);
}

async function main(profileFile: string, jobFile: string): Promise<void> {
  const profile = loadProfile(profileFile);
  const jobText = fs.readFileSync(jobFile, "utf-8");
  const engine = createEngine();

  const byRole = await engine.bullets.recommendForRoles(profile.bulletsByRole, jobText);
  for (const [role, ranked] of Object.entries(byRole)) {
    console.log(`\n=== ${role} ===`);
    for (const { bullet, score, matches } of ranked) {
      console.log(`[${score}] ${bullet.bullet} (${bullet.lines} lines)`);
      if (matches.length > 0) {
        console.log(`      matches: ${matches.join(", ")}`);
      }
    }
  }

  console.log("\n=== Skills ===");
  const skills = engine.skillsFor(profile.taxonomy).recommendSkills(jobText);
  skills.forEach(({ category, skills: names }, i) => {
    console.log(`SKILL_${i + 1}: ${fitSkillLine(category, names)}`);
  });
}

main(profilePath, jobPath).catch((error: unknown) => {
  logger.error("Recommendation run failed", {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
