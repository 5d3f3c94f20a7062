/**
 * SkillRecommender — picks skill categories and skills for a job description
 *
 * Built once per taxonomy. Skills are scored lexically, scores are summed
 * per category, and categories are chosen with the diversity policy.
 */

import type { SkillRecommendation, SkillTaxonomy } from "@/types";
import { DEFAULT_NUM_CATEGORIES, MAX_SKILLS_PER_CATEGORY } from "@/constants";
import { scoreCandidate } from "@/signal/scorer";
import { selectTopCategories } from "./categoryDiversity";
import * as logger from "@/logger";

/**
 * Categories of a skill; malformed entries count as none.
 */
function categoriesOf(taxonomy: SkillTaxonomy, skill: string): string[] {
  const categories: unknown = taxonomy[skill];
  return Array.isArray(categories)
    ? categories.filter((c): c is string => typeof c === "string" && c.trim() !== "")
    : [];
}

export class SkillRecommender {
  private readonly taxonomy: SkillTaxonomy;
  private readonly skillsByCategory: Map<string, string[]>;

  constructor(taxonomy: SkillTaxonomy) {
    // Later edits to the caller's object must not reach the reverse index
    this.taxonomy = Object.fromEntries(
      Object.keys(taxonomy).map((skill) => [skill, categoriesOf(taxonomy, skill)]),
    );
    this.skillsByCategory = SkillRecommender.buildCategoryIndex(this.taxonomy);
  }

  /**
   * Category → skills, in taxonomy order. Skills without categories are left out.
   */
  private static buildCategoryIndex(taxonomy: SkillTaxonomy): Map<string, string[]> {
    const index = new Map<string, string[]>();
    for (const skill of Object.keys(taxonomy)) {
      for (const category of new Set(categoriesOf(taxonomy, skill))) {
        const skills = index.get(category) ?? [];
        skills.push(skill);
        index.set(category, skills);
      }
    }
    return index;
  }

  /**
   * Category names known to the reverse index.
   */
  get categories(): string[] {
    return [...this.skillsByCategory.keys()];
  }

  /**
   * Nonzero skill scores, in taxonomy order.
   */
  scoreSkills(jobText: string): Map<string, number> {
    const scores = new Map<string, number>();
    for (const skill of Object.keys(this.taxonomy)) {
      const score = scoreCandidate(skill, jobText);
      if (score > 0) {
        scores.set(skill, score);
      }
    }
    return scores;
  }

  /**
   * Sum of skill scores per category, in first-scored order.
   */
  scoreCategories(skillScores: Map<string, number>): Map<string, number> {
    const categoryScores = new Map<string, number>();
    for (const [skill, score] of skillScores) {
      for (const category of new Set(categoriesOf(this.taxonomy, skill))) {
        categoryScores.set(category, (categoryScores.get(category) ?? 0) + score);
      }
    }
    return categoryScores;
  }

  /**
   * Recommends categories and up to four skills in each.
   *
   * Categories whose skills all score zero are dropped, so fewer than
   * `numCategories` entries may come back.
   *
   * @param jobText - Job description
   * @param numCategories - Maximum categories returned
   * @returns Recommendations in selection order
   */
  recommendSkills(
    jobText: string,
    numCategories: number = DEFAULT_NUM_CATEGORIES,
  ): SkillRecommendation[] {
    if (jobText.trim() === "" || numCategories <= 0) {
      return [];
    }

    const skillScores = this.scoreSkills(jobText);
    const categoryScores = this.scoreCategories(skillScores);
    const selected = selectTopCategories(categoryScores, numCategories);

    const recommendations: SkillRecommendation[] = [];
    for (const category of selected) {
      const skills = (this.skillsByCategory.get(category) ?? [])
        .filter((skill) => skillScores.has(skill))
        .sort((a, b) => (skillScores.get(b) ?? 0) - (skillScores.get(a) ?? 0))
        .slice(0, MAX_SKILLS_PER_CATEGORY);
      if (skills.length > 0) {
        recommendations.push({ category, skills });
      }
    }

    logger.debug("Skills recommended", {
      scoredSkills: skillScores.size,
      scoredCategories: categoryScores.size,
      returned: recommendations.length,
    });

    return recommendations;
  }
}
