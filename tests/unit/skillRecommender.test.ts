/**
 * Unit tests for SkillRecommender and category diversity
 *
 * No network, no side effects
 */

import { describe, it, expect } from "vitest";
import { SkillRecommender, classifyCategory, selectTopCategories } from "@/recommend";
import type { SkillTaxonomy } from "@/types";

const taxonomy: SkillTaxonomy = {
  Python: ["Programming Languages"],
  JavaScript: ["Programming Languages", "Frontend Frameworks"],
  React: ["Frontend Frameworks"],
  AWS: ["Cloud Platforms"],
  Docker: ["Cloud Platforms", "DevOps Tools"],
  Kubernetes: ["Cloud Platforms"],
  Terraform: ["DevOps Tools"],
  PostgreSQL: ["Databases"],
  Excel: ["Office Software"],
  Orphan: [],
};

const JOB_TEXT =
  "We need a Python engineer with React, AWS, Docker and Kubernetes. PostgreSQL is a plus.";

describe("classifyCategory", () => {
  it("should classify by the first matching rule", () => {
    expect(classifyCategory("Programming Languages")).toBe("programming");
    expect(classifyCategory("Frontend Frameworks")).toBe("programming");
    expect(classifyCategory("Cloud Platforms")).toBe("infrastructure");
    expect(classifyCategory("Data Engineering")).toBe("data");
    expect(classifyCategory("Developer Tools")).toBe("tools");
    expect(classifyCategory("Soft Skills")).toBe("other");
  });
});

describe("selectTopCategories", () => {
  it("should prefer a new category type over a higher-scoring repeat", () => {
    const scores = new Map([
      ["Languages", 10],
      ["Frameworks", 9],
      ["Framework Libraries", 8],
      ["Cloud", 1],
    ]);
    expect(selectTopCategories(scores, 3)).toEqual(["Languages", "Frameworks", "Cloud"]);
  });

  it("should fill remaining slots by score", () => {
    const scores = new Map([
      ["Languages", 10],
      ["Frameworks", 9],
      ["Framework Libraries", 8],
    ]);
    expect(selectTopCategories(scores, 3)).toEqual([
      "Languages",
      "Frameworks",
      "Framework Libraries",
    ]);
  });

  it("should break score ties by insertion order and still skip repeated types", () => {
    const scores = new Map([
      ["Languages", 5],
      ["Frameworks", 5],
      ["Language Tools", 5],
      ["Cloud", 5],
      ["DevOps", 5],
      ["Analytics", 5],
    ]);

    // first two taken regardless of type, then one per new type
    expect(selectTopCategories(scores, 4)).toEqual([
      "Languages",
      "Frameworks",
      "Cloud",
      "Analytics",
    ]);
    expect(selectTopCategories(scores, 5)).toEqual([
      "Languages",
      "Frameworks",
      "Cloud",
      "Analytics",
      "Language Tools",
    ]);
  });

  it("should return nothing for a zero count", () => {
    expect(selectTopCategories(new Map([["Cloud", 1]]), 0)).toEqual([]);
  });
});

describe("SkillRecommender", () => {
  it("should ignore changes to the taxonomy made after construction", () => {
    const own: SkillTaxonomy = { Python: ["Languages"] };
    const recommender = new SkillRecommender(own);
    own.Kubernetes = ["Cloud"];
    own.Python.push("Backend");

    const skillScores = recommender.scoreSkills("Python and Kubernetes");
    expect(skillScores).toEqual(new Map([["Python", 16]]));
    expect(recommender.scoreCategories(skillScores)).toEqual(new Map([["Languages", 16]]));
  });

  it("should leave skills without categories out of the reverse index", () => {
    expect(new SkillRecommender(taxonomy).categories).toEqual([
      "Programming Languages",
      "Frontend Frameworks",
      "Cloud Platforms",
      "DevOps Tools",
      "Databases",
      "Office Software",
    ]);
  });

  it("should score skills and aggregate them per category", () => {
    const recommender = new SkillRecommender(taxonomy);
    const skillScores = recommender.scoreSkills(JOB_TEXT);

    expect([...skillScores]).toEqual([
      ["Python", 16],
      ["JavaScript", 0.5],
      ["React", 16],
      ["AWS", 16],
      ["Docker", 16],
      ["Kubernetes", 16],
      ["PostgreSQL", 16.5],
    ]);
    expect(recommender.scoreCategories(skillScores).get("Cloud Platforms")).toBe(48);
  });

  it("should select diverse categories with their best skills", () => {
    const recommender = new SkillRecommender(taxonomy);

    expect(recommender.recommendSkills(JOB_TEXT)).toEqual([
      { category: "Cloud Platforms", skills: ["AWS", "Docker", "Kubernetes"] },
      { category: "Programming Languages", skills: ["Python", "JavaScript"] },
      { category: "Databases", skills: ["PostgreSQL"] },
      { category: "Frontend Frameworks", skills: ["React", "JavaScript"] },
    ]);
  });

  it("should return at most numCategories entries", () => {
    const recommender = new SkillRecommender(taxonomy);
    expect(recommender.recommendSkills(JOB_TEXT, 2).map((r) => r.category)).toEqual([
      "Cloud Platforms",
      "Programming Languages",
    ]);
  });

  it("should keep at most four skills per category", () => {
    const recommender = new SkillRecommender({
      Go: ["Languages"],
      Rust: ["Languages"],
      Java: ["Languages"],
      Kotlin: ["Languages"],
      Scala: ["Languages"],
    });
    expect(recommender.recommendSkills("Go Rust Java Kotlin Scala")).toEqual([
      { category: "Languages", skills: ["Go", "Rust", "Java", "Kotlin"] },
    ]);
  });

  it("should return empty list when nothing matches", () => {
    const recommender = new SkillRecommender(taxonomy);
    expect(recommender.recommendSkills("Organized community events")).toEqual([]);
    expect(recommender.recommendSkills("   ")).toEqual([]);
  });
});
