export { BulletRecommender, priorityBoost } from "./bulletRecommender";
export type { BulletRecommenderCapabilities } from "./bulletRecommender";
export { SkillRecommender } from "./skillRecommender";
export { classifyCategory, selectTopCategories } from "./categoryDiversity";
export { matchPhrases } from "./phraseMatches";
