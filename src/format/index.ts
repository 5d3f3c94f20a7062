export { formatSkillLine, fitSkillLine, parseSkillLine, skillLineStatus } from "./skillLine";
