export {
  preselectTopBullets,
  bulletLineCost,
  countSelectedLines,
  lineBudgetStatus,
  validateSelection,
  scoreBand,
  selectionStats,
} from "./constraints";
export type { SelectionStats } from "./constraints";
export { buildTemplateFields, deriveTemplatePrefix } from "./templateFields";
