export {
  loadProfile,
  compileProfile,
  groupBulletsByRole,
  buildTaxonomy,
  splitCommaList,
  parseLineCount,
} from "./loader";
