export * from './types.js';
export {
  clearRubricCache,
  findRubricFile,
  listRubrics,
  loadRubric,
  parseRubric,
  type LoadedRubric,
  type RubricListing,
} from './rubric-loader.js';
export { BUNDLED_RUBRICS_DIR, MATCH_RULES, categoryPrefixes, resolveRubric, type ResolveOptions } from './resolver.js';
