export * from './types.js';
export * from './merge.js';
export * from './extract.js';
export { structuredDataStrategy } from './strategies/structured-data.js';
export {
  BUILT_IN_SITE_PROFILES,
  SiteProfileSchema,
  createSiteProfileStrategy,
  findSiteProfile,
  siteProfileStrategy,
  type SiteProfile
} from './strategies/site-profile.js';
export { genericHeuristicStrategy, stripSiteSuffix } from './strategies/generic-heuristic.js';
