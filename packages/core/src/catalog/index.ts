/**
 * Catalog module — immutable reference data for idea synthesis.
 */

export * from './schemas.js'
export {
  Catalog,
  createCatalog,
  loadCatalogFile,
  getDefaultCatalog,
  DEFAULT_IMPACT,
  DEFAULT_MARKET,
  DEFAULT_TECH_HOURS,
} from './catalog.js'
export type { Domain, TechCategory, IdeaTemplate, MarketProfile, Scalability } from './catalog.js'
