/**
 * @ideaforge/core
 *
 * Deterministic hackathon idea engine: theme classification, seeded idea
 * synthesis, feasibility/innovation ranking, refinement, and batch export.
 */

export * from './common/index.js'
export * from './catalog/index.js'
export * from './ideas/index.js'
export * from './reports/index.js'
