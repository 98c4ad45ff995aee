/**
 * Catalog Zod schemas — the shape of the bundled catalog.json and of any
 * alternative catalog file handed to loadCatalogFile().
 */

import { z } from 'zod'

const TagListSchema = z.array(z.string().min(1))

// ── Enums ──

export const ImpactLevelSchema = z.enum(['low', 'medium', 'high'])
export type ImpactLevel = z.infer<typeof ImpactLevelSchema>

// ── Records ──

export const DomainDataSchema = z.object({
  problems: TagListSchema.min(1),
  audiences: TagListSchema.min(1),
  constraints: TagListSchema,
}).strict()

export const TechCategoryDataSchema = z.object({
  technologies: TagListSchema.min(1),
  applications: TagListSchema.min(1),
}).strict()

export const IdeaTemplateDataSchema = z.object({
  pattern: z.string().min(1),
  examples: z.array(z.string()),
}).strict()

export const DomainImpactSchema = z.object({
  social: ImpactLevelSchema,
  economic: ImpactLevelSchema,
  technical: ImpactLevelSchema,
}).strict()

export type DomainImpact = z.infer<typeof DomainImpactSchema>

export const DomainMarketSchema = z.object({
  marketSize: z.string().min(1),
  competition: z.string().min(1),
  growthPotential: z.string().min(1),
}).strict()

export type DomainMarket = z.infer<typeof DomainMarketSchema>

// ── Catalog file ──

export const CatalogDataSchema = z.object({
  version: z.string().min(1),
  domains: z.record(DomainDataSchema).refine((d) => Object.keys(d).length > 0, 'At least one domain is required'),
  techCategories: z.record(TechCategoryDataSchema).refine((c) => Object.keys(c).length > 0, 'At least one tech category is required'),
  innovationPatterns: TagListSchema.min(1),
  noveltyPatterns: TagListSchema,
  ideaTemplates: z.record(IdeaTemplateDataSchema).refine((t) => Object.keys(t).length > 0, 'At least one idea template is required'),
  titlePatterns: z.array(z.string().min(1)).min(1),
  themeKeywords: z.record(TagListSchema),
  features: z.object({
    baseline: z.array(z.string()),
    byProblem: z.record(z.array(z.string())),
    byTechnology: z.record(z.array(z.string())),
    byInnovation: z.record(z.array(z.string())),
    innovativeAddOns: z.array(z.string()),
  }).strict(),
  techHours: z.record(z.number().nonnegative()),
  impact: z.record(DomainImpactSchema),
  highScalabilityDomains: TagListSchema,
  market: z.record(DomainMarketSchema),
  monetization: z.array(z.string()),
  challenges: z.object({
    byTechnology: z.record(z.array(z.string())),
    byConstraint: z.record(z.string()),
  }).strict(),
  demos: z.object({
    generic: z.array(z.string()),
    byProblem: z.record(z.array(z.string())),
  }).strict(),
}).strict()

export type CatalogData = z.infer<typeof CatalogDataSchema>
