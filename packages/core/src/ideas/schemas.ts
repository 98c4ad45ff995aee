/**
 * Idea Zod schemas — the idea record downstream tools consume, entry-point
 * inputs, and the fixed limits that synthesis and scoring honor.
 */

import { z } from 'zod'
import { ImpactLevelSchema } from '../catalog/schemas.js'

// ── Limits ──

export const MAX_TECHNOLOGIES = 3
export const MAX_FEATURES = 8
export const MAX_CHALLENGES = 5
export const MAX_DEMO_SUGGESTIONS = 6

export const DEFAULT_IDEA_COUNT = 5

// ── Sub-records ──

export const MvpPhasesSchema = z.object({
  setup: z.string(),
  backend: z.string(),
  frontend: z.string(),
  integration: z.string(),
  testing: z.string(),
})

export type MvpPhases = z.infer<typeof MvpPhasesSchema>

export const MvpTimelineSchema = z.object({
  totalHours: z.number().nonnegative(),
  daysEstimate: z.number().int().nonnegative(),
  phases: MvpPhasesSchema,
})

export type MvpTimeline = z.infer<typeof MvpTimelineSchema>

export const PotentialImpactSchema = z.object({
  socialImpact: ImpactLevelSchema,
  economicImpact: ImpactLevelSchema,
  technicalImpact: ImpactLevelSchema,
  targetUsers: z.string(),
  scalability: z.string(),
})

export type PotentialImpact = z.infer<typeof PotentialImpactSchema>

export const MarketPotentialSchema = z.object({
  marketSize: z.string(),
  competition: z.string(),
  monetization: z.array(z.string()),
  growthPotential: z.string(),
})

export type MarketPotential = z.infer<typeof MarketPotentialSchema>

// ── Idea ──

const ScoreSchema = z.number().min(0).max(100)

/**
 * Features are not capped here: refinement may append add-ons past
 * MAX_FEATURES. The other lists keep their synthesis limits.
 */
export const IdeaSchema = z.object({
  title: z.string().min(1),
  description: z.string(),
  domain: z.string().min(1),
  targetAudience: z.string(),
  problem: z.string(),
  technologyCategory: z.string(),
  technologies: z.array(z.string()).max(MAX_TECHNOLOGIES),
  innovationPattern: z.string(),
  templateType: z.string(),
  features: z.array(z.string()),
  mvpTimeline: MvpTimelineSchema,
  potentialImpact: PotentialImpactSchema,
  technicalChallenges: z.array(z.string()).max(MAX_CHALLENGES),
  marketPotential: MarketPotentialSchema,
  demoSuggestions: z.array(z.string()).max(MAX_DEMO_SUGGESTIONS),
  feasibilityScore: ScoreSchema,
  innovationScore: ScoreSchema,
  overallScore: ScoreSchema,
})

export type Idea = z.infer<typeof IdeaSchema>

// ── Input schemas ──

export const GenerateIdeasInputSchema = z.object({
  theme: z.string(),
  constraints: z.array(z.string()),
  count: z.number().int().positive(),
}).strict()

export type GenerateIdeasInput = z.infer<typeof GenerateIdeasInputSchema>

export const RefineIdeaInputSchema = z.object({
  idea: IdeaSchema,
  feedback: z.string(),
}).strict()

export type RefineIdeaInput = z.infer<typeof RefineIdeaInputSchema>
