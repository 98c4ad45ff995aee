/**
 * Scorer / ranker: feasibility and innovation sub-scores, the weighted
 * overall score, and a stable descending sort.
 */

import { getDefaultCatalog } from '../catalog/catalog.js'
import type { Catalog } from '../catalog/catalog.js'
import type { Idea } from './schemas.js'

// ── Weights ──

export const FEASIBILITY_WEIGHT = 0.6
export const INNOVATION_WEIGHT = 0.4

const FEASIBILITY_BASE = 50
const TECH_PENALTY_PER_ITEM = 10
const TECH_PENALTY_CAP = 30
const SHORT_BUILD_HOURS = 24
const SHORT_BUILD_BONUS = 20
const MEDIUM_BUILD_HOURS = 48
const MEDIUM_BUILD_BONUS = 10
const TIME_PRESSURE_HOURS = 30
const TIME_PRESSURE_PENALTY = 15

const INNOVATION_BASE = 40
const AI_BONUS = 20
const NOVELTY_BONUS = 15
const SOCIAL_IMPACT_BONUS = 10

function clampScore(value: number): number {
  return Math.max(0, Math.min(100, value))
}

export function scoreFeasibility(
  idea: Pick<Idea, 'technologies' | 'mvpTimeline'>,
  constraints: readonly string[],
): number {
  const hours = idea.mvpTimeline.totalHours
  let score = FEASIBILITY_BASE

  score -= Math.min(TECH_PENALTY_CAP, TECH_PENALTY_PER_ITEM * idea.technologies.length)

  if (hours <= SHORT_BUILD_HOURS) score += SHORT_BUILD_BONUS
  else if (hours <= MEDIUM_BUILD_HOURS) score += MEDIUM_BUILD_BONUS

  if (constraints.includes('time') && hours > TIME_PRESSURE_HOURS) score -= TIME_PRESSURE_PENALTY

  return clampScore(score)
}

/**
 * The AI bonus is a substring test: any technology containing
 * "machine_learning" or "ai" qualifies, so tags such as "maintainable" count.
 */
export function usesAi(technologies: readonly string[]): boolean {
  return technologies.some((tech) => tech.includes('machine_learning') || tech.includes('ai'))
}

export function scoreInnovation(
  idea: Pick<Idea, 'technologies' | 'innovationPattern' | 'potentialImpact'>,
  catalog: Catalog = getDefaultCatalog(),
): number {
  let score = INNOVATION_BASE
  if (usesAi(idea.technologies)) score += AI_BONUS
  if (catalog.isNoveltyPattern(idea.innovationPattern)) score += NOVELTY_BONUS
  if (idea.potentialImpact.socialImpact === 'high') score += SOCIAL_IMPACT_BONUS
  return clampScore(score)
}

export function overallScore(feasibility: number, innovation: number): number {
  return feasibility * FEASIBILITY_WEIGHT + innovation * INNOVATION_WEIGHT
}

export class IdeaScorer {
  constructor(private readonly catalog: Catalog = getDefaultCatalog()) {}

  /** Write all three scores onto `idea` together and return it. */
  score(idea: Idea, constraints: readonly string[]): Idea {
    idea.feasibilityScore = scoreFeasibility(idea, constraints)
    idea.innovationScore = scoreInnovation(idea, this.catalog)
    idea.overallScore = overallScore(idea.feasibilityScore, idea.innovationScore)
    return idea
  }

  /**
   * Score every idea in place, then return them in a new array sorted
   * descending by overall score. Ties keep input order.
   */
  rank(ideas: readonly Idea[], constraints: readonly string[]): Idea[] {
    return ideas
      .map((idea, order) => ({ idea: this.score(idea, constraints), order }))
      .sort((a, b) => b.idea.overallScore - a.idea.overallScore || a.order - b.order)
      .map((entry) => entry.idea)
  }
}

export function rank(ideas: readonly Idea[], constraints: readonly string[]): Idea[] {
  return new IdeaScorer().rank(ideas, constraints)
}
