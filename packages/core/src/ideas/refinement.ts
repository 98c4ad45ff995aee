/**
 * Refinement step — adjusts one idea in response to free-text feedback.
 *
 * Trigger groups are checked independently and may all apply. The result is
 * a new record; the input idea is never modified. No re-ranking happens here.
 */

import { getDefaultCatalog } from '../catalog/catalog.js'
import type { Catalog } from '../catalog/catalog.js'
import { HOURS_PER_DAY } from './synthesizer.js'
import { overallScore } from './scorer.js'
import type { Idea } from './schemas.js'

const SIMPLIFY_TRIGGERS = ['simple', 'complex']
const INNOVATE_TRIGGERS = ['innovative', 'unique']
const TIMELINE_TRIGGERS = ['feasible', 'timeline']

const SIMPLIFIED_FEATURES = 5
const SIMPLIFIED_TECHNOLOGIES = 2
const ADD_ON_COUNT = 2
const TIMELINE_STRETCH = 1.5
const FEASIBILITY_BUMP = 10

function mentions(feedback: string, triggers: readonly string[]): boolean {
  return triggers.some((t) => feedback.includes(t))
}

export function cloneIdea(idea: Idea): Idea {
  return {
    ...idea,
    technologies: [...idea.technologies],
    features: [...idea.features],
    mvpTimeline: { ...idea.mvpTimeline, phases: { ...idea.mvpTimeline.phases } },
    potentialImpact: { ...idea.potentialImpact },
    technicalChallenges: [...idea.technicalChallenges],
    marketPotential: { ...idea.marketPotential, monetization: [...idea.marketPotential.monetization] },
    demoSuggestions: [...idea.demoSuggestions],
  }
}

export function refine(idea: Idea, feedback: string, catalog: Catalog = getDefaultCatalog()): Idea {
  const text = feedback.toLowerCase()
  const refined = cloneIdea(idea)

  if (mentions(text, SIMPLIFY_TRIGGERS)) {
    refined.features = refined.features.slice(0, SIMPLIFIED_FEATURES)
    refined.technologies = refined.technologies.slice(0, SIMPLIFIED_TECHNOLOGIES)
  }

  // Not re-truncated: add-ons may push features past the synthesis cap.
  if (mentions(text, INNOVATE_TRIGGERS)) {
    refined.features.push(...catalog.innovativeAddOns.slice(0, ADD_ON_COUNT))
  }

  if (mentions(text, TIMELINE_TRIGGERS)) {
    refined.mvpTimeline.totalHours *= TIMELINE_STRETCH
    refined.mvpTimeline.daysEstimate = Math.floor(refined.mvpTimeline.totalHours / HOURS_PER_DAY)
  }

  refined.feasibilityScore = Math.min(100, refined.feasibilityScore + FEASIBILITY_BUMP)
  refined.overallScore = overallScore(refined.feasibilityScore, refined.innovationScore)

  return refined
}
