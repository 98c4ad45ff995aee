/**
 * Candidate synthesizer: (theme, domains, constraints, index) → Idea.
 *
 * Picks a domain, problem, audience, tech category, innovation pattern,
 * template and title pattern from the catalog with a per-call seeded
 * generator, then derives features, timeline, impact, market, challenges and
 * demo suggestions from fixed tables.
 *
 * Fully deterministic: the same (theme, domains, constraints, index) always
 * yields the same record. Picks happen in a fixed order because each one
 * advances the generator.
 */

import { getDefaultCatalog } from '../catalog/catalog.js'
import type { Catalog } from '../catalog/catalog.js'
import { deriveSeed, pick, seededRandom } from './random.js'
import type { RandomFactory } from './random.js'
import {
  MAX_CHALLENGES,
  MAX_DEMO_SUGGESTIONS,
  MAX_FEATURES,
  MAX_TECHNOLOGIES,
} from './schemas.js'
import type { Idea, MarketPotential, MvpTimeline, PotentialImpact } from './schemas.js'

// ── Constants ──

export const SETUP_HOURS = 10
export const HOURS_PER_DAY = 8

const MAX_PROBLEM_FEATURES = 3
const FEATURE_TECH_COUNT = 2
const MAX_FEATURES_PER_TECH = 2
const MAX_CHALLENGES_PER_TECH = 2
const MAX_PROBLEM_DEMOS = 2
const DESCRIPTION_TECH_COUNT = 2

/** Share of total hours per build phase, in percent. */
const PHASE_SHARES = {
  backend: 40,
  frontend: 30,
  integration: 20,
  testing: 10,
} as const

// ── Text helpers ──

export function humanize(tag: string): string {
  return tag.replace(/_/g, ' ')
}

export function titleCase(tag: string): string {
  return humanize(tag)
    .toLowerCase()
    .replace(/\b[a-z]/g, (c) => c.toUpperCase())
}

export function composeTitle(pattern: string, problem: string, innovation: string): string {
  return pattern
    .replace(/\{problem\}/g, titleCase(problem))
    .replace(/\{innovation\}/g, titleCase(innovation))
}

export function composeDescription(parts: {
  problem: string
  audience: string
  application: string
  technologies: readonly string[]
  innovation: string
  theme: string
}): string {
  // Audience, application and technologies stay as raw catalog tags.
  const techList = parts.technologies.slice(0, DESCRIPTION_TECH_COUNT).join(', ')

  let description =
    `A cutting-edge solution that addresses ${humanize(parts.problem)} for ${parts.audience} ` +
    `through ${parts.application}. ` +
    `The platform leverages ${techList} and incorporates ${humanize(parts.innovation)} ` +
    'to create an engaging user experience.'

  if (parts.theme) {
    description +=
      ` Specifically designed for the ${parts.theme} challenge, ` +
      'this solution aims to make a significant impact in the target domain.'
  }

  return description
}

// ── Derived fields ──

/** Baseline, then problem, then technology, then innovation features; capped at MAX_FEATURES. */
export function deriveFeatures(
  catalog: Catalog,
  problem: string,
  technologies: readonly string[],
  innovation: string,
): string[] {
  const features = [...catalog.baselineFeatures]
  features.push(...catalog.problemFeatures(problem).slice(0, MAX_PROBLEM_FEATURES))
  for (const tech of technologies.slice(0, FEATURE_TECH_COUNT)) {
    features.push(...catalog.techFeatures(tech).slice(0, MAX_FEATURES_PER_TECH))
  }
  features.push(...catalog.innovationFeatures(innovation))
  return features.slice(0, MAX_FEATURES)
}

/** Nearest integer; exact halves go to the even neighbour (4.5 → 4, 13.5 → 14). */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value)
  const fraction = value - floor
  if (fraction > 0.5) return floor + 1
  if (fraction < 0.5) return floor
  return floor % 2 === 0 ? floor : floor + 1
}

function phaseHours(totalHours: number, share: number): string {
  return `${roundHalfEven((totalHours * share) / 100)} hours`
}

export function estimateTimeline(catalog: Catalog, technologies: readonly string[]): MvpTimeline {
  const totalHours = technologies.reduce((sum, tech) => sum + catalog.techHours(tech), 0) + SETUP_HOURS

  return {
    totalHours,
    daysEstimate: Math.floor(totalHours / HOURS_PER_DAY),
    phases: {
      setup: '4 hours',
      backend: phaseHours(totalHours, PHASE_SHARES.backend),
      frontend: phaseHours(totalHours, PHASE_SHARES.frontend),
      integration: phaseHours(totalHours, PHASE_SHARES.integration),
      testing: phaseHours(totalHours, PHASE_SHARES.testing),
    },
  }
}

export function assessImpact(catalog: Catalog, domainId: string, audience: string): PotentialImpact {
  const impact = catalog.impactFor(domainId)
  return {
    socialImpact: impact.social,
    economicImpact: impact.economic,
    technicalImpact: impact.technical,
    targetUsers: `1000+ ${audience}`,
    scalability: catalog.scalabilityFor(domainId),
  }
}

export function assessMarketPotential(catalog: Catalog, domainId: string): MarketPotential {
  const market = catalog.marketFor(domainId)
  return {
    marketSize: market.marketSize,
    competition: market.competition,
    monetization: [...market.monetization],
    growthPotential: market.growthPotential,
  }
}

export function identifyChallenges(
  catalog: Catalog,
  technologies: readonly string[],
  constraints: readonly string[],
): string[] {
  const challenges: string[] = []
  for (const tech of technologies) {
    challenges.push(...catalog.techChallenges(tech).slice(0, MAX_CHALLENGES_PER_TECH))
  }
  for (const [constraint, challenge] of catalog.constraintChallenges()) {
    if (constraints.includes(constraint)) challenges.push(challenge)
  }
  return challenges.slice(0, MAX_CHALLENGES)
}

export function suggestDemos(catalog: Catalog, problem: string): string[] {
  return [
    ...catalog.genericDemos,
    ...catalog.problemDemos(problem).slice(0, MAX_PROBLEM_DEMOS),
  ].slice(0, MAX_DEMO_SUGGESTIONS)
}

// ── Synthesizer ──

export interface SynthesizerOptions {
  /** Generator factory; defaults to the seeded mulberry32 source. */
  random?: RandomFactory
}

export class IdeaSynthesizer {
  private readonly random: RandomFactory

  constructor(
    private readonly catalog: Catalog = getDefaultCatalog(),
    options: SynthesizerOptions = {},
  ) {
    this.random = options.random ?? seededRandom
  }

  /**
   * Build one unscored idea. Unknown ids in `domains` are ignored; when none
   * are left the whole catalog is eligible. Domains are drawn in catalog
   * order, so the iteration order of `domains` does not affect the result.
   */
  synthesize(theme: string, domains: Iterable<string>, constraints: readonly string[], index: number): Idea {
    const catalog = this.catalog
    const rng = this.random(deriveSeed(theme, index))

    const requested = new Set(domains)
    const eligible = catalog.domainIds().filter((id) => requested.has(id))
    const pool = eligible.length > 0 ? eligible : catalog.domainIds()

    const domain = catalog.domain(pick(rng, pool))
    const problem = pick(rng, domain.problems)
    const audience = pick(rng, domain.audiences)

    const techCategory = pick(rng, [...catalog.techCategories().values()])
    const technologies = techCategory.technologies.slice(0, MAX_TECHNOLOGIES)

    const innovation = pick(rng, catalog.innovationPatterns())
    const templateType = pick(rng, [...catalog.ideaTemplates().keys()])
    const titlePattern = pick(rng, catalog.titlePatterns)
    const application = pick(rng, techCategory.applications)

    return {
      title: composeTitle(titlePattern, problem, innovation),
      description: composeDescription({ problem, audience, application, technologies, innovation, theme }),
      domain: domain.id,
      targetAudience: audience,
      problem,
      technologyCategory: techCategory.id,
      technologies,
      innovationPattern: innovation,
      templateType,
      features: deriveFeatures(catalog, problem, technologies, innovation),
      mvpTimeline: estimateTimeline(catalog, technologies),
      potentialImpact: assessImpact(catalog, domain.id, audience),
      technicalChallenges: identifyChallenges(catalog, technologies, constraints),
      marketPotential: assessMarketPotential(catalog, domain.id),
      demoSuggestions: suggestDemos(catalog, problem),
      feasibilityScore: 0,
      innovationScore: 0,
      overallScore: 0,
    }
  }
}

/** Synthesize with the default catalog and generator. */
export function synthesize(theme: string, domains: Iterable<string>, constraints: readonly string[], index: number): Idea {
  return new IdeaSynthesizer().synthesize(theme, domains, constraints, index)
}
