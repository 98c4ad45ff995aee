import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { createCatalog } from '../src/catalog/catalog.js'
import type { Catalog } from '../src/catalog/catalog.js'
import { unwrap } from '../src/common/result.js'
import type { RandomFactory } from '../src/ideas/random.js'
import type { Idea } from '../src/ideas/schemas.js'

export const MINI_CATALOG_PATH = fileURLToPath(new URL('./fixtures/mini-catalog.json', import.meta.url))

export function miniCatalogData(): unknown {
  return JSON.parse(readFileSync(MINI_CATALOG_PATH, 'utf8'))
}

export function miniCatalog(): Catalog {
  return unwrap(createCatalog(miniCatalogData()))
}

/** Every pick lands on the first entry. */
export const firstPick: RandomFactory = () => ({ next: () => 0 })

/** Every pick lands on the last entry. */
export const lastPick: RandomFactory = () => ({ next: () => 0.999999 })

export function makeIdea(overrides: Partial<Idea> = {}): Idea {
  return {
    title: 'Test Idea',
    description: 'A test idea.',
    domain: 'healthcare',
    targetAudience: 'patients',
    problem: 'medication adherence',
    technologyCategory: 'ai_powered',
    technologies: ['machine_learning', 'nlp', 'computer_vision'],
    innovationPattern: 'gamification',
    templateType: 'problem_solution',
    features: ['F1', 'F2', 'F3', 'F4', 'F5', 'F6', 'F7', 'F8'],
    mvpTimeline: {
      totalHours: 45,
      daysEstimate: 5,
      phases: { setup: '4 hours', backend: '18 hours', frontend: '14 hours', integration: '9 hours', testing: '4 hours' },
    },
    potentialImpact: {
      socialImpact: 'high',
      economicImpact: 'high',
      technicalImpact: 'medium',
      targetUsers: '1000+ patients',
      scalability: 'medium',
    },
    technicalChallenges: ['C1'],
    marketPotential: {
      marketSize: 'Large',
      competition: 'Moderate',
      monetization: ['Freemium'],
      growthPotential: 'Medium',
    },
    demoSuggestions: ['D1'],
    feasibilityScore: 30,
    innovationScore: 70,
    overallScore: 46,
    ...overrides,
  }
}
