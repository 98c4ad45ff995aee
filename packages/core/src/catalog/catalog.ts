/**
 * Domain catalog — the static reference data idea synthesis draws from.
 *
 * A Catalog is immutable once built and safe to share between concurrent
 * synthesis calls. Every lookup is total: a key the catalog does not know
 * resolves to the documented default (DEFAULT_IMPACT, DEFAULT_MARKET,
 * DEFAULT_TECH_HOURS, an empty list) instead of throwing.
 */

import { readFileSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import type { Result } from '../common/result.js'
import { Ok, Err, unwrap, formatIssues } from '../common/result.js'
import { IdeaForgeError } from '../common/errors.js'
import { CatalogDataSchema } from './schemas.js'
import type { CatalogData, DomainImpact, DomainMarket } from './schemas.js'

// ── Types ──

export interface Domain {
  id: string
  problems: readonly string[]
  audiences: readonly string[]
  constraints: readonly string[]
}

export interface TechCategory {
  id: string
  technologies: readonly string[]
  applications: readonly string[]
}

export interface IdeaTemplate {
  id: string
  pattern: string
  examples: readonly string[]
}

export interface MarketProfile extends DomainMarket {
  monetization: readonly string[]
}

export type Scalability = 'high' | 'medium'

// ── Defaults ──

export const DEFAULT_TECH_HOURS = 8

export const DEFAULT_IMPACT: Readonly<DomainImpact> = Object.freeze({
  social: 'medium',
  economic: 'medium',
  technical: 'medium',
})

export const DEFAULT_MARKET: Readonly<DomainMarket> = Object.freeze({
  marketSize: 'Medium',
  competition: 'Low',
  growthPotential: 'Medium',
})

const NONE: readonly string[] = Object.freeze([])

function mapRecord<V, W>(record: Record<string, V>, fn: (key: string, value: V) => W): ReadonlyMap<string, W> {
  const map = new Map<string, W>()
  for (const [key, value] of Object.entries(record)) {
    map.set(key, fn(key, value))
  }
  return map
}

function freezeList(list: readonly string[]): readonly string[] {
  return Object.freeze([...list])
}

function freezeTable(record: Record<string, string[]>): ReadonlyMap<string, readonly string[]> {
  return mapRecord(record, (_, list) => freezeList(list))
}

// ── Catalog ──

export class Catalog {
  readonly version: string
  readonly titlePatterns: readonly string[]
  readonly baselineFeatures: readonly string[]
  readonly genericDemos: readonly string[]
  readonly innovativeAddOns: readonly string[]
  readonly themeKeywords: ReadonlyMap<string, readonly string[]>

  private readonly domainMap: ReadonlyMap<string, Domain>
  private readonly techCategoryMap: ReadonlyMap<string, TechCategory>
  private readonly templateMap: ReadonlyMap<string, IdeaTemplate>
  private readonly patterns: readonly string[]
  private readonly novelty: ReadonlySet<string>
  private readonly problemFeatureTable: ReadonlyMap<string, readonly string[]>
  private readonly techFeatureTable: ReadonlyMap<string, readonly string[]>
  private readonly innovationFeatureTable: ReadonlyMap<string, readonly string[]>
  private readonly techHourTable: ReadonlyMap<string, number>
  private readonly impactTable: ReadonlyMap<string, DomainImpact>
  private readonly marketTable: ReadonlyMap<string, DomainMarket>
  private readonly highScalability: ReadonlySet<string>
  private readonly monetization: readonly string[]
  private readonly techChallengeTable: ReadonlyMap<string, readonly string[]>
  private readonly constraintChallengeList: ReadonlyArray<readonly [string, string]>
  private readonly problemDemoTable: ReadonlyMap<string, readonly string[]>

  /** Build from data that has already passed CatalogDataSchema. Use createCatalog() for raw input. */
  constructor(data: CatalogData) {
    this.version = data.version

    this.domainMap = mapRecord(data.domains, (id, d): Domain => Object.freeze({
      id,
      problems: freezeList(d.problems),
      audiences: freezeList(d.audiences),
      constraints: freezeList(d.constraints),
    }))
    this.techCategoryMap = mapRecord(data.techCategories, (id, c): TechCategory => Object.freeze({
      id,
      technologies: freezeList(c.technologies),
      applications: freezeList(c.applications),
    }))
    this.templateMap = mapRecord(data.ideaTemplates, (id, t): IdeaTemplate => Object.freeze({
      id,
      pattern: t.pattern,
      examples: freezeList(t.examples),
    }))

    this.patterns = freezeList(data.innovationPatterns)
    this.novelty = new Set(data.noveltyPatterns)
    this.titlePatterns = freezeList(data.titlePatterns)
    this.themeKeywords = freezeTable(data.themeKeywords)

    this.baselineFeatures = freezeList(data.features.baseline)
    this.innovativeAddOns = freezeList(data.features.innovativeAddOns)
    this.problemFeatureTable = freezeTable(data.features.byProblem)
    this.techFeatureTable = freezeTable(data.features.byTechnology)
    this.innovationFeatureTable = freezeTable(data.features.byInnovation)

    this.techHourTable = mapRecord(data.techHours, (_, hours) => hours)
    this.impactTable = mapRecord(data.impact, (_, impact): DomainImpact => Object.freeze({ ...impact }))
    this.marketTable = mapRecord(data.market, (_, market): DomainMarket => Object.freeze({ ...market }))
    this.highScalability = new Set(data.highScalabilityDomains)
    this.monetization = freezeList(data.monetization)

    this.techChallengeTable = freezeTable(data.challenges.byTechnology)
    this.constraintChallengeList = Object.freeze(
      Object.entries(data.challenges.byConstraint).map(([constraint, text]): readonly [string, string] => [constraint, text]),
    )

    this.genericDemos = freezeList(data.demos.generic)
    this.problemDemoTable = freezeTable(data.demos.byProblem)

    Object.freeze(this)
  }

  // ── Read-only views ──

  domains(): ReadonlyMap<string, Domain> {
    return this.domainMap
  }

  domainIds(): string[] {
    return [...this.domainMap.keys()]
  }

  /**
   * Resolve a domain id. An id outside the catalog is a caller bug, so it is
   * logged and resolved to the first catalog domain.
   */
  domain(id: string): Domain {
    const found = this.domainMap.get(id)
    if (found) return found
    const [fallback] = this.domainMap.values()
    console.warn(`[catalog] unknown domain '${id}', using '${fallback.id}'`)
    return fallback
  }

  techCategories(): ReadonlyMap<string, TechCategory> {
    return this.techCategoryMap
  }

  innovationPatterns(): readonly string[] {
    return this.patterns
  }

  ideaTemplates(): ReadonlyMap<string, IdeaTemplate> {
    return this.templateMap
  }

  // ── Total lookups ──

  isNoveltyPattern(pattern: string): boolean {
    return this.novelty.has(pattern)
  }

  techHours(technology: string): number {
    return this.techHourTable.get(technology) ?? DEFAULT_TECH_HOURS
  }

  problemFeatures(problem: string): readonly string[] {
    return this.problemFeatureTable.get(problem) ?? NONE
  }

  techFeatures(technology: string): readonly string[] {
    return this.techFeatureTable.get(technology) ?? NONE
  }

  innovationFeatures(pattern: string): readonly string[] {
    return this.innovationFeatureTable.get(pattern) ?? NONE
  }

  impactFor(domainId: string): DomainImpact {
    return this.impactTable.get(domainId) ?? DEFAULT_IMPACT
  }

  scalabilityFor(domainId: string): Scalability {
    return this.highScalability.has(domainId) ? 'high' : 'medium'
  }

  marketFor(domainId: string): MarketProfile {
    const market = this.marketTable.get(domainId) ?? DEFAULT_MARKET
    return { ...market, monetization: this.monetization }
  }

  techChallenges(technology: string): readonly string[] {
    return this.techChallengeTable.get(technology) ?? NONE
  }

  /** Constraint tag → challenge text, in catalog order. */
  constraintChallenges(): ReadonlyArray<readonly [string, string]> {
    return this.constraintChallengeList
  }

  problemDemos(problem: string): readonly string[] {
    return this.problemDemoTable.get(problem) ?? NONE
  }
}

// ── Construction / loading ──

export function createCatalog(raw: unknown): Result<Catalog, IdeaForgeError> {
  const parsed = CatalogDataSchema.safeParse(raw)
  if (!parsed.success) {
    return Err(IdeaForgeError.validation(`Invalid catalog: ${formatIssues(parsed.error.issues)}`))
  }
  return Ok(new Catalog(parsed.data))
}

export async function loadCatalogFile(filePath: string): Promise<Result<Catalog, IdeaForgeError>> {
  let text: string
  try {
    text = await readFile(filePath, 'utf8')
  } catch (err) {
    return Err(IdeaForgeError.io(`Cannot read catalog ${filePath}: ${err instanceof Error ? err.message : String(err)}`))
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    return Err(IdeaForgeError.parse(`Catalog ${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`))
  }

  return createCatalog(raw)
}

const BUNDLED_CATALOG = new URL('../../data/catalog.json', import.meta.url)

let defaultCatalog: Catalog | null = null

/** Process-wide catalog built from the bundled data/catalog.json on first use. */
export function getDefaultCatalog(): Catalog {
  if (!defaultCatalog) {
    const raw: unknown = JSON.parse(readFileSync(BUNDLED_CATALOG, 'utf8'))
    defaultCatalog = unwrap(createCatalog(raw))
  }
  return defaultCatalog
}
