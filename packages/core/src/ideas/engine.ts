/**
 * Idea engine — the public entry points.
 *
 * generate: validate → classify theme → `count` independent synthesize calls
 * → rank. Input is validated before any synthesis starts; once a batch runs
 * no single candidate can fail, so callers get either every idea or an error.
 */

import { Ok, Err, formatIssues, mapResult } from '../common/result.js'
import type { Result } from '../common/result.js'
import { IdeaForgeError } from '../common/errors.js'
import { getDefaultCatalog } from '../catalog/catalog.js'
import type { Catalog } from '../catalog/catalog.js'
import { DEFAULT_IDEA_COUNT, GenerateIdeasInputSchema, RefineIdeaInputSchema } from './schemas.js'
import type { GenerateIdeasInput, Idea, RefineIdeaInput } from './schemas.js'
import { analyzeTheme } from './theme-classifier.js'
import type { ThemeAnalysis } from './theme-classifier.js'
import { IdeaSynthesizer } from './synthesizer.js'
import { IdeaScorer } from './scorer.js'
import { refine } from './refinement.js'
import type { RandomFactory } from './random.js'

export interface IdeaEngineOptions {
  catalog?: Catalog
  random?: RandomFactory
  /** Batch summary lines on the console. Default true. */
  log?: boolean
}

export interface GenerateOptions {
  /** Abandons the whole batch; no partial result is returned. */
  signal?: AbortSignal
}

function validateGenerate(theme: unknown, constraints: unknown, count: unknown): Result<GenerateIdeasInput, IdeaForgeError> {
  const parsed = GenerateIdeasInputSchema.safeParse({ theme, constraints, count })
  if (!parsed.success) {
    return Err(IdeaForgeError.validation(`Invalid generate input: ${formatIssues(parsed.error.issues)}`))
  }
  return Ok(parsed.data)
}

function validateRefine(idea: unknown, feedback: unknown): Result<RefineIdeaInput, IdeaForgeError> {
  const parsed = RefineIdeaInputSchema.safeParse({ idea, feedback })
  if (!parsed.success) {
    return Err(IdeaForgeError.validation(`Invalid refine input: ${formatIssues(parsed.error.issues)}`))
  }
  return Ok(parsed.data)
}

export class IdeaEngine {
  readonly catalog: Catalog
  private readonly synthesizer: IdeaSynthesizer
  private readonly scorer: IdeaScorer
  private readonly log: boolean

  constructor(options: IdeaEngineOptions = {}) {
    this.catalog = options.catalog ?? getDefaultCatalog()
    this.synthesizer = new IdeaSynthesizer(this.catalog, { random: options.random })
    this.scorer = new IdeaScorer(this.catalog)
    this.log = options.log ?? true
  }

  /**
   * Generate and rank `count` ideas. Candidates are synthesized as separate
   * tasks; ordering comes only from the final stable sort.
   */
  async generate(
    theme: string,
    constraints: readonly string[],
    count: number = DEFAULT_IDEA_COUNT,
    options: GenerateOptions = {},
  ): Promise<Result<Idea[], IdeaForgeError>> {
    const input = validateGenerate(theme, constraints, count)
    if (!input.ok) return input

    const { signal } = options
    if (signal?.aborted) return Err(IdeaForgeError.cancelled('Idea generation cancelled before start'))

    const analysis = analyzeTheme(input.value.theme, this.catalog)
    const tasks = Array.from({ length: input.value.count }, (_, index) =>
      this.synthesizeTask(input.value, analysis, index, signal),
    )

    let candidates: Idea[]
    try {
      candidates = await Promise.all(tasks)
    } catch (err) {
      if (err instanceof IdeaForgeError) return Err(err)
      throw err
    }

    return Ok(this.finish(input.value, analysis, candidates))
  }

  /** Same pipeline without yielding to the event loop. */
  generateSync(
    theme: string,
    constraints: readonly string[],
    count: number = DEFAULT_IDEA_COUNT,
  ): Result<Idea[], IdeaForgeError> {
    const input = validateGenerate(theme, constraints, count)
    if (!input.ok) return input

    const analysis = analyzeTheme(input.value.theme, this.catalog)
    const candidates = Array.from({ length: input.value.count }, (_, index) =>
      this.synthesizer.synthesize(input.value.theme, analysis.domains, input.value.constraints, index),
    )
    return Ok(this.finish(input.value, analysis, candidates))
  }

  refine(idea: Idea, feedback: string): Result<Idea, IdeaForgeError> {
    return mapResult(validateRefine(idea, feedback), (input) => refine(input.idea, input.feedback, this.catalog))
  }

  private synthesizeTask(
    input: GenerateIdeasInput,
    analysis: ThemeAnalysis,
    index: number,
    signal: AbortSignal | undefined,
  ): Promise<Idea> {
    return new Promise((resolve, reject) => {
      setImmediate(() => {
        if (signal?.aborted) {
          reject(IdeaForgeError.cancelled(`Idea generation cancelled at candidate ${index + 1} of ${input.count}`))
          return
        }
        resolve(this.synthesizer.synthesize(input.theme, analysis.domains, input.constraints, index))
      })
    })
  }

  private finish(input: GenerateIdeasInput, analysis: ThemeAnalysis, candidates: Idea[]): Idea[] {
    const ranked = this.scorer.rank(candidates, input.constraints)
    if (this.log) {
      const scope = analysis.fallback ? 'all domains (no theme keyword matched)' : analysis.domains.join(', ')
      console.log(
        `[idea-engine] ranked ${ranked.length} idea(s) for theme "${input.theme}" across ${scope}; ` +
          `top score ${ranked[0]?.overallScore.toFixed(1) ?? 'n/a'}`,
      )
    }
    return ranked
  }
}

// ── Default engine ──

let defaultEngine: IdeaEngine | null = null

function getDefaultEngine(): IdeaEngine {
  if (!defaultEngine) defaultEngine = new IdeaEngine()
  return defaultEngine
}

export function generateIdeas(
  theme: string,
  constraints: readonly string[],
  count: number = DEFAULT_IDEA_COUNT,
  options?: GenerateOptions,
): Promise<Result<Idea[], IdeaForgeError>> {
  return getDefaultEngine().generate(theme, constraints, count, options)
}

export function generateIdeasSync(
  theme: string,
  constraints: readonly string[],
  count: number = DEFAULT_IDEA_COUNT,
): Result<Idea[], IdeaForgeError> {
  return getDefaultEngine().generateSync(theme, constraints, count)
}

export function refineIdea(idea: Idea, feedback: string): Result<Idea, IdeaForgeError> {
  return getDefaultEngine().refine(idea, feedback)
}
