/**
 * Ideas module — theme classification, seeded synthesis, scoring, ranking
 * and refinement of hackathon project ideas.
 */

export * from './schemas.js'
export { analyzeTheme, classify } from './theme-classifier.js'
export type { ThemeAnalysis } from './theme-classifier.js'
export { SeededRandom, seededRandom, hashString, deriveSeed, pick } from './random.js'
export type { RandomSource, RandomFactory } from './random.js'
export {
  IdeaSynthesizer,
  synthesize,
  composeTitle,
  composeDescription,
  deriveFeatures,
  estimateTimeline,
  assessImpact,
  assessMarketPotential,
  identifyChallenges,
  suggestDemos,
  humanize,
  roundHalfEven,
  titleCase,
  SETUP_HOURS,
  HOURS_PER_DAY,
} from './synthesizer.js'
export type { SynthesizerOptions } from './synthesizer.js'
export {
  IdeaScorer,
  rank,
  scoreFeasibility,
  scoreInnovation,
  overallScore,
  usesAi,
  FEASIBILITY_WEIGHT,
  INNOVATION_WEIGHT,
} from './scorer.js'
export { refine, cloneIdea } from './refinement.js'
export { IdeaEngine, generateIdeas, generateIdeasSync, refineIdea } from './engine.js'
export type { IdeaEngineOptions, GenerateOptions } from './engine.js'
export { ideaHelp } from './help.js'
export type { IdeaHelp } from './help.js'
