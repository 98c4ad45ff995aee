/**
 * Usage hints for idea generation, with the domains a query's theme
 * keywords would select.
 */

import { getDefaultCatalog } from '../catalog/catalog.js'
import type { Catalog } from '../catalog/catalog.js'
import { analyzeTheme } from './theme-classifier.js'

export interface IdeaHelp {
  response: string
  suggestions: string[]
  examples: Record<string, string>
  /** Present only when the query contains theme keywords. */
  domains?: string[]
}

const SUGGESTIONS = [
  "Generate ideas: 'Generate 3 ideas for healthcare hackathon'",
  "Refine idea: 'Make this idea more innovative'",
  "Analyze theme: 'What domains work best for AI theme?'",
  "Check feasibility: 'Is this idea feasible in 48 hours?'",
]

const EXAMPLES: Record<string, string> = {
  generate: "await generateIdeas('AI for Good', ['time'], 5)",
  refine: "refineIdea(idea, 'make it simpler')",
  domains: 'getDefaultCatalog().domainIds()',
}

export function ideaHelp(query: string, catalog: Catalog = getDefaultCatalog()): IdeaHelp {
  const help: IdeaHelp = {
    response: `I can help you with idea generation: ${query}`,
    suggestions: [...SUGGESTIONS],
    examples: { ...EXAMPLES },
  }

  const analysis = analyzeTheme(query, catalog)
  if (!analysis.fallback) {
    help.domains = analysis.domains
    help.response += ` Theme keywords (${analysis.matchedKeywords.join(', ')}) point to: ${analysis.domains.join(', ')}.`
  }

  return help
}
