/**
 * Theme classifier — maps a free-text theme onto catalog domains by keyword
 * substring match. Total: an empty or unmatched theme yields every domain.
 */

import { getDefaultCatalog } from '../catalog/catalog.js'
import type { Catalog } from '../catalog/catalog.js'

export interface ThemeAnalysis {
  /** Matched domain ids in catalog order. */
  domains: string[]
  matchedKeywords: string[]
  /** True when nothing matched and the full catalog was returned. */
  fallback: boolean
}

export function analyzeTheme(theme: string, catalog: Catalog = getDefaultCatalog()): ThemeAnalysis {
  const lower = theme.toLowerCase()
  const matchedKeywords: string[] = []
  const matched = new Set<string>()

  for (const [keyword, domainIds] of catalog.themeKeywords) {
    if (!lower.includes(keyword)) continue
    matchedKeywords.push(keyword)
    for (const id of domainIds) matched.add(id)
  }

  const domains = catalog.domainIds().filter((id) => matched.has(id))
  if (domains.length === 0) {
    return { domains: catalog.domainIds(), matchedKeywords, fallback: true }
  }
  return { domains, matchedKeywords, fallback: false }
}

export function classify(theme: string, catalog: Catalog = getDefaultCatalog()): Set<string> {
  return new Set(analyzeTheme(theme, catalog).domains)
}
