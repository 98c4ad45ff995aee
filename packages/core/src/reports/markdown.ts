/**
 * Markdown summary of an idea batch: ranking table plus the top idea's details.
 */

import { titleCase } from '../ideas/synthesizer.js'
import type { IdeaBatch } from './batch.js'

function cell(text: string): string {
  return text.replace(/\|/g, '\\|')
}

export function renderIdeasMarkdown(batch: IdeaBatch): string {
  const lines: string[] = []

  lines.push(`# Hackathon ideas: ${batch.theme || 'Open theme'}`)
  lines.push('')
  lines.push(`Generated ${batch.generatedAt} (batch ${batch.id})`)
  lines.push(`Constraints: ${batch.constraints.length > 0 ? batch.constraints.join(', ') : 'none'}`)
  lines.push('')

  if (batch.ideas.length === 0) {
    lines.push('No ideas generated.')
    return lines.join('\n') + '\n'
  }

  lines.push('| # | Title | Score | Domain |')
  lines.push('|---|-------|-------|--------|')
  batch.ideas.forEach((idea, i) => {
    lines.push(`| ${i + 1} | ${cell(idea.title)} | ${idea.overallScore.toFixed(0)}/100 | ${titleCase(idea.domain)} |`)
  })

  const top = batch.ideas[0]
  lines.push('')
  lines.push(`## Top idea: ${top.title}`)
  lines.push('')
  lines.push(top.description)
  lines.push('')
  lines.push(`- **Technologies:** ${top.technologies.join(', ')}`)
  lines.push(`- **Timeline:** ${top.mvpTimeline.totalHours} hours (~${top.mvpTimeline.daysEstimate} days)`)
  lines.push('- **Features:**')
  for (const feature of top.features) {
    lines.push(`  - ${feature}`)
  }

  return lines.join('\n') + '\n'
}
