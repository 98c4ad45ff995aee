/**
 * Flat-file export of idea batches (JSON or Markdown) and JSON read-back.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { Result } from '../common/result.js'
import { Ok, Err, formatIssues } from '../common/result.js'
import { IdeaForgeError } from '../common/errors.js'
import { IdeaBatchSchema } from './batch.js'
import type { IdeaBatch } from './batch.js'
import { renderIdeasMarkdown } from './markdown.js'

export type ExportFormat = 'json' | 'markdown'

export interface ExportResult {
  filePath: string
  bytes: number
}

export function serializeBatch(batch: IdeaBatch, format: ExportFormat): string {
  return format === 'json' ? JSON.stringify(batch, null, 2) + '\n' : renderIdeasMarkdown(batch)
}

export async function exportIdeas(
  batch: IdeaBatch,
  filePath: string,
  format: ExportFormat,
): Promise<Result<ExportResult, IdeaForgeError>> {
  const content = serializeBatch(batch, format)

  try {
    await mkdir(dirname(filePath), { recursive: true })
    await writeFile(filePath, content, 'utf8')
  } catch (err) {
    return Err(IdeaForgeError.io(`Cannot write ${filePath}: ${err instanceof Error ? err.message : String(err)}`))
  }

  const bytes = Buffer.byteLength(content, 'utf8')
  console.log(`[idea-export] wrote ${batch.ideas.length} idea(s) to ${filePath} (${format}, ${bytes} bytes)`)
  return Ok({ filePath, bytes })
}

export async function readIdeaBatch(filePath: string): Promise<Result<IdeaBatch, IdeaForgeError>> {
  let text: string
  try {
    text = await readFile(filePath, 'utf8')
  } catch (err) {
    return Err(IdeaForgeError.io(`Cannot read ${filePath}: ${err instanceof Error ? err.message : String(err)}`))
  }

  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    return Err(IdeaForgeError.parse(`${filePath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`))
  }

  const parsed = IdeaBatchSchema.safeParse(raw)
  if (!parsed.success) {
    return Err(IdeaForgeError.validation(`Invalid idea batch: ${formatIssues(parsed.error.issues)}`))
  }
  return Ok(parsed.data)
}
