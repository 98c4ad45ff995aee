/**
 * Reports module — idea batches and their flat-file exports.
 */

export { IdeaBatchSchema, createIdeaBatch } from './batch.js'
export type { IdeaBatch } from './batch.js'
export { renderIdeasMarkdown } from './markdown.js'
export { exportIdeas, readIdeaBatch, serializeBatch } from './writer.js'
export type { ExportFormat, ExportResult } from './writer.js'
