/**
 * Common utilities — Result pattern and the typed error class.
 */

export { Ok, Err, unwrap, isOk, isErr, mapResult, formatIssues } from './result.js'
export type { Result } from './result.js'

export { IdeaForgeError } from './errors.js'
export type { ErrorCode } from './errors.js'
