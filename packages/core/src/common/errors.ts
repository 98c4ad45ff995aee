/**
 * Typed error class for IdeaForge operations.
 */

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'PARSE_ERROR'
  | 'IO_ERROR'
  | 'CANCELLED'

export class IdeaForgeError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string) {
    super(message)
    this.name = 'IdeaForgeError'
    this.code = code
  }

  static validation(message: string): IdeaForgeError {
    return new IdeaForgeError('VALIDATION_ERROR', message)
  }

  static parse(message: string): IdeaForgeError {
    return new IdeaForgeError('PARSE_ERROR', message)
  }

  static io(message: string): IdeaForgeError {
    return new IdeaForgeError('IO_ERROR', message)
  }

  static cancelled(message: string): IdeaForgeError {
    return new IdeaForgeError('CANCELLED', message)
  }
}
