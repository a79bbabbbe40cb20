import type { ContentfulStatusCode } from 'hono/utils/http-status'
import type { AnalysisError, ApiError } from '@thesis-structure/shared'

export const ErrorCodes = {
  INVALID_INPUT: 'INVALID_INPUT',
  INVALID_XML: 'INVALID_XML',
  EMPTY_FILE: 'EMPTY_FILE',
  FILE_READ_FAILED: 'FILE_READ_FAILED',
  DIRECTORY_NOT_FOUND: 'DIRECTORY_NOT_FOUND',
  DISALLOWED_FILE_TYPE: 'DISALLOWED_FILE_TYPE',
  INPUT_TOO_LARGE: 'INPUT_TOO_LARGE',
  GROBID_UNAVAILABLE: 'GROBID_UNAVAILABLE',
  GROBID_TIMEOUT: 'GROBID_TIMEOUT',
  GROBID_FAILED: 'GROBID_FAILED',
  STORAGE_NOT_FOUND: 'STORAGE_NOT_FOUND',
  INVALID_CONFIG: 'INVALID_CONFIG',
  INTERNAL_ERROR: 'INTERNAL_ERROR'
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes] | (string & {})

export type ErrorPayload = ApiError

export const buildError = (
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ErrorPayload => {
  if (details) {
    return { error: { code, message, details } }
  }

  return { error: { code, message } }
}

export class AppError extends Error {
  public readonly code: ErrorCode
  public readonly status: ContentfulStatusCode
  public readonly details?: Record<string, unknown>

  constructor(
    code: ErrorCode,
    message: string,
    status: ContentfulStatusCode = 500,
    details?: Record<string, unknown>
  ) {
    super(message)
    this.name = 'AppError'
    this.code = code
    this.status = status
    if (details) {
      this.details = details
    }
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError

export const errorMessage = (error: unknown, fallback = 'unknown error'): string =>
  error instanceof Error ? error.message : fallback

// Collapses any thrown value into the plain record carried by an AnalysisResult.
export const toAnalysisError = (error: unknown): AnalysisError => {
  if (isAppError(error)) {
    return { code: error.code, message: error.message }
  }

  return { code: ErrorCodes.INTERNAL_ERROR, message: errorMessage(error) }
}

export const toErrorResponse = (
  error: unknown,
  fallbackMessage = 'internal error'
): { status: ContentfulStatusCode; payload: ErrorPayload } => {
  if (isAppError(error)) {
    return {
      status: error.status,
      payload: buildError(error.code, error.message, error.details)
    }
  }

  return {
    status: 500,
    payload: buildError(ErrorCodes.INTERNAL_ERROR, fallbackMessage)
  }
}
