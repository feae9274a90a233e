import type { AppError, AppErrorKind } from './types'

const KINDS: readonly AppErrorKind[] = ['LoadError', 'DisplaySurfaceError', 'Unknown']

function isKind(value: unknown): value is AppErrorKind {
  return KINDS.some((kind) => kind === value)
}

/**
 * Narrow an unknown rejection value to a typed AppError.
 *
 * Objects that already carry a known `kind` pass through. Anything else
 * (an `Error` from fetch, a string) is wrapped in an AppError with kind
 * "Unknown", keeping its message.
 */
export function toAppError(e: unknown): AppError {
  if (typeof e === 'object' && e !== null && 'kind' in e && isKind(e.kind)) {
    const message = 'message' in e && typeof e.message === 'string' ? e.message : undefined
    return message === undefined ? { kind: e.kind } : { kind: e.kind, message }
  }
  if (e instanceof Error) {
    return { kind: 'Unknown', message: e.message }
  }
  return { kind: 'Unknown', message: String(e) }
}

/** Build a LoadError for a malformed or unreadable model file. */
export function loadError(message: string): AppError {
  return { kind: 'LoadError', message }
}

/** Build a DisplaySurfaceError; the frame loop treats these as fatal. */
export function displaySurfaceError(message: string): AppError {
  return { kind: 'DisplaySurfaceError', message }
}

/** Human-readable one-liner for notifications and logs. */
export function describeError(err: AppError): string {
  return err.message ?? err.kind
}
