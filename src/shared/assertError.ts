/**
 * Error message extraction for unknown thrown values.
 */

/** Safely extract error message from unknown thrown value */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}
