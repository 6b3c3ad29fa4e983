export const formatErrorMessage = (
  error: unknown,
  fallbackMessage = 'Unknown error',
): string => {
  if (error instanceof Error && error.message.trim()) {
    return error.message.trim()
  }
  if (typeof error === 'string' && error.trim()) {
    return error.trim()
  }
  return fallbackMessage
}
