export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function errorStack(error: unknown): string {
  return error instanceof Error ? error.stack || 'No stack trace available' : '';
}
