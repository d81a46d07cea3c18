/**
 * Flattens a thrown value into a loggable message.
 * For fetch failures the underlying network cause is appended.
 */
export function errorMessage(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  if (err.cause instanceof Error) return `${err.message}: ${err.cause.message}`;
  return err.message;
}

export function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
