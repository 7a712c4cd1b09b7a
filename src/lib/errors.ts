export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorDetail(err: unknown): string {
  if (err instanceof Error) return err.stack ?? `${err.name}: ${err.message}`;
  return String(err);
}
