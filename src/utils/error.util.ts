export function message_of(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
