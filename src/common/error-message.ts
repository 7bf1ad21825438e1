/** Human-readable message for anything thrown */
export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
