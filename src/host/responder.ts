export const DEFAULT_RESPONSE = "42";

const RESPONSES: ReadonlyMap<string, string> = new Map([
  ["ping", "pong"],
  ["hello", "goodbye"],
]);

/** Maps a stdio query to its reply. Total: unknown and empty queries get DEFAULT_RESPONSE. */
export function respondTo(query: string): string {
  return RESPONSES.get(query) ?? DEFAULT_RESPONSE;
}
