// ---------------------------------------------------------------------------
// Response payload helpers
// ---------------------------------------------------------------------------

export interface ErrorResponse {
  status: number;
  detail: string;
}

export function formatError(status: number, detail: string): ErrorResponse {
  return { status, detail };
}

/**
 * Parses a positive integer query value, clamped to [1, max]. Falls back
 * when the value is absent or not a number.
 */
export function parseLimit(raw: string | undefined, fallback: number, max: number): number {
  const value = parseInt(raw ?? '', 10);
  if (Number.isNaN(value)) return fallback;
  return Math.min(max, Math.max(1, value));
}
