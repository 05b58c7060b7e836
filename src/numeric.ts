// src/numeric.ts
// Numeric probing for backend payloads whose field names drift between releases.

/**
 * Field names the groundwater balance has been reported under, most specific first.
 * The first one that is present and numeric wins.
 */
export const BALANCE_FIELD_CANDIDATES = [
  'balance',
  'gw_balance',
  'available_water',
  'groundwater_balance',
  'total_balance',
  'water_balance',
  'net_balance',
  'water_required_litres',
  'available_litres',
  'total_water',
] as const;

const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Coerce a JSON value to a finite number.
 * Numbers pass through, decimal strings are parsed (surrounding whitespace allowed),
 * anything else is undefined.
 */
export function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;
  if (typeof value === 'string') {
    const s = value.trim();
    if (!DECIMAL.test(s)) return undefined;
    const n = Number(s);
    return Number.isFinite(n) ? n : undefined;
  }
  return undefined;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** undefined means "unknown", not an error. */
export function extractNumeric(
  payload: unknown,
  candidates: readonly string[]
): number | undefined {
  if (typeof payload === 'number') return toNumber(payload);
  if (!isRecord(payload)) return undefined;
  for (const name of candidates) {
    if (!(name in payload)) continue;
    const n = toNumber(payload[name]);
    if (n !== undefined) return n;
  }
  return undefined;
}
