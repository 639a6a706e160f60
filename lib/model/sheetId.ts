export const UNKNOWN_SHEET_ID = 0

/**
 * Integer id from a number or a numeric string. Text that does not parse as a
 * whole falls back to its leading run of digits ("12a" -> 12). Returns null
 * when there is nothing to read.
 */
export function parseSheetId(value: number | string | null | undefined): number | null {
  if (value === null || value === undefined) return null
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : null
  }
  const s = value.trim()
  if (!s) return null
  if (/^\d+$/.test(s)) return Number.parseInt(s, 10)
  const m = s.match(/^(\d+)/)
  return m ? Number.parseInt(m[1], 10) : null
}

export function coerceSheetId(value: number | string | null | undefined): number {
  return parseSheetId(value) ?? UNKNOWN_SHEET_ID
}

export function normalizePages(pages: Iterable<unknown> | null | undefined): number[] {
  const out = new Set<number>()
  for (const p of pages ?? []) {
    let n: number | null = null
    if (typeof p === 'number' && Number.isFinite(p)) n = Math.trunc(p)
    else if (typeof p === 'string' && /^\s*[+-]?\d+\s*$/.test(p)) n = Number.parseInt(p, 10)
    if (n !== null && n > 0) out.add(n)
  }
  return Array.from(out).sort((a, b) => a - b)
}
