import { describe, expect, it } from 'vitest'
import { coerceSheetId, normalizePages, parseSheetId } from '@/lib/model/sheetId'

describe('parseSheetId', () => {
  it('accepts integers and numeric strings', () => {
    expect(parseSheetId(7)).toBe(7)
    expect(parseSheetId(' 12 ')).toBe(12)
  })

  it('falls back to the leading digits', () => {
    expect(parseSheetId('12a')).toBe(12)
    expect(parseSheetId('3 / Liste')).toBe(3)
  })

  it('returns null when nothing can be read', () => {
    expect(parseSheetId('x1')).toBeNull()
    expect(parseSheetId('')).toBeNull()
    expect(parseSheetId(-1)).toBeNull()
    expect(parseSheetId(2.5)).toBeNull()
    expect(parseSheetId(null)).toBeNull()
  })
})

describe('coerceSheetId', () => {
  it('maps unreadable ids to bucket 0', () => {
    expect(coerceSheetId('abc')).toBe(0)
    expect(coerceSheetId(undefined)).toBe(0)
    expect(coerceSheetId('41')).toBe(41)
  })
})

describe('normalizePages', () => {
  it('keeps positive integers, sorted and unique', () => {
    expect(normalizePages([5, '3', 3, 0, -2, 'x', 2.9, 5])).toEqual([2, 3, 5])
  })

  it('handles missing input', () => {
    expect(normalizePages(null)).toEqual([])
    expect(normalizePages(undefined)).toEqual([])
  })
})
