import { cleanHeaderText, trimSeparators } from '@/lib/workbook/normalize'
import { DEFAULT_PROFILE, type WorkbookProfile } from '@/lib/workbook/profile'
import type { ParsedHeader } from '@/types/workbook'

export const RX_AB_ID = /\bAB\s*(\d{1,4})\b/i
export const RX_FRACTION = /\b(\d{1,4})\s*\/\s*(\d{1,4})\b/

const RX_AB_ID_ALL = /\bAB\s*\d{1,4}\b/gi
const RX_TRAILING_FRACTION = /\b\d{1,4}\s*\/\s*\d{1,4}\b$/
const RX_TRAILING_NUMBER = /\b\d{1,4}$/

export function matchAbId(text: string): number | null {
  const m = text.match(RX_AB_ID)
  return m ? Number.parseInt(m[1], 10) : null
}

export function matchFraction(text: string): { current: number; total: number } | null {
  const m = text.match(RX_FRACTION)
  if (!m) return null
  return { current: Number.parseInt(m[1], 10), total: Number.parseInt(m[2], 10) }
}

export function parseHeader(headerText: string | null | undefined): ParsedHeader {
  const txt = cleanHeaderText(headerText)
  if (!txt) return { id: null, name: '', current: null, total: null }

  const id = matchAbId(txt)
  const fraction = matchFraction(txt)

  let name = txt.replace(RX_AB_ID_ALL, '').trim()
  name = name.replace(RX_TRAILING_FRACTION, '').trim()
  name = name.replace(RX_TRAILING_NUMBER, '').trim()

  return {
    id,
    name: trimSeparators(name),
    current: fraction ? fraction.current : null,
    total: fraction ? fraction.total : null,
  }
}

/**
 * Id printed in the running header of a page. Looks at the header band first
 * and falls back to the whole page.
 */
export function headerOnPage(text: string | null | undefined, profile: WorkbookProfile = DEFAULT_PROFILE): number | null {
  if (!text) return null
  const band = text.split(/\r?\n/).slice(0, profile.headerBandLines).join('\n').slice(0, profile.headerBandChars)
  const inBand = matchAbId(cleanHeaderText(band))
  if (inBand !== null) return inBand
  return matchAbId(cleanHeaderText(text))
}
