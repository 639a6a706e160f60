import { cleanHeaderText } from '@/lib/workbook/normalize'
import { parseHeader } from '@/lib/workbook/header'
import type { PageTexts } from '@/types/workbook'

const RX_NAME_TOKEN = /[\p{L}\p{N}_]{4,}/gu

/**
 * First page that plausibly holds a sheet with no known page number:
 * by header id, then by the full name, then by any long word of the name.
 */
export function findPageForEntry(pages: PageTexts, id: number | null, name: string | null): number | null {
  if (!pages.length) return null

  if (id) {
    const idx = pages.findIndex((p) => parseHeader(p).id === id)
    if (idx >= 0) return idx + 1
  }

  const nameNorm = (name || '').trim().replace(/\s+/g, ' ').toLowerCase()
  if (!nameNorm) return null

  const lowered = pages.map((p) => cleanHeaderText(p).toLowerCase())
  const exact = lowered.findIndex((txt) => txt.includes(nameNorm))
  if (exact >= 0) return exact + 1

  for (const token of nameNorm.match(RX_NAME_TOKEN) ?? []) {
    const hit = lowered.findIndex((txt) => txt.includes(token))
    if (hit >= 0) return hit + 1
  }
  return null
}
