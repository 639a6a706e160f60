import { cleanHeaderText } from '@/lib/workbook/normalize'
import { headerOnPage, matchFraction } from '@/lib/workbook/header'
import { DEFAULT_PROFILE, type WorkbookProfile } from '@/lib/workbook/profile'
import type { PageTexts } from '@/types/workbook'

export type LastPageOpts = {
  currentId?: number | null
  maxScan?: number
  profile?: WorkbookProfile
}

const clamp = (value: number, min: number, max: number) => Math.min(Math.max(value, min), max)

/**
 * Scans forward from startPage for the last page of a sheet.
 *
 * A different header id ends the sheet on the page before it. Otherwise the
 * first "a/b" pair decides: b is read as an absolute end page when it lies
 * between startPage and the document end, else as a page count. Without any
 * signal the sheet is one page long.
 */
export function determineLastPage(pages: PageTexts, startPage: number, opts: LastPageOpts = {}): number {
  const { currentId = null, profile = DEFAULT_PROFILE } = opts
  const totalPages = pages.length
  if (!totalPages) return startPage
  const maxScan = opts.maxScan ?? totalPages - startPage + 1

  for (let offset = 0; offset < maxScan; offset += 1) {
    const pageNo = startPage + offset
    if (pageNo < 1 || pageNo > totalPages) break
    const raw = pages[pageNo - 1] || ''

    const hdr = headerOnPage(raw, profile)
    if (hdr !== null && currentId !== null && hdr !== currentId) {
      return clamp(pageNo - 1, startPage, totalPages)
    }

    const fraction = matchFraction(cleanHeaderText(raw))
    if (!fraction) continue
    const { current, total: second } = fraction

    if (second >= current && second >= startPage && second <= totalPages && second - startPage < profile.absoluteSpanLimit) {
      return second
    }
    if (second > 0 && second <= profile.maxCountTotal) {
      return clamp(startPage + (second - current), startPage, totalPages)
    }
  }

  return Math.min(startPage, totalPages)
}
