import { logEvent } from '@/lib/logging/logger'
import { coerceSheetId } from '@/lib/model/sheetId'
import type { WorkbookDocument } from '@/lib/model/workbookDocument'
import { pageRange } from '@/lib/utils/pageRange'
import { determineLastPage } from '@/lib/workbook/lastPage'
import { findPageForEntry } from '@/lib/workbook/locate'
import { DEFAULT_PROFILE, type WorkbookProfile } from '@/lib/workbook/profile'
import type { PageTexts } from '@/types/workbook'

const RX_GLOBAL_ENTRY = /\bAB\s*(\d{1,4})\b(?:\s*[/\-]\s*)?(.+?)\s+(\d{1,4})\b/gi
const RX_NAME_EDGES = /^[\s\-–—:;,]+|[\s\-–—:;,]+$/g

/**
 * Adds "AB id / Name page" mentions found anywhere in the raw page text, for
 * ids no earlier pass has a bucket for. Returns the number of sheets added.
 */
export function scanGlobalEntries(doc: WorkbookDocument, pages: PageTexts, profile: WorkbookProfile = DEFAULT_PROFILE): number {
  const known = new Set(doc.ids())
  let added = 0

  pages.forEach((txt, pIdx) => {
    if (!txt) return
    for (const m of txt.matchAll(RX_GLOBAL_ENTRY)) {
      const id = coerceSheetId(m[1])
      if (known.has(id)) continue
      const name = m[2].replace(RX_NAME_EDGES, '')
      const startPage = Number.parseInt(m[3], 10)

      let sheetPages: number[] = []
      if (startPage) {
        const lastPage = determineLastPage(pages, startPage, { currentId: id, profile })
        sheetPages = pageRange(startPage, lastPage)
      } else {
        const found = findPageForEntry(pages, id || null, name || null)
        if (found) sheetPages = [found]
      }

      if (doc.addWorkingSheet(id, name, sheetPages)) added += 1
      known.add(id)
      logEvent('global_scan.match', { id, name, foundOn: pIdx + 1, pages: sheetPages }, 'debug')
    }
  })

  logEvent('global_scan.done', { added })
  return added
}
