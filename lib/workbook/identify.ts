import { v4 as uuidv4 } from 'uuid'
import { logEvent } from '@/lib/logging/logger'
import { coerceSheetId } from '@/lib/model/sheetId'
import type { WorkbookDocument } from '@/lib/model/workbookDocument'
import { pageRange } from '@/lib/utils/pageRange'
import { scanGlobalEntries } from '@/lib/workbook/globalScan'
import { buildHeaderBlocks, labelPages, recordHeaderBlocks } from '@/lib/workbook/headerBlocks'
import { determineLastPage } from '@/lib/workbook/lastPage'
import { DEFAULT_PROFILE, type WorkbookProfile } from '@/lib/workbook/profile'
import { extractToc, type TocRegion } from '@/lib/workbook/toc'
import type { PageTexts, TocEntry } from '@/types/workbook'

export type IdentifyOpts = {
  profile?: WorkbookProfile
}

export type IdentifySummary = {
  runId: string
  tocEntries: number
  globalAdded: number
  blocksFound: number
  blocksRecorded: number
  buckets: number
}

export function recordTocEntries(
  doc: WorkbookDocument,
  pages: PageTexts,
  entries: readonly TocEntry[],
  profile: WorkbookProfile = DEFAULT_PROFILE,
) {
  for (const entry of entries) {
    const id = coerceSheetId(entry.rawId)
    let sheetPages: number[] = []
    if (entry.page) {
      const lastPage = determineLastPage(pages, entry.page, { currentId: id, profile })
      sheetPages = pageRange(entry.page, lastPage)
    }
    doc.addWorkingSheet(id, entry.name || `AB ${entry.rawId}`, sheetPages)
  }
}

function tocNamesById(entries: readonly TocEntry[]): Map<number, string> {
  const out = new Map<number, string>()
  for (const entry of entries) {
    if (entry.name) out.set(coerceSheetId(entry.rawId), entry.name)
  }
  return out
}

/**
 * Pages known to belong to the TOC. Without a closing heading the region end
 * is only the window cap, so just the start page counts.
 */
export function tocPageIndexes(region: TocRegion | null): Set<number> {
  const out = new Set<number>()
  if (!region) return out
  const last = region.endMarkerFound ? region.endIndex : region.startIndex
  for (let i = region.startIndex; i <= last; i += 1) out.add(i)
  return out
}

/**
 * Fills the document from the page texts in three passes: table of contents,
 * document-wide "AB n" mentions, then runs of pages sharing a header id.
 * Each pass only adds what the earlier ones left open.
 */
export function identifyWorkingSheets(
  doc: WorkbookDocument,
  pages: PageTexts,
  opts: IdentifyOpts = {},
): { doc: WorkbookDocument; summary: IdentifySummary } {
  const profile = opts.profile ?? DEFAULT_PROFILE
  const runId = uuidv4()
  const summary: IdentifySummary = {
    runId,
    tocEntries: 0,
    globalAdded: 0,
    blocksFound: 0,
    blocksRecorded: 0,
    buckets: doc.bucketCount,
  }

  if (!pages.length) {
    logEvent('identify.no_pages', { runId, filename: doc.filename })
    return { doc, summary }
  }

  const { region, entries } = extractToc(pages, profile)
  recordTocEntries(doc, pages, entries, profile)
  summary.tocEntries = entries.length

  summary.globalAdded = scanGlobalEntries(doc, pages, profile)

  const labels = labelPages(pages, { profile, skipIndexes: tocPageIndexes(region) })
  const blocks = buildHeaderBlocks(pages, labels)
  summary.blocksFound = blocks.length
  summary.blocksRecorded = recordHeaderBlocks(doc, pages, blocks, tocNamesById(entries))

  summary.buckets = doc.bucketCount
  logEvent('identify.done', { filename: doc.filename, pages: pages.length, ...summary })
  return { doc, summary }
}
