import { logEvent } from '@/lib/logging/logger'
import type { WorkbookDocument } from '@/lib/model/workbookDocument'
import { pageRange } from '@/lib/utils/pageRange'
import { headerOnPage, parseHeader } from '@/lib/workbook/header'
import { cleanHeaderText, trimSeparators } from '@/lib/workbook/normalize'
import { DEFAULT_PROFILE, type WorkbookProfile } from '@/lib/workbook/profile'
import type { HeaderBlock, PageTexts } from '@/types/workbook'

export type LabelOpts = {
  profile?: WorkbookProfile
  // 0-based indexes left unlabelled, e.g. the TOC pages that list every id
  skipIndexes?: ReadonlySet<number>
}

/** Header id per page, 0 where none was found. */
export function labelPages(pages: PageTexts, opts: LabelOpts = {}): number[] {
  const { profile = DEFAULT_PROFILE, skipIndexes = new Set<number>() } = opts
  const labels = pages.map((p, i) => (skipIndexes.has(i) ? 0 : headerOnPage(p, profile) ?? 0))
  const labelled = labels.filter(Boolean).length
  if (labelled < Math.max(2, Math.floor(pages.length / profile.sparseHeaderDivisor))) {
    logEvent('header_blocks.sparse', { labelled, pages: pages.length }, 'debug')
    labels.forEach((label, i) => {
      if (label || skipIndexes.has(i)) return
      const id = parseHeader(pages[i]).id
      if (id) labels[i] = id
    })
  }
  return labels
}

/**
 * Groups runs of equal nonzero labels. A "current/total" pair on the first
 * page of a run fixes the end arithmetically and wins over the labels that
 * follow.
 */
export function buildHeaderBlocks(pages: PageTexts, labels: readonly number[]): HeaderBlock[] {
  const totalPages = labels.length
  const blocks: HeaderBlock[] = []
  let i = 0
  while (i < totalPages) {
    const cur = labels[i]
    if (cur <= 0) {
      i += 1
      continue
    }
    const startPage = i + 1
    const { current, total } = parseHeader(pages[i])
    if (current && total) {
      const endPage = Math.min(totalPages, Math.max(startPage, startPage + (total - current)))
      blocks.push({ id: cur, startPage, endPage })
      i = endPage
      continue
    }
    let j = i + 1
    while (j < totalPages && labels[j] === cur) j += 1
    blocks.push({ id: cur, startPage, endPage: j })
    i = j
  }
  return blocks
}

const RX_TRAILING_COUNTER = /\s*\b\d{1,4}(?:\s*\/\s*\d{1,4})?\s*$/

function nameNearBlock(pages: PageTexts, block: HeaderBlock): string {
  const rx = new RegExp(`\\bAB\\s*${block.id}\\s*[/\\-]\\s*(.+)$`, 'im')
  const from = Math.max(1, block.startPage - 1)
  const to = Math.min(pages.length, block.endPage + 1)
  for (let pg = from; pg <= to; pg += 1) {
    const m = (pages[pg - 1] || '').match(rx)
    if (!m) continue
    const name = trimSeparators(cleanHeaderText(m[1]).replace(RX_TRAILING_COUNTER, ''))
    if (name) return name
  }
  return ''
}

/**
 * Merges header blocks into the document, skipping blocks whose pages are
 * already stored for their id. Returns the number of blocks recorded.
 */
export function recordHeaderBlocks(
  doc: WorkbookDocument,
  pages: PageTexts,
  blocks: readonly HeaderBlock[],
  tocNames: ReadonlyMap<number, string> = new Map(),
): number {
  let recorded = 0
  for (const block of blocks) {
    if (block.id <= 0 || block.endPage < block.startPage) continue
    const blockPages = pageRange(block.startPage, block.endPage)
    const already = doc.pagesForId(block.id)
    if (already.size && blockPages.every((p) => already.has(p))) continue

    const name =
      tocNames.get(block.id) ||
      doc.namesFor(block.id)[0] ||
      nameNearBlock(pages, block) ||
      `AB ${block.id}`

    doc.addWorkingSheet(block.id, name, blockPages)
    recorded += 1
    logEvent('header_blocks.recorded', { id: block.id, name, pages: blockPages })
  }
  return recorded
}
