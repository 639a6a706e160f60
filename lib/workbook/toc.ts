import { logEvent } from '@/lib/logging/logger'
import { coerceSheetId } from '@/lib/model/sheetId'
import { cleanHeaderText, trimSeparators } from '@/lib/workbook/normalize'
import { findPageForEntry } from '@/lib/workbook/locate'
import { DEFAULT_PROFILE, type WorkbookProfile } from '@/lib/workbook/profile'
import type { PageTexts, TocEntry } from '@/types/workbook'

export type TocRegion = {
  startIndex: number
  endIndex: number
  // false when endIndex is only the tocWindowPages cap
  endMarkerFound: boolean
  text: string
}

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')

function headingLineRegex(markers: string[]): RegExp {
  const alternation = markers.map((m) => escapeRegExp(m).replace(/\s+/g, '\\s+')).join('|')
  return new RegExp(`(^|\\n)[^\\S\\n]*(?:${alternation})[^\\S\\n]*(\\r?\\n|$)`, 'iu')
}

function containsMarker(text: string, markers: string[]): boolean {
  const clean = cleanHeaderText(text).toLowerCase()
  return markers.some((m) => clean.includes(cleanHeaderText(m).toLowerCase()))
}

export function findTocRegion(pages: PageTexts, profile: WorkbookProfile = DEFAULT_PROFILE): TocRegion | null {
  const startRe = headingLineRegex(profile.tocStartMarkers)
  const endRe = headingLineRegex(profile.tocEndMarkers)

  let startIndex = pages.findIndex((p) => !!p && startRe.test(p))
  if (startIndex < 0) {
    // headings split across items by the extractor: last resort, from the back
    for (let i = pages.length - 1; i >= 0; i -= 1) {
      if (pages[i] && containsMarker(pages[i], profile.tocStartMarkers)) {
        startIndex = i
        break
      }
    }
  }
  if (startIndex < 0) return null

  let endIndex = -1
  for (let j = startIndex; j < pages.length; j += 1) {
    if (pages[j] && endRe.test(pages[j])) {
      endIndex = j
      break
    }
  }
  if (endIndex < 0) {
    for (let j = startIndex; j < pages.length; j += 1) {
      if (pages[j] && containsMarker(pages[j], profile.tocEndMarkers)) {
        endIndex = j
        break
      }
    }
  }
  const endMarkerFound = endIndex >= 0
  if (!endMarkerFound) endIndex = Math.min(startIndex + profile.tocWindowPages, pages.length - 1)

  const joined = cleanHeaderText(pages.slice(startIndex, endIndex + 1).join(' '))
  return { startIndex, endIndex, endMarkerFound, text: clipBetweenMarkers(joined, profile) }
}

function markerRegex(markers: string[], flags = 'iu'): RegExp {
  return new RegExp(markers.map((m) => escapeRegExp(cleanHeaderText(m)).replace(/ /g, '\\s+')).join('|'), flags)
}

// drops text before the start heading, repeats of it, and everything from the end heading on
function clipBetweenMarkers(text: string, profile: WorkbookProfile): string {
  let out = text
  const start = markerRegex(profile.tocStartMarkers).exec(out)
  if (start) out = out.slice(start.index + start[0].length)
  const end = markerRegex(profile.tocEndMarkers).exec(out)
  if (end) out = out.slice(0, end.index)
  return cleanHeaderText(out.replace(markerRegex(profile.tocStartMarkers, 'giu'), ' '))
}

const RX_TOC_TOKEN = /\bAB\s*(\d{1,4})\b(?:\s*[/\-]\s*)?/gi
const RX_TRAILING_PAGE = /^(.*?)[\s\-–—:]*(\d{1,4})\s*$/
const RX_STANDALONE_NUMBER = /\b(\d{1,4})\b/

/**
 * Splits a normalized TOC text on its "AB n" tokens. The page is the number
 * closing the entry, or the first number shortly after the id token.
 */
export function parseTocText(tocText: string, profile: WorkbookProfile = DEFAULT_PROFILE): TocEntry[] {
  if (!tocText) return []
  const matches = Array.from(tocText.matchAll(RX_TOC_TOKEN))
  const entries: TocEntry[] = []

  matches.forEach((m, idx) => {
    const start = (m.index ?? 0) + m[0].length
    const next = matches[idx + 1]
    const end = next ? next.index ?? tocText.length : tocText.length
    let rawName = tocText.slice(start, end).trim()
    let page: number | null = null

    const trail = rawName.match(RX_TRAILING_PAGE)
    if (trail) {
      page = Number.parseInt(trail[2], 10)
      const candidate = trail[1].trim()
      if (candidate) rawName = candidate
    }
    if (page === null) {
      const ahead = tocText.slice(start, start + profile.tocLookaheadChars).match(RX_STANDALONE_NUMBER)
      if (ahead) page = Number.parseInt(ahead[1], 10)
    }

    entries.push({ rawId: m[1], name: trimSeparators(rawName), page })
  })

  return entries
}

export type TocResult = {
  region: TocRegion | null
  entries: TocEntry[]
}

/**
 * TOC entries of the document. Entries printed without a page are looked up
 * in the pages; those still unresolved keep page null.
 */
export function extractToc(pages: PageTexts, profile: WorkbookProfile = DEFAULT_PROFILE): TocResult {
  const region = findTocRegion(pages, profile)
  if (!region) {
    logEvent('toc.not_found', { pages: pages.length }, 'debug')
    return { region: null, entries: [] }
  }
  logEvent('toc.region', { start: region.startIndex + 1, end: region.endIndex + 1, snippet: region.text.slice(0, 400) }, 'debug')

  const parsed = parseTocText(region.text, profile)
  const entries = parsed.map((entry) => {
    if (entry.page !== null) return entry
    const id = coerceSheetId(entry.rawId)
    const found = findPageForEntry(pages, id || null, entry.name || null)
    return { ...entry, page: found }
  })

  logEvent('toc.entries', { count: entries.length, unresolved: entries.filter((e) => e.page === null).length })
  return { region, entries }
}
