import { logEvent } from '@/lib/logging/logger'
import { coerceSheetId, normalizePages, parseSheetId } from '@/lib/model/sheetId'
import type { SheetsRecord, WorkingSheetsSnapshot } from '@/types/workbook'

const isPlainObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

const typeName = (value: unknown) => (value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value)

// own data properties only, so a sheet named "__proto__" stays a plain key
const namesRecord = (names: Map<string, number[]>): Record<string, number[]> =>
  Object.fromEntries(Array.from(names, ([name, pages]): [string, number[]] => [name, [...pages]]))

function mergePages(existing: number[], incoming: number[]): number[] {
  return normalizePages([...existing, ...incoming])
}

/**
 * Index of the working sheets found in one workbook PDF:
 * id -> sheet name -> ascending 1-based pages.
 *
 * Pages only ever enter through addWorkingSheet, which keeps every list
 * sorted and free of duplicates.
 */
export class WorkbookDocument {
  readonly filename: string
  readonly sourcePath: string
  private readonly sheets = new Map<number, Map<string, number[]>>()

  constructor(filename: string, sourcePath: string) {
    this.filename = filename
    this.sourcePath = sourcePath
  }

  get bucketCount(): number {
    return this.sheets.size
  }

  ids(): number[] {
    return Array.from(this.sheets.keys())
  }

  hasId(id: number): boolean {
    return this.sheets.has(id)
  }

  namesFor(id: number): string[] {
    return Array.from(this.sheets.get(id)?.keys() ?? [])
  }

  getPages(id: number | string, name: string): number[] {
    return [...(this.sheets.get(coerceSheetId(id))?.get(name) ?? [])]
  }

  pagesForId(id: number): Set<number> {
    const out = new Set<number>()
    for (const pages of this.sheets.get(id)?.values() ?? []) {
      pages.forEach((p) => out.add(p))
    }
    return out
  }

  /**
   * Stores pages under [id][name], union-merging with what is already there.
   * An empty page list still records the name. Ids that do not parse land in
   * bucket 0. Returns false when the name is empty and nothing was stored.
   */
  addWorkingSheet(id: number | string | null | undefined, name: string, pages: Iterable<unknown>): boolean {
    if (!name) {
      logEvent('sheets.skip_empty_name', { id }, 'debug')
      return false
    }
    const idKey = coerceSheetId(id)
    const incoming = normalizePages(pages)

    let bucket = this.sheets.get(idKey)
    if (!bucket) {
      bucket = new Map()
      this.sheets.set(idKey, bucket)
    }
    const existing = bucket.get(name)
    if (existing) {
      const merged = mergePages(existing, incoming)
      bucket.set(name, merged)
      logEvent('sheets.merged', { id: idKey, name, pages: merged })
    } else {
      bucket.set(name, incoming)
      logEvent('sheets.added', { id: idKey, name, pages: incoming })
    }
    return true
  }

  toSheetsRecord(): SheetsRecord {
    const out: SheetsRecord = {}
    for (const [id, names] of this.sheets) out[id] = namesRecord(names)
    return out
  }

  toSnapshot(): WorkingSheetsSnapshot {
    const working_sheets: WorkingSheetsSnapshot['working_sheets'] = {}
    for (const [id, names] of this.sheets) working_sheets[String(id)] = namesRecord(names)
    logEvent('snapshot.serialized', { filename: this.filename, buckets: this.sheets.size }, 'debug')
    return { filename: this.filename, path: this.sourcePath, working_sheets }
  }

  /**
   * Rebuilds a document from a stored snapshot. Entries of the wrong shape are
   * skipped with a warning; this never throws.
   */
  static fromSnapshot(data: unknown): WorkbookDocument {
    if (!isPlainObject(data)) {
      logEvent('snapshot.invalid_root', { got: typeName(data) }, 'warn')
      return new WorkbookDocument('', '')
    }
    const filename = typeof data.filename === 'string' ? data.filename : ''
    const sourcePath = typeof data.path === 'string' ? data.path : ''
    const doc = new WorkbookDocument(filename, sourcePath)

    const ws = data.working_sheets ?? {}
    if (!isPlainObject(ws)) {
      logEvent('snapshot.invalid_sheets', { filename, got: typeName(ws) }, 'warn')
      return doc
    }

    for (const [rawId, names] of Object.entries(ws)) {
      if (!isPlainObject(names)) {
        logEvent('snapshot.skip_bucket', { id: rawId, got: typeName(names) }, 'warn')
        continue
      }
      const id = parseSheetId(rawId)
      if (id === null) {
        logEvent('snapshot.skip_bucket', { id: rawId, reason: 'non-numeric id' }, 'warn')
        continue
      }
      for (const [name, pages] of Object.entries(names)) {
        if (!Array.isArray(pages)) {
          logEvent('snapshot.skip_sheet', { id, name, got: typeName(pages) }, 'warn')
          continue
        }
        doc.addWorkingSheet(id, name, pages)
      }
    }

    logEvent('snapshot.loaded', { filename, buckets: doc.bucketCount })
    return doc
  }
}
