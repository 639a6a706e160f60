import { beforeEach, describe, expect, it, vi } from 'vitest'
import { logEvent } from '@/lib/logging/logger'
import { WorkbookDocument } from '@/lib/model/workbookDocument'

vi.mock('@/lib/logging/logger', () => ({ logEvent: vi.fn() }))

describe('WorkbookDocument', () => {
  beforeEach(() => {
    vi.mocked(logEvent).mockClear()
  })

  it('starts empty', () => {
    const doc = new WorkbookDocument('wb.pdf', '/in/wb.pdf')
    expect(doc.bucketCount).toBe(0)
    expect(doc.ids()).toEqual([])
  })

  it('merges pages for an existing id and name as a set union', () => {
    const doc = new WorkbookDocument('wb.pdf', '/in/wb.pdf')
    doc.addWorkingSheet(3, 'Angstskala', [5, 4])
    doc.addWorkingSheet(3, 'Angstskala', [4, 6])
    expect(doc.getPages(3, 'Angstskala')).toEqual([4, 5, 6])
    expect(doc.namesFor(3)).toEqual(['Angstskala'])
  })

  it('is idempotent when the same pages are added again', () => {
    const doc = new WorkbookDocument('wb.pdf', '/in/wb.pdf')
    doc.addWorkingSheet(1, 'Tagebuch', [2, 3])
    const before = doc.toSnapshot()
    doc.addWorkingSheet(1, 'Tagebuch', [3, 2])
    expect(doc.toSnapshot()).toEqual(before)
  })

  it('keeps page lists ascending for every insertion order', () => {
    const orders = [
      [3, 1, 2, 2],
      [2, 2, 1, 3],
      [1, 3, 2, 1],
    ]
    for (const order of orders) {
      const doc = new WorkbookDocument('wb.pdf', '/in/wb.pdf')
      order.forEach((p) => doc.addWorkingSheet(9, 'Plan', [p]))
      expect(doc.getPages(9, 'Plan')).toEqual([1, 2, 3])
    }
  })

  it('stores a name with no pages', () => {
    const doc = new WorkbookDocument('wb.pdf', '/in/wb.pdf')
    expect(doc.addWorkingSheet(5, 'Ohne Seiten', [])).toBe(true)
    expect(doc.namesFor(5)).toEqual(['Ohne Seiten'])
    expect(doc.getPages(5, 'Ohne Seiten')).toEqual([])
  })

  it('ignores empty names', () => {
    const doc = new WorkbookDocument('wb.pdf', '/in/wb.pdf')
    expect(doc.addWorkingSheet(5, '', [1])).toBe(false)
    expect(doc.bucketCount).toBe(0)
  })

  it('coerces string ids and files unreadable ones under 0', () => {
    const doc = new WorkbookDocument('wb.pdf', '/in/wb.pdf')
    doc.addWorkingSheet('12b', 'Liste', [1])
    doc.addWorkingSheet('foo', 'Unbekannt', [2])
    expect(doc.ids()).toEqual([12, 0])
    expect(doc.getPages('12', 'Liste')).toEqual([1])
  })

  it('unions pages over all names of an id', () => {
    const doc = new WorkbookDocument('wb.pdf', '/in/wb.pdf')
    doc.addWorkingSheet(4, 'A', [1, 2])
    doc.addWorkingSheet(4, 'B', [2, 7])
    expect(Array.from(doc.pagesForId(4)).sort((a, b) => a - b)).toEqual([1, 2, 7])
    expect(doc.pagesForId(99).size).toBe(0)
  })

  it('serializes to the snapshot shape', () => {
    const doc = new WorkbookDocument('wb.pdf', '/in/wb.pdf')
    doc.addWorkingSheet(2, 'B', [3])
    doc.addWorkingSheet(10, 'C', [8, 7])
    expect(doc.toSnapshot()).toEqual({
      filename: 'wb.pdf',
      path: '/in/wb.pdf',
      working_sheets: { '2': { B: [3] }, '10': { C: [7, 8] } },
    })
  })

  it('does not expose its internal page lists', () => {
    const doc = new WorkbookDocument('wb.pdf', '/in/wb.pdf')
    doc.addWorkingSheet(1, 'A', [1])
    doc.getPages(1, 'A').push(99)
    doc.toSheetsRecord()[1].A.push(98)
    expect(doc.getPages(1, 'A')).toEqual([1])
  })

  describe('fromSnapshot', () => {
    it('restores a serialized document', () => {
      const doc = new WorkbookDocument('wb.pdf', '/in/wb.pdf')
      doc.addWorkingSheet(1, 'Tagebuch', [4, 5])
      doc.addWorkingSheet(2, 'Hierarchie', [])
      const restored = WorkbookDocument.fromSnapshot(doc.toSnapshot())
      expect(restored.filename).toBe('wb.pdf')
      expect(restored.sourcePath).toBe('/in/wb.pdf')
      expect(restored.toSnapshot()).toEqual(doc.toSnapshot())
    })

    it('skips malformed entries with a warning', () => {
      const restored = WorkbookDocument.fromSnapshot({
        filename: 'x.pdf',
        path: 'p',
        working_sheets: {
          '3': { A: [2, 1, 1] },
          '4': 'legacy',
          abc: { B: [1] },
          '5': { C: 'nope', D: [9] },
        },
      })
      expect(restored.toSnapshot().working_sheets).toEqual({ '3': { A: [1, 2] }, '5': { D: [9] } })
      expect(logEvent).toHaveBeenCalledWith('snapshot.skip_bucket', { id: '4', got: 'string' }, 'warn')
      expect(logEvent).toHaveBeenCalledWith('snapshot.skip_bucket', { id: 'abc', reason: 'non-numeric id' }, 'warn')
      expect(logEvent).toHaveBeenCalledWith('snapshot.skip_sheet', { id: 5, name: 'C', got: 'string' }, 'warn')
    })

    it('never throws on non-object input', () => {
      expect(WorkbookDocument.fromSnapshot(null).bucketCount).toBe(0)
      expect(WorkbookDocument.fromSnapshot([1, 2]).filename).toBe('')
      const doc = WorkbookDocument.fromSnapshot({ filename: 'y.pdf', path: 'q', working_sheets: [] })
      expect(doc.filename).toBe('y.pdf')
      expect(doc.bucketCount).toBe(0)
      expect(logEvent).toHaveBeenCalledWith('snapshot.invalid_sheets', { filename: 'y.pdf', got: 'array' }, 'warn')
    })
  })

  it('keeps a sheet named __proto__ as an ordinary key', () => {
    const doc = new WorkbookDocument('wb.pdf', '/in/wb.pdf')
    doc.addWorkingSheet(1, '__proto__', [2])
    const snapshot = doc.toSnapshot()

    expect(Object.keys(snapshot.working_sheets['1'])).toEqual(['__proto__'])
    expect(Object.getPrototypeOf(snapshot.working_sheets['1'])).toBe(Object.prototype)
    expect(Object.keys(doc.toSheetsRecord()[1])).toEqual(['__proto__'])

    const restored = WorkbookDocument.fromSnapshot(JSON.parse(JSON.stringify(snapshot)))
    expect(restored.getPages(1, '__proto__')).toEqual([2])
  })
})
