import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { PDFDocument } from 'pdf-lib'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { WorkbookDocument } from '@/lib/model/workbookDocument'
import { writeWorkingSheetOutputs } from '@/lib/pdf/splitWorkingSheets'

async function writeSourcePdf(file: string, pageCount: number) {
  const pdf = await PDFDocument.create()
  for (let i = 0; i < pageCount; i += 1) pdf.addPage([200, 200])
  fs.mkdirSync(path.dirname(file), { recursive: true })
  fs.writeFileSync(file, await pdf.save())
}

const pageCountOf = async (file: string) => (await PDFDocument.load(fs.readFileSync(file))).getPageCount()

describe('writeWorkingSheetOutputs', () => {
  let dir: string
  let source: string
  let outputBase: string

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wsi-split-'))
    source = path.join(dir, 'in', 'workbook.pdf')
    outputBase = path.join(dir, 'out')
    await writeSourcePdf(source, 5)
  })

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('writes one PDF per id and name', async () => {
    const doc = new WorkbookDocument('workbook.pdf', source)
    doc.addWorkingSheet(1, 'Symptom Tagebuch', [1, 2])
    doc.addWorkingSheet(2, 'Plan', [3, 9])
    doc.addWorkingSheet(0, 'Ohne Id', [5])
    doc.addWorkingSheet(4, 'Leer', [])
    doc.addWorkingSheet(5, 'Weit weg', [20])

    const written = await writeWorkingSheetOutputs(doc, { outputBase })
    const target = path.join(outputBase, 'workbook')

    expect(written).toEqual([
      path.join(target, '1_Symptom_Tagebuch.pdf'),
      path.join(target, '2_Plan.pdf'),
      path.join(target, 'no-id_Ohne_Id.pdf'),
    ])
    expect(await pageCountOf(written[0])).toBe(2)
    expect(await pageCountOf(written[1])).toBe(1)
    expect(await pageCountOf(written[2])).toBe(1)
  })

  it('falls back to <fallbackDir>/<stem>.pdf when the source path is gone', async () => {
    const doc = new WorkbookDocument('workbook.pdf', path.join(dir, 'verschoben', 'workbook.pdf'))
    doc.addWorkingSheet(3, 'Plan', [4])
    const written = await writeWorkingSheetOutputs(doc, { outputBase, fallbackDir: path.join(dir, 'in') })
    expect(written).toEqual([path.join(outputBase, 'workbook', '3_Plan.pdf')])
  })

  it('writes nothing without a readable source', async () => {
    const doc = new WorkbookDocument('workbook.pdf', path.join(dir, 'fehlt.pdf'))
    doc.addWorkingSheet(3, 'Plan', [4])
    expect(await writeWorkingSheetOutputs(doc, { outputBase })).toEqual([])
    expect(fs.existsSync(outputBase)).toBe(false)
  })

  it('writes nothing when the source is not a PDF', async () => {
    const broken = path.join(dir, 'kaputt.pdf')
    fs.writeFileSync(broken, 'no pdf here')
    const doc = new WorkbookDocument('kaputt.pdf', broken)
    doc.addWorkingSheet(3, 'Plan', [1])
    expect(await writeWorkingSheetOutputs(doc, { outputBase })).toEqual([])
  })
})
