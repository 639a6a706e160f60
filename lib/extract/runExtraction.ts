import path from 'node:path'
import { z } from 'zod'
import { getConfig } from '@/lib/config/env'
import { logEvent } from '@/lib/logging/logger'
import { saveSnapshot } from '@/lib/model/snapshotIO'
import { WorkbookDocument } from '@/lib/model/workbookDocument'
import { loadPages } from '@/lib/pdf/parsePdf'
import { writeWorkingSheetOutputs } from '@/lib/pdf/splitWorkingSheets'
import { identifyWorkingSheets, type IdentifySummary } from '@/lib/workbook/identify'
import { loadWorkbookProfile } from '@/lib/workbook/profile'

export const ExtractionOptionsSchema = z.object({
  input: z.string().min(1),
  profile: z.string().min(1).optional(),
  output: z.string().min(1).optional(),
  json: z.string().min(1).optional(),
  split: z.boolean().default(false),
})

export type ExtractionOptions = z.input<typeof ExtractionOptionsSchema>

export type ExtractionResult = {
  doc: WorkbookDocument
  summary: IdentifySummary
  snapshotPath: string
  written: string[]
}

export async function runExtraction(options: ExtractionOptions): Promise<ExtractionResult> {
  const opts = ExtractionOptionsSchema.parse(options)
  const config = getConfig()
  const outputBase = opts.output ?? config.OUTPUT_DIR
  const profile = loadWorkbookProfile(opts.profile ?? config.WORKBOOK_PROFILE)

  const filename = path.basename(opts.input)
  const stem = path.parse(filename).name
  const doc = new WorkbookDocument(filename, opts.input)

  const pages = await loadPages(opts.input)
  const { summary } = identifyWorkingSheets(doc, pages, { profile })

  const snapshotPath = await saveSnapshot(doc, opts.json ?? path.join(outputBase, `${stem}.json`))
  const written = opts.split
    ? await writeWorkingSheetOutputs(doc, { outputBase, fallbackDir: config.INPUT_FALLBACK_DIR })
    : []

  logEvent('extract.done', { input: opts.input, snapshotPath, written: written.length, runId: summary.runId })
  return { doc, summary, snapshotPath, written }
}
