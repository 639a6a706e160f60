import fs from 'node:fs/promises'
import path from 'node:path'
import { PDFDocument } from 'pdf-lib'
import { logEvent } from '@/lib/logging/logger'
import { normalizePages } from '@/lib/model/sheetId'
import type { WorkbookDocument } from '@/lib/model/workbookDocument'
import { sanitizeFilename } from '@/lib/utils/sanitizeFilename'

export type SplitOpts = {
  outputBase: string
  fallbackDir?: string
}

async function exists(file: string) {
  try {
    await fs.access(file)
    return true
  } catch {
    return false
  }
}

function documentStem(doc: WorkbookDocument) {
  const base = doc.filename || doc.sourcePath
  return path.parse(base).name || 'document'
}

async function resolveSource(doc: WorkbookDocument, stem: string, fallbackDir?: string): Promise<string | null> {
  if (doc.sourcePath && (await exists(doc.sourcePath))) return doc.sourcePath
  if (fallbackDir) {
    const alt = path.join(fallbackDir, `${stem}.pdf`)
    if (await exists(alt)) {
      logEvent('split.fallback_source', { source: alt }, 'debug')
      return alt
    }
  }
  logEvent('split.source_missing', { source: doc.sourcePath, fallbackDir }, 'error')
  return null
}

/**
 * Writes one PDF per (id, name) into <outputBase>/<stem>/. Page numbers outside
 * the source are dropped; sheets left without pages are skipped.
 */
export async function writeWorkingSheetOutputs(doc: WorkbookDocument, opts: SplitOpts): Promise<string[]> {
  const written: string[] = []
  const stem = documentStem(doc)
  const targetDir = path.resolve(opts.outputBase, stem)

  const src = await resolveSource(doc, stem, opts.fallbackDir)
  if (!src) return written

  let source: PDFDocument
  try {
    source = await PDFDocument.load(await fs.readFile(src))
  } catch (err) {
    logEvent('split.open_failed', { source: src, error: String(err) }, 'error')
    return written
  }
  const totalPages = source.getPageCount()
  await fs.mkdir(targetDir, { recursive: true })

  const sheets = doc.toSheetsRecord()
  for (const id of doc.ids()) {
    for (const [name, rawPages] of Object.entries(sheets[id] ?? {})) {
      const requested = normalizePages(rawPages)
      if (!requested.length) {
        logEvent('split.skip_empty', { id, name }, 'debug')
        continue
      }
      const valid = requested.filter((p) => p >= 1 && p <= totalPages)
      if (!valid.length) {
        logEvent('split.no_valid_pages', { id, name, requested }, 'warn')
        continue
      }

      const out = await PDFDocument.create()
      const copied = await out.copyPages(source, valid.map((p) => p - 1))
      copied.forEach((page) => out.addPage(page))

      const fileName = `${sanitizeFilename(id ? String(id) : 'no-id')}_${sanitizeFilename(name)}.pdf`
      const outPath = path.join(targetDir, fileName)
      try {
        await fs.writeFile(outPath, await out.save())
        written.push(outPath)
        logEvent('split.written', { id, name, file: outPath, pages: valid })
      } catch (err) {
        logEvent('split.write_failed', { id, name, file: outPath, error: String(err) }, 'error')
      }
    }
  }

  logEvent('split.done', { written: written.length, targetDir })
  return written
}
