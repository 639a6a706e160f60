import fs from 'node:fs/promises'
import { PDFParse } from 'pdf-parse'
import { logEvent } from '@/lib/logging/logger'

export type ParsedPdf = {
  text: string
  numPages: number
  pages: string[]
}

export async function parsePdf(buffer: Buffer): Promise<ParsedPdf> {
  const parser = new PDFParse({ data: new Uint8Array(buffer) })
  try {
    const res = await parser.getText()
    const numPages = res.pages.reduce((max, p) => Math.max(max, p.num), 0)
    // pages the extractor skipped stay as empty strings so index + 1 is the page number
    const pages: string[] = new Array<string>(numPages).fill('')
    for (const page of res.pages) {
      if (page.num >= 1) pages[page.num - 1] = page.text || ''
    }
    return { text: res.text || '', numPages, pages }
  } finally {
    await parser.destroy()
  }
}

/**
 * Page texts of the PDF at pdfPath, in page order. Any failure is logged and
 * yields an empty list.
 */
export async function loadPages(pdfPath: string, maxPages?: number): Promise<string[]> {
  let buffer: Buffer
  try {
    buffer = await fs.readFile(pdfPath)
  } catch (err) {
    logEvent('pdf.read_failed', { path: pdfPath, error: String(err) }, 'error')
    return []
  }
  try {
    const parsed = await parsePdf(buffer)
    const pages = maxPages === undefined ? parsed.pages : parsed.pages.slice(0, Math.max(0, maxPages))
    logEvent('pdf.loaded', { path: pdfPath, pages: pages.length, numPages: parsed.numPages })
    return pages
  } catch (err) {
    logEvent('pdf.parse_failed', { path: pdfPath, error: String(err) }, 'error')
    return []
  }
}
