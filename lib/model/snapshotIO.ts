import fs from 'node:fs/promises'
import path from 'node:path'
import Ajv2020 from 'ajv/dist/2020'
import { logEvent } from '@/lib/logging/logger'
import { WorkbookDocument } from '@/lib/model/workbookDocument'
import { workingSheetsSchema } from '@/lib/schema/workingSheets'

const ajv = new Ajv2020({ allErrors: true })
const validateWorkingSheets = ajv.compile(workingSheetsSchema)

export class SnapshotValidationError extends Error {
  constructor(message: string, readonly details: string) {
    super(message)
    this.name = 'SnapshotValidationError'
  }
}

export function snapshotErrors(data: unknown): string | null {
  if (validateWorkingSheets(data)) return null
  return ajv.errorsText(validateWorkingSheets.errors)
}

export async function saveSnapshot(doc: WorkbookDocument, file: string): Promise<string> {
  const snapshot = doc.toSnapshot()
  const errors = snapshotErrors(snapshot)
  if (errors) {
    throw new SnapshotValidationError(`Snapshot of ${doc.filename} does not match schema`, errors)
  }
  await fs.mkdir(path.dirname(path.resolve(file)), { recursive: true })
  await fs.writeFile(file, JSON.stringify(snapshot, null, 2) + '\n', 'utf8')
  logEvent('snapshot.saved', { file, buckets: doc.bucketCount })
  return file
}

/**
 * Loads a stored snapshot. Schema violations are reported and the valid part
 * is still loaded; unreadable files give an empty document.
 */
export async function readSnapshot(file: string): Promise<WorkbookDocument> {
  let data: unknown
  try {
    data = JSON.parse(await fs.readFile(file, 'utf8'))
  } catch (err) {
    logEvent('snapshot.read_failed', { file, error: String(err) }, 'warn')
    return new WorkbookDocument('', '')
  }
  const errors = snapshotErrors(data)
  if (errors) logEvent('snapshot.schema_mismatch', { file, errors }, 'warn')
  return WorkbookDocument.fromSnapshot(data)
}
