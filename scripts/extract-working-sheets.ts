import { ZodError } from 'zod'
import { runExtraction } from '@/lib/extract/runExtraction'

function getArg(name: string): string | undefined {
  const arg = process.argv.find((a) => a.startsWith(`${name}=`))
  if (arg) return arg.split('=').slice(1).join('=')
  const i = process.argv.indexOf(name)
  if (i >= 0 && i + 1 < process.argv.length) return process.argv[i + 1]
  return undefined
}

function usage() {
  console.log(
    'Usage: extract-working-sheets --input <file.pdf> [--profile <kind>] [--output <dir>] [--json <file>] [--split]',
  )
}

async function main() {
  if (process.argv.includes('--help')) {
    usage()
    return
  }

  const { doc, summary, snapshotPath, written } = await runExtraction({
    input: getArg('--input') ?? '',
    profile: getArg('--profile'),
    output: getArg('--output'),
    json: getArg('--json'),
    split: process.argv.includes('--split'),
  })

  console.log(`${doc.filename}: ${summary.buckets} working sheet ids`)
  const sheets = doc.toSheetsRecord()
  for (const id of doc.ids()) {
    for (const [name, pages] of Object.entries(sheets[id] ?? {})) {
      console.log(`  AB ${id}  ${name}  [${pages.join(', ')}]`)
    }
  }
  console.log(`Snapshot: ${snapshotPath}`)
  if (written.length) console.log(`Wrote ${written.length} PDF files`)
}

main().catch((err) => {
  if (err instanceof ZodError) {
    usage()
    console.error(err.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('\n'))
  } else {
    console.error(err)
  }
  process.exitCode = 1
})
