import fs from 'node:fs'
import path from 'node:path'
import { getConfig, type LogLevel } from '@/lib/config/env'

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 }

export type EventLevel = Exclude<LogLevel, 'silent'>

export function logEvent(event: string, payload: unknown, level: EventLevel = 'info') {
  const { LOG_LEVEL, LOG_DIR } = getConfig()
  if (RANK[level] < RANK[LOG_LEVEL]) return
  const line = JSON.stringify({ ts: new Date().toISOString(), level, event, payload })
  if (level === 'warn' || level === 'error') {
    console.error(`[${level}]`, event, payload)
  }
  try {
    const dir = path.resolve(process.cwd(), LOG_DIR)
    fs.mkdirSync(dir, { recursive: true })
    const file = path.join(dir, 'app.jsonl')
    fs.appendFileSync(file, line + '\n', 'utf8')
  } catch (err) {
    console.log('[log]', line, String(err))
  }
}
