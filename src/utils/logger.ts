import { colorize, type ColorName } from './colors'
import { isRecord } from './guards'

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

interface Logger {
  readonly info: (msg: string) => void
  readonly warn: (msg: string) => void
  readonly error: (msg: string) => void
  readonly debug: (msg: string) => void
  readonly success: (msg: string) => void
  readonly note: (msg: string) => void
  readonly step: (index: number, total: number, msg: string) => void
  readonly plain: (msg: string) => void
  readonly section: (title: string) => void
  readonly highlight: (msg: string, color: ColorName) => string
  readonly icon: (emoji: string, ascii: string) => string
  readonly json: (val: unknown) => void
  readonly setLevel: (lvl: LogLevel) => void
  readonly setJsonOnly: (on: boolean) => void
  readonly setNoEmoji: (on: boolean) => void
  readonly setJsonCompact: (on: boolean) => void
  readonly setTimestamps: (on: boolean) => void
  readonly isJsonOnly: () => boolean
}

let level: LogLevel = 'info'
let jsonOnly = false
let noEmoji = false
let jsonCompact = false
let timestampsOn = false

const RANK: Readonly<Record<LogLevel, number>> = { error: 0, warn: 1, info: 2, debug: 3 }

function enabled(kind: LogLevel): boolean {
  if (jsonOnly) return false
  return RANK[kind] <= RANK[level]
}

function write(kind: LogLevel, msg: string): void {
  if (!enabled(kind)) return
  const prefix: string = noEmoji
    ? (kind === 'error' ? '[error]' : kind === 'warn' ? '[warn]' : kind === 'info' ? '[info]' : '[debug]')
    : (kind === 'error' ? '✖' : kind === 'warn' ? '⚠' : kind === 'info' ? 'ℹ' : '•')
  const ts: string = timestampsOn ? `${new Date().toISOString()} ` : ''
  // Leave already-coloured messages untouched
  const hasAnsi: boolean = msg.includes('\u001b[')
  const colored: string = hasAnsi ? msg : (kind === 'error'
    ? colorize('red', msg)
    : kind === 'warn'
      ? colorize('yellow', msg)
      : kind === 'info'
        ? colorize('cyan', msg)
        : msg)
  // eslint-disable-next-line no-console
  console[kind === 'error' ? 'error' : 'log'](`${ts}${prefix} ${colored}`)
}

function enrichJson(val: unknown): unknown {
  if (!timestampsOn) return val
  if (isRecord(val)) {
    const obj: Record<string, unknown> = { ...val }
    if (obj.ts === undefined) obj.ts = new Date().toISOString()
    return obj
  }
  return val
}

export const logger: Logger = {
  info: (msg: string): void => { write('info', msg) },
  warn: (msg: string): void => { write('warn', msg) },
  error: (msg: string): void => { write('error', msg) },
  debug: (msg: string): void => { write('debug', msg) },
  success: (msg: string): void => { write('info', colorize('green', `${noEmoji ? '[ok]' : '✓'} ${msg}`)) },
  note: (msg: string): void => { write('info', colorize('blue', `${noEmoji ? '[note]' : '✱'} ${msg}`)) },
  step: (index: number, total: number, msg: string): void => {
    if (!enabled('info')) return
    // eslint-disable-next-line no-console
    console.log(`  ${colorize('dim', `[${index}/${total}]`)} ${msg}`)
  },
  plain: (msg: string): void => {
    if (!enabled('info')) return
    // eslint-disable-next-line no-console
    console.log(msg)
  },
  section: (title: string): void => {
    if (!enabled('info')) return
    const bar = '─'.repeat(Math.max(12, Math.min(60, title.length + 10)))
    // eslint-disable-next-line no-console
    console.log(`${colorize('cyan', bar)}\n${colorize('bold', title)}\n${colorize('cyan', bar)}`)
  },
  highlight: (msg: string, color: ColorName): string => colorize(color, msg),
  icon: (emoji: string, ascii: string): string => noEmoji ? ascii : emoji,
  json: (val: unknown): void => {
    const v = enrichJson(val)
    const line: string = jsonCompact ? JSON.stringify(v) : JSON.stringify(v, null, 2)
    // eslint-disable-next-line no-console
    console.log(line)
  },
  setLevel: (lvl: LogLevel): void => { level = lvl },
  setJsonOnly: (on: boolean): void => { jsonOnly = on },
  setNoEmoji: (on: boolean): void => { noEmoji = on },
  setJsonCompact: (on: boolean): void => { jsonCompact = on },
  setTimestamps: (on: boolean): void => { timestampsOn = on },
  isJsonOnly: (): boolean => jsonOnly
}
