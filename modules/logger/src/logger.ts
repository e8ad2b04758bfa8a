import * as fs from 'fs'
import { format } from 'logform'
import { errorLike } from 'misc'
import * as path from 'path'
import jsonStringify from 'safe-stable-stringify'
import * as winston from 'winston'

const criticalityLegend: Record<Criticality, number> = {
  high: 0,
  moderate: 100,
  low: 200,
}

export type Criticality = 'high' | 'moderate' | 'low'

export interface Logger {
  /**
   * Writes a progress line to the UI stream (and to the log file). Lines that are less critical than the logger's
   * pickiness only go to the log file.
   */
  print(message: string, criticality?: Criticality): void
  info(message: string, ...rest: unknown[]): void
  debug(message: string, ...rest: unknown[]): void
  error(message: string, err: unknown, ...rest: unknown[]): void
}

export interface RecordedEntry {
  level: 'print' | 'info' | 'debug' | 'error'
  message: string
  err?: unknown
}

/**
 * Keeps every entry in memory. `printed` holds just the UI lines, in order.
 */
export class RecordingLogger implements Logger {
  readonly entries: RecordedEntry[] = []

  get printed(): string[] {
    return this.entries.filter(e => e.level === 'print' || e.level === 'error').map(e => e.message)
  }

  print(message: string) {
    this.entries.push({ level: 'print', message })
  }

  info(message: string) {
    this.entries.push({ level: 'info', message })
  }

  debug(message: string) {
    this.entries.push({ level: 'debug', message })
  }

  error(message: string, err: unknown) {
    this.entries.push({ level: 'error', message, err })
  }
}

export function createDefaultLogger(
  logFile: string,
  pickiness: Criticality,
  logLevel?: Level,
  uiStream?: NodeJS.WritableStream,
): Logger {
  const stat = fs.statSync(logFile, { throwIfNoEntry: false })
  if (stat && stat.size > 0) {
    fs.rmSync(logFile, { force: true })
  }
  return new FileLogger(logFile, pickiness, logLevel, uiStream)
}

class FileLogger implements Logger {
  private readonly logger: winston.Logger
  private readonly pickiness

  constructor(
    logFile: string,
    pickinessLevel: Criticality,
    logLevel: Level = 'info',
    uiStream: NodeJS.WritableStream = process.stdout,
  ) {
    if (!path.isAbsolute(logFile)) {
      throw new Error(`logFile must be absolute: ${logFile}`)
    }
    this.logger = newLogger(logFile, logLevel, uiStream)
    this.pickiness = criticalityLegend[pickinessLevel]
  }

  print(message: string, messageCriticality: Criticality = 'moderate') {
    const messageLevel = criticalityLegend[messageCriticality]
    const doPrint = messageLevel <= this.pickiness
    this.logger.info(message, doPrint ? { ui: true } : {})
  }

  info(message: string, ...rest: unknown[]) {
    this.logger.info(message, ...rest)
  }

  debug(message: string, ...rest: unknown[]) {
    this.logger.debug(message, ...rest)
  }

  error(message: string, err: unknown, ...rest: unknown[]) {
    // winston appends the `message` of this metadata object to `message` and takes its `stack`.
    this.logger.error(message, { ui: true, ...errorLike(err) }, ...rest)
  }
}

const str = (u: unknown) => (typeof u === 'string' ? u : undefined)

const joinTokens = (...tokens: (string | undefined)[]) =>
  tokens
    .map(t => t?.trim())
    .filter(Boolean)
    .join(' ')

const finalFormat = format.printf(info => {
  const { level, message, timestamp, stack, ui: _ui, ...rest } = info
  let stringifiedRest: string | undefined = jsonStringify(rest)
  if (stringifiedRest === '{}') {
    stringifiedRest = undefined
  }

  return joinTokens(str(timestamp), `[${level}]`, str(message), stringifiedRest, str(stack))
})

const filterUi = format(info => {
  if (!info.ui) {
    return false
  }

  return info
})

// Each UI line is "<timestamp>\t<message>" so that progress of long benchmark runs can be followed in the terminal.
const formatUi = format.printf(info => `${str(info.timestamp) ?? ''}\t${joinTokens(str(info.message), str(info.stack))}`)

export type Level = 'error' | 'info' | 'debug'
const levels: Record<Level, number> = {
  error: 0,
  info: 1,
  debug: 2,
}

function newLogger(logFile: string, level: Level, uiStream: NodeJS.WritableStream): winston.Logger {
  return winston.createLogger({
    level: 'debug',
    levels,
    defaultMeta: undefined,
    transports: [
      // Writes all log entries with level `level` and below to logFile.
      new winston.transports.File({
        filename: logFile,
        level,
        format: format.combine(format.timestamp(), format.errors({ stack: true }), finalFormat),
      }),
      // Writes all log entries marked as "UI" to the UI stream (typically, stdout).
      new winston.transports.Stream({
        stream: uiStream,
        level: 'info',
        format: format.combine(format.timestamp(), format.errors({ stack: true }), filterUi(), formatUi),
      }),
    ],
  })
}
