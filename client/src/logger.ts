/**
 * Structured component logger
 *
 * Emits one JSON object per line on stderr. The level threshold comes from
 * TXCLIENT_LOG_LEVEL (debug | info | warn | error | silent), default "info".
 */

export type LogLevel = "debug" | "info" | "warn" | "error"
type Threshold = LogLevel | "silent"

export type LogFields = Record<string, unknown>

export interface Logger {
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
}

export type LogSink = (line: string) => void

const LEVEL_RANK: Record<Threshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

let sink: LogSink = (line) => {
  process.stderr.write(line + "\n")
}

let threshold: Threshold = parseThreshold(process.env.TXCLIENT_LOG_LEVEL)

function parseThreshold(raw: string | undefined): Threshold {
  const value = raw?.toLowerCase()
  if (value === "debug" || value === "info" || value === "warn" || value === "error" || value === "silent") {
    return value
  }
  return "info"
}

/** Replace the output sink (tests capture lines this way). Returns the previous sink. */
export function setLogSink(next: LogSink): LogSink {
  const prev = sink
  sink = next
  return prev
}

export function setLogLevel(level: Threshold): void {
  threshold = level
}

function serialize(value: unknown): unknown {
  if (typeof value === "bigint") return value.toString()
  if (value instanceof Uint8Array) return `0x${Buffer.from(value).toString("hex")}`
  if (value instanceof Error) return value.message
  return value
}

function emit(component: string, level: LogLevel, msg: string, fields?: LogFields): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return
  const entry: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level,
    component,
    msg,
  }
  if (fields) {
    for (const [key, value] of Object.entries(fields)) {
      entry[key] = serialize(value)
    }
  }
  sink(JSON.stringify(entry))
}

export function createLogger(component: string): Logger {
  return {
    debug: (msg, fields) => emit(component, "debug", msg, fields),
    info: (msg, fields) => emit(component, "info", msg, fields),
    warn: (msg, fields) => emit(component, "warn", msg, fields),
    error: (msg, fields) => emit(component, "error", msg, fields),
  }
}
