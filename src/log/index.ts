import process from 'process'

// resolved on every call, so a replaced console method is honoured
const MAP = [
  'log',
  'debug',
  'info',
  'warn',
  'error'
] as const

export const enum Level {
  LOG = 0,
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4
}

const NAMES: Record<string, Level> = {
  log: Level.LOG,
  debug: Level.DEBUG,
  info: Level.INFO,
  warn: Level.WARN,
  error: Level.ERROR
}

export const parseLevel = (name: string | undefined, fallback = Level.INFO): Level => {
  if (name === undefined) {
    return fallback
  }

  return NAMES[name.trim().toLowerCase()] ?? fallback
}

let threshold = parseLevel(process.env.POOL_LOG_LEVEL)

export const logLevel = () => threshold

export const setLogLevel = (level: Level) => {
  threshold = level
}

export const logg = (msg: string, level = Level.LOG) => {
  // LOG is unconditional, like console.log
  if (level !== Level.LOG && level < threshold) {
    return
  }

  msg = `[${new Date().toISOString()}][${msg}]`

  console[MAP[level ?? Level.LOG]](msg)
}
