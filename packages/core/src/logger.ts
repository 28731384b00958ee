export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogSink = (line: string) => void

export type LoggerOptions = {
  level?: LogLevel
  color?: boolean
  stdout?: LogSink
  stderr?: LogSink
}

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error']

const colors = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  dim: '\x1b[2m',
}

type Color = keyof typeof colors

export function shouldUseColor(
  stream: { isTTY?: boolean } = process.stdout,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (env['NO_COLOR'] !== undefined) return false
  return stream.isTTY === true
}

/**
 * Leveled console logger. Steps, successes and warnings go to stdout,
 * errors to stderr.
 */
export class Logger {
  private level: LogLevel
  private readonly color: boolean
  private readonly stdout: LogSink
  private readonly stderr: LogSink

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info'
    this.color = options.color ?? shouldUseColor()
    this.stdout = options.stdout ?? ((line) => console.log(line))
    this.stderr = options.stderr ?? ((line) => console.error(line))
  }

  setLevel(level: LogLevel): void {
    this.level = level
  }

  getLevel(): LogLevel {
    return this.level
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level)
  }

  debug(message: string): void {
    if (this.isEnabled('debug')) {
      this.stdout(this.paint('dim', `debug: ${message}`))
    }
  }

  info(message: string): void {
    if (this.isEnabled('info')) {
      this.stdout(message)
    }
  }

  step(message: string): void {
    if (this.isEnabled('info')) {
      this.stdout(`${this.paint('cyan', '▶')} ${message}`)
    }
  }

  success(message: string): void {
    if (this.isEnabled('info')) {
      this.stdout(`${this.paint('green', '✓')} ${message}`)
    }
  }

  warn(message: string): void {
    if (this.isEnabled('warn')) {
      this.stdout(`${this.paint('yellow', '⚠')} ${message}`)
    }
  }

  error(message: string): void {
    if (this.isEnabled('error')) {
      this.stderr(`${this.paint('red', '✗')} ${message}`)
    }
  }

  private paint(color: Color, text: string): string {
    return this.color ? `${colors[color]}${text}${colors.reset}` : text
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options)
}
