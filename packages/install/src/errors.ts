export type ErrorKind =
  | 'config'
  | 'transport'
  | 'integrity'
  | 'install'
  | 'verification'

/**
 * A failure of one installer stage. `exitCode` becomes the process exit code.
 */
export class BuildtoolsError extends Error {
  readonly kind: ErrorKind
  readonly exitCode: number

  constructor(
    kind: ErrorKind,
    message: string,
    options: { exitCode?: number; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause })
    this.name = 'BuildtoolsError'
    this.kind = kind
    this.exitCode = options.exitCode && options.exitCode > 0 ? options.exitCode : 1
  }
}

export type StageResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: BuildtoolsError }

export function ok<T>(value: T): StageResult<T> {
  return { ok: true, value }
}

export function fail<T>(
  kind: ErrorKind,
  message: string,
  options?: { exitCode?: number; cause?: unknown },
): StageResult<T> {
  return { ok: false, error: new BuildtoolsError(kind, message, options) }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`
  }
  return String(error)
}
