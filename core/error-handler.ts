/**
 * Error Handler
 *
 * Centralized error handling with user feedback on stderr.
 * - Every failure in the resolve/download flow is an NvdlError with a code
 * - CLI commands log and exit (no blocking for scripts/CI)
 * - Debug output only appears with DEBUG=nvdl; nothing is written to disk
 */

import chalk from 'chalk'

export type ErrorSeverity = 'fatal' | 'error' | 'warning' | 'info'

export type NvdlErrorInfo = {
  code: string
  message: string
  severity: ErrorSeverity
  suggestion?: string
  context?: Record<string, unknown>
}

export const ErrorCodes = {
  // Resolver / fetcher errors
  NETWORK_ERROR: 'NETWORK_ERROR',
  HTTP_STATUS_ERROR: 'HTTP_STATUS_ERROR',
  DECODE_ERROR: 'DECODE_ERROR',
  CHECKSUM_UNAVAILABLE: 'CHECKSUM_UNAVAILABLE',

  // Local errors
  IO_ERROR: 'IO_ERROR',
  LAUNCH_ERROR: 'LAUNCH_ERROR',

  // Input errors
  INVALID_CHANNEL: 'INVALID_CHANNEL',
  CONFIG_INVALID: 'CONFIG_INVALID',

  // General errors
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

export class NvdlError extends Error {
  public readonly code: ErrorCode
  public readonly severity: ErrorSeverity
  public readonly suggestion?: string
  public readonly context?: Record<string, unknown>

  constructor(
    code: ErrorCode,
    message: string,
    severity: ErrorSeverity = 'error',
    suggestion?: string,
    context?: Record<string, unknown>,
  ) {
    super(message)
    this.name = 'NvdlError'
    this.code = code
    this.severity = severity
    this.suggestion = suggestion
    this.context = context

    Error.captureStackTrace(this, NvdlError)
  }

  /**
   * Create NvdlError from an unknown error
   */
  static from(
    error: unknown,
    code: ErrorCode = ErrorCodes.UNKNOWN_ERROR,
    suggestion?: string,
  ): NvdlError {
    if (error instanceof NvdlError) {
      return error
    }

    return new NvdlError(code, describeError(error), 'error', suggestion, {
      originalError: error instanceof Error ? error.stack : undefined,
    })
  }
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

function getErrnoCode(error: unknown): string | undefined {
  if (!(error instanceof Error)) return undefined
  const code = (error as NodeJS.ErrnoException).code
  return typeof code === 'string' ? code : undefined
}

export function isDebugEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const debug = env.DEBUG?.trim().toLowerCase()
  return debug === 'nvdl' || debug === '*'
}

/**
 * Format severity for console output
 */
function formatSeverity(severity: ErrorSeverity): string {
  switch (severity) {
    case 'fatal':
      return chalk.red.bold('[FATAL]')
    case 'error':
      return chalk.red('[ERROR]')
    case 'warning':
      return chalk.yellow('[WARN]')
    case 'info':
      return chalk.blue('[INFO]')
  }
}

function formatContext(context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) return ''
  return ' ' + chalk.gray(JSON.stringify(context))
}

/**
 * Log an error to the console
 * This is for CLI commands - displays error and returns (no blocking)
 */
export function logError(error: NvdlErrorInfo): void {
  const prefix = formatSeverity(error.severity)
  console.error(`${prefix} [${error.code}] ${error.message}`)

  if (error.suggestion) {
    console.error(chalk.yellow(`  Suggestion: ${error.suggestion}`))
  }

  if (isDebugEnabled() && error.context) {
    console.error(chalk.gray(`  Context: ${JSON.stringify(error.context)}`))
  }
}

/**
 * Log an NvdlError instance
 */
export function logNvdlError(error: NvdlError): void {
  logError({
    code: error.code,
    message: error.message,
    severity: error.severity,
    suggestion: error.suggestion,
    context: error.context,
  })
}

/**
 * Log a debug message (stderr, only with DEBUG=nvdl)
 */
export function logDebug(
  message: string,
  context?: Record<string, unknown>,
): void {
  if (!isDebugEnabled()) return
  console.error(chalk.gray(`[DEBUG] ${message}`) + formatContext(context))
}

export function createNetworkError(url: string, cause: unknown): NvdlError {
  return new NvdlError(
    ErrorCodes.NETWORK_ERROR,
    `Request to ${url} failed: ${describeError(cause)}`,
    'error',
    'Check your internet connection and try again',
    { url },
  )
}

export function createHttpStatusError(
  url: string,
  status: number,
  statusText: string,
): NvdlError {
  const suggestion =
    status === 404
      ? 'The requested release may not be published right now'
      : status >= 500
        ? 'The server is having problems, try again later'
        : undefined

  return new NvdlError(
    ErrorCodes.HTTP_STATUS_ERROR,
    `Request to ${url} failed: HTTP ${status}${statusText ? ` ${statusText}` : ''}`,
    'error',
    suggestion,
    { url, status },
  )
}

/**
 * Create an error for a metadata response that is not the expected JSON shape
 */
export function createDecodeError(url: string, detail: string): NvdlError {
  return new NvdlError(
    ErrorCodes.DECODE_ERROR,
    `Unexpected response from ${url}: ${detail}`,
    'error',
    undefined,
    { url },
  )
}

export function createIoError(path: string, cause: unknown): NvdlError {
  const errno = getErrnoCode(cause)
  const suggestions: Record<string, string> = {
    EACCES: 'Run nvdl from a directory you can write to',
    EPERM: 'Run nvdl from a directory you can write to',
    EISDIR: `Remove or rename the directory at ${path}`,
    ENOSPC: 'Free up some disk space and try again',
  }

  return new NvdlError(
    ErrorCodes.IO_ERROR,
    `Could not write ${path}: ${describeError(cause)}`,
    'error',
    errno ? suggestions[errno] : undefined,
    { path, errno },
  )
}

export function createLaunchError(path: string, cause: unknown): NvdlError {
  return new NvdlError(
    ErrorCodes.LAUNCH_ERROR,
    `Could not run ${path}: ${describeError(cause)}`,
    'warning',
    'Run the installer manually from the current directory',
    { path },
  )
}
