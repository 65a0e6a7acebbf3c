import { createRequire } from 'module'
import { ErrorCodes, NvdlError, isDebugEnabled } from '../core/error-handler'

const require = createRequire(import.meta.url)
const pkg = require('../package.json') as { version: string }

export type Defaults = {
  baseUrl: string
  fallbackFileName: string
  userAgent: string
}

export type NvdlConfig = Defaults & {
  debug: boolean
}

export const packageVersion = pkg.version

/**
 * Default configuration values
 * NVDL_BASE_URL overrides the metadata API location.
 */
export const defaults: Defaults = {
  baseUrl: 'https://nvda.zip',
  // Used when the download URL has no usable file name
  fallbackFileName: 'nvda_installer.exe',
  userAgent: `nvdl/${pkg.version}`,
}

export function normalizeBaseUrl(value: string): string {
  const trimmed = value.trim().replace(/\/+$/, '')

  let parsed: URL
  try {
    parsed = new URL(trimmed)
  } catch {
    throw invalidBaseUrl(value)
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw invalidBaseUrl(value)
  }

  return trimmed
}

function invalidBaseUrl(value: string): NvdlError {
  return new NvdlError(
    ErrorCodes.CONFIG_INVALID,
    `NVDL_BASE_URL is not an http(s) URL: "${value}"`,
    'error',
    'Unset NVDL_BASE_URL to use the default API',
    { baseUrl: value },
  )
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): NvdlConfig {
  const baseUrl = env.NVDL_BASE_URL?.trim()
    ? normalizeBaseUrl(env.NVDL_BASE_URL)
    : defaults.baseUrl

  return {
    ...defaults,
    baseUrl,
    debug: isDebugEnabled(env),
  }
}
