/**
 * Version Resolver
 *
 * Looks up the latest build of a channel from the metadata API.
 * Each channel has its own document at <baseUrl>/<channel>.json, e.g.
 *   { "url": "https://.../nvda_2024.1.exe", "version": "2024.1", "hash": "..." }
 */

import { type Channel, type ReleaseMetadata } from '../types'
import { getEndpointPath } from '../config/channels'
import { defaults } from '../config/defaults'
import { createDecodeError, createNetworkError, logDebug } from './error-handler'
import { defaultFetch, requestOk, type FetchFn } from './http-client'

export type VersionResolverOptions = {
  baseUrl?: string
  fetch?: FetchFn
  userAgent?: string
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value)
    return protocol === 'http:' || protocol === 'https:'
  } catch {
    return false
  }
}

/**
 * Validate a parsed metadata document and build ReleaseMetadata from it
 */
export function decodeReleaseMetadata(
  channel: Channel,
  value: unknown,
  sourceUrl: string,
): ReleaseMetadata {
  if (!isRecord(value)) {
    throw createDecodeError(sourceUrl, 'expected a JSON object')
  }

  const { url, version, hash } = value

  if (typeof url !== 'string' || url.trim() === '') {
    throw createDecodeError(sourceUrl, 'missing "url" field')
  }
  if (!isHttpUrl(url.trim())) {
    throw createDecodeError(sourceUrl, `"url" is not an http(s) URL: ${url}`)
  }
  if (typeof version !== 'string' || version.trim() === '') {
    throw createDecodeError(sourceUrl, 'missing "version" field')
  }
  if (hash !== undefined && hash !== null && typeof hash !== 'string') {
    throw createDecodeError(sourceUrl, '"hash" must be a string')
  }

  return {
    channel,
    url: url.trim(),
    version: version.trim(),
    hash: typeof hash === 'string' && hash.trim() !== '' ? hash.trim() : null,
  }
}

export class VersionResolver {
  private readonly baseUrl: string
  private readonly fetchFn: FetchFn
  private readonly userAgent: string

  constructor(options: VersionResolverOptions = {}) {
    this.baseUrl = (options.baseUrl ?? defaults.baseUrl).replace(/\/+$/, '')
    this.fetchFn = options.fetch ?? defaultFetch
    this.userAgent = options.userAgent ?? defaults.userAgent
  }

  getEndpointUrl(channel: Channel): string {
    return `${this.baseUrl}/${getEndpointPath(channel)}`
  }

  async resolve(channel: Channel): Promise<ReleaseMetadata> {
    const endpoint = this.getEndpointUrl(channel)
    const response = await requestOk(endpoint, this.fetchFn, this.userAgent)

    let body: string
    try {
      body = await response.text()
    } catch (error) {
      throw createNetworkError(endpoint, error)
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(body)
    } catch {
      throw createDecodeError(endpoint, 'response is not valid JSON')
    }

    const metadata = decodeReleaseMetadata(channel, parsed, endpoint)
    logDebug(`Resolved ${channel}`, {
      version: metadata.version,
      url: metadata.url,
    })
    return metadata
  }
}
