/**
 * Artifact Fetcher
 *
 * Turns resolved release metadata into either the bare download URL or an
 * installer file saved next to the user. The file is created or truncated
 * on every run, so downloading the same release twice overwrites it with
 * the same bytes. A failed download leaves whatever was written in place.
 */

import { createWriteStream } from 'fs'
import { basename, join } from 'path'
import { Readable } from 'stream'
import { pipeline } from 'stream/promises'
import {
  type DownloadRequest,
  type FetchMode,
  type FetchOutcome,
  type ProgressCallback,
  type ReleaseMetadata,
} from '../types'
import { defaults } from '../config/defaults'
import { createIoError, createNetworkError, logDebug } from './error-handler'
import { defaultFetch, requestOk, type FetchFn } from './http-client'

export type ArtifactFetcherOptions = {
  directory?: string
  fallbackFileName?: string
  fetch?: FetchFn
  userAgent?: string
  onProgress?: ProgressCallback
}

/**
 * Derive a local file name from the last path segment of a URL.
 * Query strings and fragments are ignored.
 */
export function getFileNameFromUrl(url: string, fallback: string): string {
  let pathname: string
  try {
    pathname = new URL(url).pathname
  } catch {
    return fallback
  }

  const segment = pathname.split('/').pop() ?? ''
  let decoded: string
  try {
    decoded = decodeURIComponent(segment)
  } catch {
    decoded = segment
  }

  if (
    decoded === '' ||
    decoded === '.' ||
    decoded === '..' ||
    decoded !== basename(decoded) ||
    decoded.includes('\\')
  ) {
    return fallback
  }
  return decoded
}

function parseContentLength(response: Response): number | null {
  const header = response.headers.get('content-length')
  if (header === null) return null
  const length = Number.parseInt(header, 10)
  return Number.isFinite(length) && length >= 0 ? length : null
}

export class ArtifactFetcher {
  private readonly directory: string
  private readonly fallbackFileName: string
  private readonly fetchFn: FetchFn
  private readonly userAgent: string
  private readonly onProgress?: ProgressCallback

  constructor(options: ArtifactFetcherOptions = {}) {
    this.directory = options.directory ?? process.cwd()
    this.fallbackFileName =
      options.fallbackFileName ?? defaults.fallbackFileName
    this.fetchFn = options.fetch ?? defaultFetch
    this.userAgent = options.userAgent ?? defaults.userAgent
    this.onProgress = options.onProgress
  }

  createDownloadRequest(url: string): DownloadRequest {
    const fileName = getFileNameFromUrl(url, this.fallbackFileName)
    return { url, filePath: join(this.directory, fileName) }
  }

  async fetch(
    metadata: ReleaseMetadata,
    mode: FetchMode,
    onProgress: ProgressCallback | undefined = this.onProgress,
  ): Promise<FetchOutcome> {
    if (mode === 'url-only') {
      return { kind: 'url', url: metadata.url }
    }

    const request = this.createDownloadRequest(metadata.url)
    const bytes = await this.download(request, onProgress)
    return {
      kind: 'downloaded',
      filePath: request.filePath,
      fileName: basename(request.filePath),
      bytes,
    }
  }

  /**
   * Stream the remote file to disk, returning the number of bytes written
   */
  async download(
    request: DownloadRequest,
    onProgress?: ProgressCallback,
  ): Promise<number> {
    const { url, filePath } = request
    const response = await requestOk(url, this.fetchFn, this.userAgent)
    const total = parseContentLength(response)

    const source = response.body
      ? Readable.fromWeb(response.body)
      : Readable.from([])

    const fileStream = createWriteStream(filePath, { flags: 'w' })
    // pipeline destroys every stream with the first error, so keep the
    // order in which each side failed
    const failures: Array<{ side: 'read' | 'write'; error: Error }> = []
    source.once('error', (error) => failures.push({ side: 'read', error }))
    fileStream.once('error', (error) => failures.push({ side: 'write', error }))

    let received = 0
    try {
      await pipeline(
        source,
        async function* (chunks: AsyncIterable<Uint8Array>) {
          for await (const chunk of chunks) {
            received += chunk.length
            onProgress?.(received, total)
            yield chunk
          }
        },
        fileStream,
      )
    } catch (error) {
      const first = failures.at(0)
      if (first?.side === 'write') {
        throw createIoError(filePath, first.error)
      }
      throw createNetworkError(url, error)
    }

    logDebug(`Saved ${url}`, { filePath, bytes: received })
    return received
  }
}
