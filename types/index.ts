/**
 * Release channels published by the metadata API.
 * Each value doubles as the endpoint path segment.
 */
export enum Channel {
  Stable = 'stable',
  Alpha = 'alpha',
  Beta = 'beta',
  XP = 'xp',
  Win7 = 'win7',
}

export type ReleaseMetadata = {
  channel: Channel
  url: string
  version: string
  // Published hash of the installer, when the API provides one
  hash: string | null
}

export type DownloadRequest = {
  url: string
  filePath: string
}

export type FetchMode = 'url-only' | 'download'

export type FetchOutcome =
  | { kind: 'url'; url: string }
  | { kind: 'downloaded'; filePath: string; fileName: string; bytes: number }

export type ProgressCallback = (received: number, total: number | null) => void

export type LaunchResult =
  | { status: 'launched'; filePath: string }
  | { status: 'declined' }
  | { status: 'unavailable' }
  | { status: 'failed'; error: Error }

export type ConfirmFn = (
  message: string,
  defaultValue: boolean,
) => Promise<boolean>
