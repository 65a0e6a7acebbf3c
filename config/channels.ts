import { Channel } from '../types'
import { ErrorCodes, NvdlError } from '../core/error-handler'

export const DEFAULT_CHANNEL = Channel.Stable

export const CHANNELS: readonly Channel[] = [
  Channel.Stable,
  Channel.Alpha,
  Channel.Beta,
  Channel.XP,
  Channel.Win7,
]

/**
 * Help text shown for each channel
 */
export function getChannelDescription(channel: Channel): string {
  switch (channel) {
    case Channel.Stable:
      return 'Stable release version'
    case Channel.Alpha:
      return 'Snapshot alpha version'
    case Channel.Beta:
      return 'Beta release version'
    case Channel.XP:
      return 'The last version compatible with Windows XP'
    case Channel.Win7:
      return 'The last version compatible with Windows 7'
  }
}

/**
 * Path of the metadata document for a channel, relative to the API base URL
 */
export function getEndpointPath(channel: Channel): string {
  switch (channel) {
    case Channel.Stable:
      return 'stable.json'
    case Channel.Alpha:
      return 'alpha.json'
    case Channel.Beta:
      return 'beta.json'
    case Channel.XP:
      return 'xp.json'
    case Channel.Win7:
      return 'win7.json'
  }
}

export function isChannel(value: string): value is Channel {
  return CHANNELS.some((channel) => channel === value)
}

export function parseChannel(input: string): Channel {
  const normalized = input.trim().toLowerCase()
  if (isChannel(normalized)) {
    return normalized
  }

  throw new NvdlError(
    ErrorCodes.INVALID_CHANNEL,
    `Unknown channel "${input}"`,
    'error',
    `Valid channels: ${CHANNELS.join(', ')}`,
    { channel: input },
  )
}
