import { Argument, Command, InvalidArgumentError } from 'commander'
import {
  CHANNELS,
  DEFAULT_CHANNEL,
  getChannelDescription,
  parseChannel,
} from '../../config/channels'
import { getConfig } from '../../config/defaults'
import { ArtifactFetcher } from '../../core/artifact-fetcher'
import {
  ErrorCodes,
  NvdlError,
  logDebug,
  logNvdlError,
} from '../../core/error-handler'
import {
  createLaunchCapability,
  type LaunchCapability,
} from '../../core/launch-capability'
import { VersionResolver } from '../../core/version-resolver'
import {
  type Channel,
  type ConfirmFn,
  type FetchMode,
  type FetchOutcome,
  type ReleaseMetadata,
} from '../../types'
import { promptConfirm } from '../ui/prompts'
import { withSpinner } from '../ui/spinner'
import { formatBytes, formatProgress, info, theme } from '../ui/theme'

export type GetOptions = {
  url?: boolean
  checksum?: boolean
  json?: boolean
}

export type GetCommandDeps = {
  resolver: Pick<VersionResolver, 'resolve'>
  fetcher: Pick<ArtifactFetcher, 'fetch'>
  launch: LaunchCapability
  confirm: ConfirmFn
  // Machine-readable output (URL, hash, JSON)
  write: (text: string) => void
}

export function createDefaultDeps(): GetCommandDeps {
  const config = getConfig()
  if (config.debug) {
    logDebug('Configuration', { ...config })
  }
  return {
    resolver: new VersionResolver({
      baseUrl: config.baseUrl,
      userAgent: config.userAgent,
    }),
    fetcher: new ArtifactFetcher({
      fallbackFileName: config.fallbackFileName,
      userAgent: config.userAgent,
    }),
    launch: createLaunchCapability(),
    confirm: promptConfirm,
    write: (text) => process.stdout.write(text),
  }
}

function requireHash(metadata: ReleaseMetadata): string {
  if (metadata.hash === null) {
    throw new NvdlError(
      ErrorCodes.CHECKSUM_UNAVAILABLE,
      `No checksum is published for NVDA ${metadata.version} (${metadata.channel})`,
      'error',
      'Use --url to get the download link instead',
      { channel: metadata.channel, version: metadata.version },
    )
  }
  return metadata.hash
}

/**
 * Text printed instead of downloading the installer at `link`
 */
export function formatMetadataOutput(
  metadata: ReleaseMetadata,
  link: string,
  options: GetOptions,
): string {
  if (options.json) {
    const { channel, version, hash } = metadata
    return JSON.stringify({ channel, version, url: link, hash }, null, 2)
  }
  if (options.url && options.checksum) {
    return `${link} (${requireHash(metadata)})`
  }
  if (options.checksum) {
    return requireHash(metadata)
  }
  return link
}

export function getFetchMode(options: GetOptions): FetchMode {
  return options.url || options.checksum || options.json
    ? 'url-only'
    : 'download'
}

async function downloadAndOffer(
  metadata: ReleaseMetadata,
  deps: GetCommandDeps,
): Promise<void> {
  const label = `Downloading NVDA ${theme.version(metadata.version)}...`

  const outcome = await withSpinner<FetchOutcome>(
    label,
    (updateText) =>
      deps.fetcher.fetch(metadata, 'download', (received, total) =>
        updateText(`${label} ${formatProgress(received, total)}`),
      ),
    (result) =>
      result.kind === 'downloaded'
        ? `Downloaded ${theme.path(result.fileName)} to the current directory (${formatBytes(result.bytes)})`
        : label,
    'Download failed',
  )

  if (outcome.kind !== 'downloaded') return

  const launch = await deps.launch.offer(outcome.filePath, deps.confirm)
  switch (launch.status) {
    case 'launched':
      console.log(info('Running installer...'))
      break
    case 'failed':
      logNvdlError(NvdlError.from(launch.error, ErrorCodes.LAUNCH_ERROR))
      break
    case 'declined':
    case 'unavailable':
      logDebug(`Installer not started (${launch.status})`, {
        filePath: outcome.filePath,
      })
      break
  }
}

/**
 * Resolve a channel and print or download its installer.
 * Returns the process exit code.
 */
export async function executeGet(
  channelInput: string,
  options: GetOptions,
  loadDeps: () => GetCommandDeps = createDefaultDeps,
): Promise<number> {
  try {
    const deps = loadDeps()
    const channel = parseChannel(channelInput)
    const metadata = await deps.resolver.resolve(channel)
    const mode = getFetchMode(options)

    if (mode === 'download') {
      await downloadAndOffer(metadata, deps)
      return 0
    }

    const outcome = await deps.fetcher.fetch(metadata, mode)
    const link = outcome.kind === 'url' ? outcome.url : outcome.filePath
    deps.write(formatMetadataOutput(metadata, link, options) + '\n')
    return 0
  } catch (err) {
    logNvdlError(NvdlError.from(err))
    return 1
  }
}

/**
 * Commander parser for the channel argument; accepts any letter case
 */
export function parseChannelArgument(value: string): Channel {
  try {
    return parseChannel(value)
  } catch {
    throw new InvalidArgumentError(
      `Allowed choices are ${CHANNELS.join(', ')}.`,
    )
  }
}

function channelHelp(): string {
  const lines = CHANNELS.map(
    (channel) => `  ${channel.padEnd(8)}${getChannelDescription(channel)}`,
  )
  return ['', 'Channels:', ...lines].join('\n')
}

export function createGetCommand(
  loadDeps: () => GetCommandDeps = createDefaultDeps,
): Command {
  return new Command('nvdl')
    .description(
      'Retrieve a direct download link or download the NVDA screen reader',
    )
    .addArgument(
      new Argument('[channel]', 'The NVDA version to retrieve')
        .argParser(parseChannelArgument)
        .default(DEFAULT_CHANNEL),
    )
    .option(
      '-u, --url',
      "Display the installer's direct download link rather than downloading it",
    )
    .option(
      '-c, --checksum',
      "Display the installer's hash rather than downloading it",
    )
    .option('-j, --json', 'Output the release metadata as JSON')
    .addHelpText('after', channelHelp())
    .action(async (channel: string, options: GetOptions) => {
      const code = await executeGet(channel, options, loadDeps)
      if (code !== 0) {
        process.exit(code)
      }
    })
}
