import chalk from 'chalk'

/**
 * Color theme for nvdl CLI
 */
export const theme = {
  version: chalk.yellow,
  path: chalk.gray,

  icons: {
    info: chalk.blue('ℹ'),
  },
}

/**
 * Format an info message
 */
export function info(message: string): string {
  return `${theme.icons.info} ${message}`
}

/**
 * Format bytes into human-readable format (B, KB, MB, GB)
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B'
  const units = ['B', 'KB', 'MB', 'GB', 'TB']
  const i = Math.min(
    units.length - 1,
    Math.floor(Math.log(bytes) / Math.log(1024)),
  )
  const value = bytes / Math.pow(1024, i)
  return `${value.toFixed(1)} ${units[i]}`
}

/**
 * Progress text for a running download
 */
export function formatProgress(received: number, total: number | null): string {
  if (total === null || total === 0) {
    return formatBytes(received)
  }
  const percent = Math.min(100, Math.floor((received / total) * 100))
  return `${formatBytes(received)} / ${formatBytes(total)} (${percent}%)`
}
