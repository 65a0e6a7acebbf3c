/**
 * Launch Capability
 *
 * Whether nvdl can offer to run a downloaded installer is decided once at
 * startup, the same way the platform service is picked per OS. Only Windows
 * can run the installer; everywhere else the offer is a silent no-op.
 */

import { spawn } from 'child_process'
import { dirname } from 'path'
import { type ConfirmFn, type LaunchResult } from '../types'
import { createLaunchError, logDebug } from './error-handler'

export const LAUNCH_PROMPT = 'Installer downloaded. Run now?'

/**
 * Start a file as an independent process. Resolves once the OS has
 * started it; never waits for it to exit.
 */
export type Spawner = (filePath: string) => Promise<void>

export const spawnDetached: Spawner = (filePath) =>
  new Promise<void>((resolve, reject) => {
    const child = spawn(filePath, [], {
      cwd: dirname(filePath),
      detached: true,
      stdio: 'ignore',
      windowsHide: false,
    })
    child.once('error', reject)
    child.once('spawn', () => {
      child.unref()
      resolve()
    })
  })

export interface LaunchCapability {
  readonly available: boolean

  /**
   * Ask whether to run the installer and start it on a yes
   */
  offer(filePath: string, confirm: ConfirmFn): Promise<LaunchResult>
}

export class AvailableLaunchCapability implements LaunchCapability {
  readonly available = true

  constructor(private readonly spawner: Spawner = spawnDetached) {}

  async offer(filePath: string, confirm: ConfirmFn): Promise<LaunchResult> {
    const accepted = await confirm(LAUNCH_PROMPT, true)
    if (!accepted) {
      return { status: 'declined' }
    }

    try {
      await this.spawner(filePath)
    } catch (error) {
      return { status: 'failed', error: createLaunchError(filePath, error) }
    }

    logDebug('Installer started', { filePath })
    return { status: 'launched', filePath }
  }
}

export class UnavailableLaunchCapability implements LaunchCapability {
  readonly available = false

  async offer(filePath: string): Promise<LaunchResult> {
    logDebug('Launching installers is not supported here', { filePath })
    return { status: 'unavailable' }
  }
}

/**
 * Create the launch capability for the current OS
 */
export function createLaunchCapability(
  platform: NodeJS.Platform = process.platform,
  spawner: Spawner = spawnDetached,
): LaunchCapability {
  switch (platform) {
    case 'win32':
      return new AvailableLaunchCapability(spawner)
    default:
      return new UnavailableLaunchCapability()
  }
}
