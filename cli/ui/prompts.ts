import inquirer from 'inquirer'
import { describeError, logDebug } from '../../core/error-handler'

/**
 * Prompt for a yes/no confirmation.
 * Answers false when there is no terminal to ask on or the prompt is
 * aborted (Ctrl+C), so callers treat "cannot ask" the same as "no".
 */
export async function promptConfirm(
  message: string,
  defaultValue: boolean = true,
): Promise<boolean> {
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    logDebug('Not a terminal, skipping prompt', { message })
    return false
  }

  try {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      {
        type: 'confirm',
        name: 'confirmed',
        message,
        default: defaultValue,
      },
    ])
    return confirmed
  } catch (err) {
    logDebug('Prompt aborted', { message, error: describeError(err) })
    return false
  }
}
