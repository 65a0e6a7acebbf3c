import ora, { type Ora } from 'ora'

/**
 * Create a spinner with consistent styling
 */
export function createSpinner(text: string): Ora {
  return ora({
    text,
    color: 'cyan',
    spinner: 'dots',
  })
}

/**
 * Run an async operation with a spinner.
 * On failure the spinner shows `failText` and the error is rethrown for
 * the caller to report.
 */
export async function withSpinner<T>(
  text: string,
  operation: (updateText: (message: string) => void) => Promise<T>,
  successText?: (result: T) => string,
  failText: string = 'Failed',
): Promise<T> {
  const spinner = createSpinner(text)
  spinner.start()

  try {
    const result = await operation((message: string) => {
      spinner.text = message
    })
    spinner.succeed(successText?.(result))
    return result
  } catch (err) {
    spinner.fail(failText)
    throw err
  }
}
