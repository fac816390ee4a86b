import { createSpinner } from 'nanospinner'

/**
 * Run a quiet step behind a spinner.
 *
 * The spinner ends with a success mark when the step resolves and an error
 * mark when it rejects; the rejection is passed on unchanged.
 *
 * @param text - Spinner text.
 * @param step - Step to run.
 * @param done - Optional text for the success mark.
 * @returns Value of the step.
 */
export async function runStep<T>(
  text: string,
  step: () => Promise<T>,
  done?: (value: T) => string,
): Promise<T> {
  let spinner = createSpinner(text).start()
  try {
    let value = await step()
    spinner.success(done ? done(value) : text)
    return value
  } catch (error) {
    spinner.error(text)
    throw error
  }
}
