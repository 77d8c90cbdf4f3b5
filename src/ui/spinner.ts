import ora from 'ora';

/**
 * Runs `fn` behind a spinner. The spinner only fails when `fn` throws;
 * a result the caller treats as failure is reported through `succeeded`.
 */
export async function withSpinner<T>(
  text: string,
  fn: () => Promise<T>,
  succeeded: (result: T) => boolean = () => true,
): Promise<T> {
  const spinner = ora({ text, isEnabled: process.stderr.isTTY === true }).start();
  try {
    const result = await fn();
    if (succeeded(result)) spinner.succeed();
    else spinner.fail();
    return result;
  } catch (err) {
    spinner.fail();
    throw err;
  }
}
