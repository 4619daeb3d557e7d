import ora from "ora";

export const withSpinner = async <T>(
  run: () => Promise<T>,
  spinnerText: string,
  summarize?: (result: T) => string
): Promise<T> => {
  const label = spinnerText.replace(/\.$/, "") || spinnerText;
  const spinner = ora(spinnerText).start();
  try {
    const result = await run();
    spinner.succeed(summarize ? summarize(result) : label);
    return result;
  } catch (error) {
    spinner.fail(label);
    throw error;
  }
};
