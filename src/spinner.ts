import ora from "ora";

export type SpinnerRunner = <T>(text: string, task: () => Promise<T>) => Promise<T>;

/**
 * Runs `task` behind a stderr spinner that is cleared once the task
 * settles, successfully or not.
 */
export function createSpinnerRunner(enabled: boolean): SpinnerRunner {
  return async <T>(text: string, task: () => Promise<T>): Promise<T> => {
    const spinner = ora({ text, isSilent: !enabled }).start();
    try {
      return await task();
    } finally {
      spinner.stop();
    }
  };
}
