import type { DispatchReporter } from "./types";

export type Report = {
  error(error: Error): void;
  log(msg: string, meta?: unknown): void;
};

export const createReport = (reporter?: DispatchReporter): Report => ({
  error(error) {
    if (reporter?.onError) {
      reporter.onError(error);
      return;
    }
    console.warn("reqgate dispatch fault", { name: error.name, message: error.message });
  },
  log(msg, meta) {
    reporter?.onLog?.(msg, meta);
  }
});
