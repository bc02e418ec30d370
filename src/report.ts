import type { ProgressReporter } from './types';

export const COMPLETION_LINE = 'Transformation complete.';

/**
 * Progress line printed after a file has been written.
 */
export function formatFileLine(fileName: string): string {
  return `Transformed ${fileName}`;
}

/**
 * Reporter printing one line per rewritten file and a final completion line.
 *
 * @param write - Line sink; defaults to stdout via `console.log`.
 */
export function createConsoleReporter(
  write: (line: string) => void = line => console.log(line)
): ProgressReporter {
  return {
    fileTransformed: fileName => write(formatFileLine(fileName)),
    completed: () => write(COMPLETION_LINE)
  };
}
