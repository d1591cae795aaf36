/**
 * CLI context construction for the vcluster CLI.
 */

import type { CliContext } from './types.js';

/**
 * Creates the CLI context for the running process.
 *
 * Colors are used only when stderr is a terminal and `NO_COLOR` is unset.
 *
 * @param overrides - Fields replacing the process-derived defaults.
 * @returns The CLI context.
 */
export function createCliApp(overrides: Partial<CliContext> = {}): CliContext {
  const env = overrides.env ?? process.env;
  return {
    args: overrides.args ?? process.argv.slice(3),
    env,
    display: overrides.display ?? {
      colors: process.stderr.isTTY === true && env.NO_COLOR === undefined,
    },
    stdout:
      overrides.stdout ??
      ((text: string) => {
        process.stdout.write(text);
      }),
    logSink:
      overrides.logSink ??
      ((line: string) => {
        process.stderr.write(line);
      }),
  };
}
