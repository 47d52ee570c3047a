/**
 * Interactive process pane
 */

import { runCli, EXIT_INTERNAL } from './cli';
import { runAppCommand } from './cli/launch';
import { AppRuntime, disposeRuntime } from './effect/runtime';

const QUIT_SIGNALS: NodeJS.Signals[] = ['SIGTERM', 'SIGHUP', 'SIGQUIT'];

async function main(): Promise<number> {
  const outcome = await runCli(process.argv.slice(2));
  if (outcome.kind === 'handled') {
    return outcome.exitCode;
  }

  // No SIGINT: Ctrl+C arrives as a key in raw mode and goes to the pty
  const abort = new AbortController();
  const onSignal = (): void => abort.abort();
  for (const signal of QUIT_SIGNALS) process.once(signal, onSignal);

  try {
    return await AppRuntime.runPromise(
      runAppCommand(outcome.command, {
        input: process.stdin,
        output: process.stdout,
        cwd: process.cwd(),
        signal: abort.signal,
        print: (line) => console.log(line),
        printError: (line) => console.error(line),
      })
    );
  } finally {
    for (const signal of QUIT_SIGNALS) process.off(signal, onSignal);
    await disposeRuntime();
  }
}

main().then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error('Failed to start ptydeck:', error);
    process.exitCode = EXIT_INTERNAL;
  }
);
