import { formatHelp } from './help';
import { parseCliArgs, type CliCommand } from './parse';
import { getCliVersion } from './version';

export const EXIT_SUCCESS = 0;
export const EXIT_USAGE = 2;
export const EXIT_INTERNAL = 6;

/** Commands that need the application runtime */
type AppCommand = Extract<CliCommand, { kind: 'shell' | 'ai' | 'run' | 'providers' }>;

type CliOutcome =
  | { kind: 'app'; command: AppCommand }
  | { kind: 'handled'; exitCode: number };

function printError(message: string): void {
  console.error(message);
}

export async function runCli(args: string[]): Promise<CliOutcome> {
  const parsed = parseCliArgs(args);
  if (!parsed.ok) {
    printError(parsed.error);
    printError('Run `ptydeck --help` for usage.');
    return { kind: 'handled', exitCode: EXIT_USAGE };
  }

  const command = parsed.command;

  switch (command.kind) {
    case 'help': {
      const version = await getCliVersion();
      console.log(formatHelp(command.topic, version));
      return { kind: 'handled', exitCode: EXIT_SUCCESS };
    }
    case 'version':
      console.log(await getCliVersion());
      return { kind: 'handled', exitCode: EXIT_SUCCESS };
    case 'shell':
    case 'ai':
    case 'run':
    case 'providers':
      return { kind: 'app', command };
    default:
      printError('Unknown command.');
      return { kind: 'handled', exitCode: EXIT_USAGE };
  }
}

export type { AppCommand, CliCommand, CliOutcome };
