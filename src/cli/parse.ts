import { type HelpTopic } from './help';

export type CliCommand =
  | { kind: 'help'; topic: HelpTopic }
  | { kind: 'version' }
  | { kind: 'shell'; shell?: string }
  | { kind: 'ai'; provider?: string; model?: string; extraArgs: string[] }
  | { kind: 'run'; command: string; args: string[] }
  | { kind: 'providers'; json: boolean };

export type ParseResult =
  | { ok: true; command: CliCommand }
  | { ok: false; error: string };

const HELP_FLAGS = new Set(['-h', '--help']);
const VERSION_FLAGS = new Set(['-v', '--version']);

/** Arguments ptydeck itself reads: everything before `--`, and nothing after `run <command>` */
function ownArgs(args: string[]): string[] {
  const end = args.indexOf('--');
  const head = end === -1 ? args : args.slice(0, end);
  if (head[0] === 'run') {
    return head.slice(0, 2);
  }
  return head;
}

function shouldShowHelp(args: string[]): boolean {
  if (args.length === 0) return false;
  if (args[0] === 'help') return true;
  return ownArgs(args).some((arg) => HELP_FLAGS.has(arg));
}

function resolveHelpTopic(args: string[]): HelpTopic {
  const tokens = args[0] === 'help' ? args.slice(1) : args;
  const first = tokens.find((arg) => !arg.startsWith('-'));

  switch (first) {
    case 'shell':
    case 'ai':
    case 'run':
    case 'providers':
      return first;
    default:
      return 'root';
  }
}

function readOptionValue(args: string[], index: number, flag: string): { value: string; nextIndex: number } | { error: string } {
  const arg = args[index];
  const eqIndex = arg.indexOf('=');
  if (eqIndex >= 0) {
    return { value: arg.slice(eqIndex + 1), nextIndex: index };
  }
  const next = args[index + 1];
  if (!next) {
    return { error: `Missing value for ${flag}.` };
  }
  return { value: next, nextIndex: index + 1 };
}

function isFlag(arg: string, flag: string): boolean {
  return arg === flag || arg.startsWith(`${flag}=`);
}

function parseShell(args: string[]): ParseResult {
  let shell: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (isFlag(arg, '--shell')) {
      const value = readOptionValue(args, i, '--shell');
      if ('error' in value) return { ok: false, error: value.error };
      shell = value.value;
      i = value.nextIndex;
      continue;
    }

    return { ok: false, error: `Unknown argument: ${arg}` };
  }

  return { ok: true, command: { kind: 'shell', shell } };
}

function parseAi(args: string[]): ParseResult {
  let provider: string | undefined;
  let model: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--') {
      return { ok: true, command: { kind: 'ai', provider, model, extraArgs: args.slice(i + 1) } };
    }
    if (isFlag(arg, '--provider')) {
      const value = readOptionValue(args, i, '--provider');
      if ('error' in value) return { ok: false, error: value.error };
      provider = value.value;
      i = value.nextIndex;
      continue;
    }
    if (isFlag(arg, '--model')) {
      const value = readOptionValue(args, i, '--model');
      if ('error' in value) return { ok: false, error: value.error };
      model = value.value;
      i = value.nextIndex;
      continue;
    }

    return { ok: false, error: `Unknown argument: ${arg}` };
  }

  return { ok: true, command: { kind: 'ai', provider, model, extraArgs: [] } };
}

function parseRun(args: string[]): ParseResult {
  const rest = args[0] === '--' ? args.slice(1) : args;
  const [command, ...commandArgs] = rest;
  if (!command) {
    return { ok: false, error: 'Missing command to run.' };
  }
  return { ok: true, command: { kind: 'run', command, args: commandArgs } };
}

function parseProviders(args: string[]): ParseResult {
  const json = args.includes('--json');
  const unknown = args.filter((arg) => arg !== '--json');
  if (unknown.length > 0) {
    return { ok: false, error: `Unknown argument: ${unknown[0]}` };
  }
  return { ok: true, command: { kind: 'providers', json } };
}

export function parseCliArgs(args: string[]): ParseResult {
  if (shouldShowHelp(args)) {
    return { ok: true, command: { kind: 'help', topic: resolveHelpTopic(args) } };
  }

  const [first, ...rest] = args;

  if (first && VERSION_FLAGS.has(first)) {
    return { ok: true, command: { kind: 'version' } };
  }

  if (!first || first.startsWith('-')) {
    return parseShell(args);
  }

  switch (first) {
    case 'shell':
      return parseShell(rest);
    case 'ai':
      return parseAi(rest);
    case 'run':
      return parseRun(rest);
    case 'providers':
      return parseProviders(rest);
    default:
      return { ok: false, error: `Unknown command: ${first}` };
  }
}
