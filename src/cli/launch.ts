/**
 * Runtime side of the CLI: resolves a command into a pane and hosts it.
 */

import { Effect } from 'effect';
import { createProviderRegistry, type ProviderRegistry } from '../ai/providers';
import {
  commandPolicy,
  shellPolicy,
  type PaneCommand,
  type RestartPolicy,
} from '../components/process-pane';
import { AppConfig, type AppConfigShape } from '../effect/Config';
import { runPaneHost, type HostInput, type HostOutput } from './host';
import { EXIT_INTERNAL, EXIT_SUCCESS, EXIT_USAGE, type AppCommand } from './index';

type LaunchCommand = Exclude<AppCommand, { kind: 'providers' }>;

export interface PaneSpec {
  title: string;
  policy: RestartPolicy;
  command: PaneCommand;
}

export type ResolveResult =
  | { ok: true; spec: PaneSpec }
  | { ok: false; exitCode: number; error: string };

export interface LaunchIO {
  input: HostInput;
  output: HostOutput;
  cwd: string;
  signal?: AbortSignal;
  /** Line printer for non-interactive output */
  print: (line: string) => void;
  printError: (line: string) => void;
}

export function resolvePaneSpec(
  command: LaunchCommand,
  config: Pick<AppConfigShape, 'shell'>,
  registry: ProviderRegistry,
  cwd: string
): ResolveResult {
  switch (command.kind) {
    case 'shell':
      return {
        ok: true,
        spec: {
          title: 'shell',
          policy: shellPolicy,
          command: { command: command.shell ?? config.shell, args: [], cwd },
        },
      };
    case 'run':
      return {
        ok: true,
        spec: {
          title: command.command,
          policy: commandPolicy,
          command: { command: command.command, args: command.args, cwd },
        },
      };
    case 'ai': {
      const provider = registry.get(command.provider);
      if (!provider) {
        const requested = command.provider || registry.defaultProvider;
        return {
          ok: false,
          exitCode: EXIT_USAGE,
          error: `Unknown provider: ${requested} (known: ${registry.names().join(', ')})`,
        };
      }
      if (!registry.isAvailable(provider)) {
        return { ok: false, exitCode: EXIT_INTERNAL, error: `${provider.binary} not found on PATH.` };
      }
      return {
        ok: true,
        spec: {
          title: provider.name,
          policy: commandPolicy,
          command: provider.command({
            workingDir: cwd,
            model: command.model,
            additionalArgs: command.extraArgs,
          }),
        },
      };
    }
  }
}

/** `ptydeck providers` lines; * marks the default, ! one missing from PATH */
export function formatProviderList(registry: ProviderRegistry): string[] {
  return registry.all().map((provider) => {
    const marker = provider.name === registry.defaultProvider ? '*' : ' ';
    const missing = registry.isAvailable(provider) ? '' : ' !';
    return `${marker} ${provider.name} (${provider.binary})${missing}`;
  });
}

export const runAppCommand = (
  command: AppCommand,
  io: LaunchIO,
  registryFor: (defaultName: string) => ProviderRegistry = (name) => createProviderRegistry(name)
) =>
  Effect.gen(function* () {
    const config = yield* AppConfig;
    const registry = registryFor(config.aiProvider);

    if (command.kind === 'providers') {
      if (command.json) {
        const payload = registry.all().map((provider) => ({
          name: provider.name,
          binary: provider.binary,
          default: provider.name === registry.defaultProvider,
          available: registry.isAvailable(provider),
        }));
        io.print(JSON.stringify(payload));
      } else {
        for (const line of formatProviderList(registry)) io.print(line);
      }
      return EXIT_SUCCESS;
    }

    const resolved = resolvePaneSpec(command, config, registry, io.cwd);
    if (!resolved.ok) {
      io.printError(resolved.error);
      return resolved.exitCode;
    }

    yield* Effect.logInfo('launching pane').pipe(
      Effect.annotateLogs({ title: resolved.spec.title, command: resolved.spec.command.command })
    );
    yield* runPaneHost({
      ...resolved.spec,
      input: io.input,
      output: io.output,
      signal: io.signal,
    });
    return EXIT_SUCCESS;
  });
