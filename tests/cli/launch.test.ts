import { Effect, Layer, Logger, LogLevel } from 'effect';
import { describe, expect, it } from 'vitest';
import { createProviderRegistry } from '../../src/ai/providers';
import { EXIT_INTERNAL, EXIT_SUCCESS, EXIT_USAGE } from '../../src/cli';
import { formatProviderList, resolvePaneSpec, runAppCommand, type LaunchIO } from '../../src/cli/launch';
import { commandPolicy, shellPolicy } from '../../src/components/process-pane';
import { TestAppLayer, type AppServices } from '../../src/effect/runtime';
import { FakeInput, FakeOutput } from '../mocks/fake-terminal';

const onlyClaude = (binary: string) => (binary === 'claude' ? '/usr/local/bin/claude' : null);
const registry = () => createProviderRegistry('claude-code', onlyClaude);
const config = { shell: '/bin/sh' };

describe('resolvePaneSpec', () => {
  it('uses the configured shell by default', () => {
    expect(resolvePaneSpec({ kind: 'shell' }, config, registry(), '/work')).toEqual({
      ok: true,
      spec: { title: 'shell', policy: shellPolicy, command: { command: '/bin/sh', args: [], cwd: '/work' } },
    });
  });

  it('prefers an explicit shell', () => {
    const result = resolvePaneSpec({ kind: 'shell', shell: '/bin/zsh' }, config, registry(), '/work');
    expect(result.ok && result.spec.command.command).toBe('/bin/zsh');
  });

  it('runs a command under the command policy', () => {
    expect(resolvePaneSpec({ kind: 'run', command: 'htop', args: ['-d', '5'] }, config, registry(), '/work')).toEqual({
      ok: true,
      spec: { title: 'htop', policy: commandPolicy, command: { command: 'htop', args: ['-d', '5'], cwd: '/work' } },
    });
  });

  it('builds the default provider command', () => {
    expect(resolvePaneSpec({ kind: 'ai', extraArgs: ['--resume'] }, config, registry(), '/work')).toEqual({
      ok: true,
      spec: {
        title: 'claude-code',
        policy: commandPolicy,
        command: { command: 'claude', args: ['--add-dir', '/work', '--resume'], cwd: '/work' },
      },
    });
  });

  it('rejects an unknown provider as a usage error', () => {
    expect(resolvePaneSpec({ kind: 'ai', provider: 'cursor', extraArgs: [] }, config, registry(), '/work')).toEqual({
      ok: false,
      exitCode: EXIT_USAGE,
      error: 'Unknown provider: cursor (known: claude-code, aider)',
    });
  });

  it('fails when the provider binary is missing', () => {
    expect(resolvePaneSpec({ kind: 'ai', provider: 'aider', extraArgs: [] }, config, registry(), '/work')).toEqual({
      ok: false,
      exitCode: EXIT_INTERNAL,
      error: 'aider not found on PATH.',
    });
  });
});

describe('formatProviderList', () => {
  it('marks the default and missing providers', () => {
    expect(formatProviderList(registry())).toEqual(['* claude-code (claude)', '  aider (aider) !']);
  });
});

describe('runAppCommand', () => {
  const makeIO = () => {
    const printed: string[] = [];
    const errors: string[] = [];
    const output = new FakeOutput(80, 24);
    const io: LaunchIO = {
      input: new FakeInput(),
      output,
      cwd: '/work',
      print: (line) => printed.push(line),
      printError: (line) => errors.push(line),
    };
    return { io, output, printed, errors };
  };

  const run = <A, E>(effect: Effect.Effect<A, E, AppServices>) =>
    Effect.runPromise(
      effect.pipe(Effect.provide(Layer.merge(TestAppLayer, Logger.minimumLogLevel(LogLevel.None))))
    );

  it('lists providers', async () => {
    const { io, printed } = makeIO();
    const exitCode = await run(runAppCommand({ kind: 'providers', json: false }, io, () => registry()));

    expect(exitCode).toBe(EXIT_SUCCESS);
    expect(printed).toEqual(['* claude-code (claude)', '  aider (aider) !']);
  });

  it('lists providers as JSON', async () => {
    const { io, printed } = makeIO();
    await run(runAppCommand({ kind: 'providers', json: true }, io, () => registry()));

    expect(JSON.parse(printed[0])).toEqual([
      { name: 'claude-code', binary: 'claude', default: true, available: true },
      { name: 'aider', binary: 'aider', default: false, available: false },
    ]);
  });

  it('passes the configured default provider to the registry', async () => {
    const { io } = makeIO();
    const requested: string[] = [];
    await run(
      runAppCommand({ kind: 'providers', json: false }, io, (name) => {
        requested.push(name);
        return registry();
      })
    );

    expect(requested).toEqual(['claude-code']);
  });

  it('prints resolution errors without starting a pane', async () => {
    const { io, output, errors } = makeIO();
    const exitCode = await run(
      runAppCommand({ kind: 'ai', provider: 'cursor', extraArgs: [] }, io, () => registry())
    );

    expect(exitCode).toBe(EXIT_USAGE);
    expect(errors).toEqual(['Unknown provider: cursor (known: claude-code, aider)']);
    expect(output.writes).toEqual([]);
  });
});
