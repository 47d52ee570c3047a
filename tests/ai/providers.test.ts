import { describe, expect, it } from 'vitest';
import { aider, claudeCode, createProviderRegistry } from '../../src/ai/providers';

describe('AI providers', () => {
  it('builds the claude-code command line', () => {
    expect(
      claudeCode.command({
        workingDir: '/work',
        model: 'sonnet',
        additionalArgs: ['--verbose'],
      })
    ).toEqual({
      command: 'claude',
      args: ['--add-dir', '/work', '--model', 'sonnet', '--verbose'],
      cwd: '/work',
    });
  });

  it('keeps aider from committing', () => {
    expect(aider.command({ workingDir: '/work' })).toEqual({
      command: 'aider',
      args: ['--no-auto-commits'],
      cwd: '/work',
    });
  });

  it('does not share argument arrays between calls', () => {
    aider.command({ additionalArgs: ['--yes'] });
    expect(aider.defaultArgs()).toEqual(['--no-auto-commits']);
  });

  describe('registry', () => {
    const lookup = (binary: string) => (binary === 'claude' ? '/usr/bin/claude' : null);

    it('resolves the default provider for an empty name', () => {
      const registry = createProviderRegistry('aider', lookup);
      expect(registry.get('')?.name).toBe('aider');
      expect(registry.get()?.name).toBe('aider');
      expect(registry.get('claude-code')?.name).toBe('claude-code');
      expect(registry.get('cursor')).toBeUndefined();
    });

    it('reports availability through the lookup', () => {
      const registry = createProviderRegistry('claude-code', lookup);
      expect(registry.names()).toEqual(['claude-code', 'aider']);
      expect(registry.available().map((provider) => provider.name)).toEqual(['claude-code']);
    });
  });
});
