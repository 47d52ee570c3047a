/**
 * AI assistant CLIs that can be hosted in a command-role pane.
 */

import type { PaneCommand } from '../components/process-pane';
import { findExecutable } from '../core/executable';

export interface ProviderOptions {
  workingDir?: string;
  systemPrompt?: string;
  model?: string;
  additionalArgs?: ReadonlyArray<string>;
}

export interface AIProvider {
  readonly name: string;
  /** Executable looked up on PATH */
  readonly binary: string;
  defaultArgs(): string[];
  command(options: ProviderOptions): PaneCommand;
}

export const claudeCode: AIProvider = {
  name: 'claude-code',
  binary: 'claude',
  defaultArgs: () => [],
  command(options) {
    const args = this.defaultArgs();
    if (options.workingDir) args.push('--add-dir', options.workingDir);
    if (options.systemPrompt) args.push('--append-system-prompt', options.systemPrompt);
    if (options.model) args.push('--model', options.model);
    args.push(...(options.additionalArgs ?? []));
    return { command: this.binary, args, cwd: options.workingDir };
  },
};

export const aider: AIProvider = {
  name: 'aider',
  binary: 'aider',
  // git stays with the user
  defaultArgs: () => ['--no-auto-commits'],
  command(options) {
    const args = this.defaultArgs();
    if (options.model) args.push('--model', options.model);
    args.push(...(options.additionalArgs ?? []));
    return { command: this.binary, args, cwd: options.workingDir };
  },
};

export class ProviderRegistry {
  private readonly providers = new Map<string, AIProvider>();
  private defaultName = '';

  constructor(private readonly lookup: (binary: string) => string | null = (binary) => findExecutable(binary)) {}

  register(provider: AIProvider): void {
    this.providers.set(provider.name, provider);
  }

  setDefault(name: string): void {
    this.defaultName = name;
  }

  get defaultProvider(): string {
    return this.defaultName;
  }

  /** Provider by name; the default when name is empty or omitted */
  get(name?: string): AIProvider | undefined {
    return this.providers.get(name || this.defaultName);
  }

  isAvailable(provider: AIProvider): boolean {
    return this.lookup(provider.binary) !== null;
  }

  available(): AIProvider[] {
    return this.all().filter((provider) => this.isAvailable(provider));
  }

  all(): AIProvider[] {
    return [...this.providers.values()];
  }

  names(): string[] {
    return [...this.providers.keys()];
  }
}

/** Registry with the built-in providers */
export function createProviderRegistry(
  defaultName: string,
  lookup?: (binary: string) => string | null
): ProviderRegistry {
  const registry = new ProviderRegistry(lookup);
  registry.register(claudeCode);
  registry.register(aider);
  registry.setDefault(defaultName);
  return registry;
}
