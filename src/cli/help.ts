export type HelpTopic = 'root' | 'shell' | 'ai' | 'run' | 'providers';

function formatHeader(topic: HelpTopic, version?: string): string {
  const base = version && version !== 'unknown' ? `ptydeck v${version}` : 'ptydeck';
  if (topic === 'root') {
    return base;
  }
  return `${base} ${topic}`;
}

const ROOT_HELP = (version?: string): string[] => [
  formatHeader('root', version),
  '',
  'Usage:',
  '  ptydeck [shell] [--shell <path>]',
  '  ptydeck <command> [<args>]',
  '',
  'Commands:',
  '  shell            Interactive shell pane that restarts on exit (default).',
  '  ai               AI assistant pane; stays stopped when the assistant exits.',
  '  run              Any command in a pane; stays stopped when it exits.',
  '  providers        List known AI assistant providers.',
  '',
  'Options:',
  '  -h, --help       Show help (try `ptydeck ai --help`).',
  '  -v, --version    Show version.',
  '',
  'Keys:',
  '  Ctrl+Q           Quit.',
  '  PageUp/PageDown  Scroll history (while scrolled or stopped).',
  '  Home/End         Oldest line / back to live output.',
  '  Ctrl+C, y        Copy the mouse selection.',
  '',
  'Exit codes:',
  '  0  success',
  '  2  usage error',
  '  6  internal error',
];

const SHELL_HELP = (version?: string): string[] => [
  formatHeader('shell', version),
  '',
  'Usage:',
  '  ptydeck',
  '  ptydeck shell [--shell <path>]',
  '',
  'Description:',
  '  Run a login shell in a pane. The shell is restarted whenever it exits.',
  '',
  'Options:',
  '  --shell <path>   Shell executable (default: $PTYDECK_SHELL, then [pane].shell, then $SHELL).',
];

const AI_HELP = (version?: string): string[] => [
  formatHeader('ai', version),
  '',
  'Usage:',
  '  ptydeck ai [--provider <name>] [--model <model>] [-- <extra args>]',
  '',
  'Description:',
  '  Run an AI assistant CLI in the current directory.',
  '  The pane keeps its last output and exit status after the assistant exits.',
  '',
  'Options:',
  '  --provider <name>  Provider to run (default: $PTYDECK_AI_PROVIDER or [pane].aiProvider).',
  '  --model <model>    Model passed to the provider.',
  '  -- <args>          Extra arguments passed through unchanged.',
];

const RUN_HELP = (version?: string): string[] => [
  formatHeader('run', version),
  '',
  'Usage:',
  '  ptydeck run <command> [<args>...]',
  '',
  'Description:',
  '  Run a command in a pane. Arguments after <command> are passed through.',
  '',
  'Example:',
  '  ptydeck run htop',
];

const PROVIDERS_HELP = (version?: string): string[] => [
  formatHeader('providers', version),
  '',
  'Usage:',
  '  ptydeck providers [--json]',
  '',
  'Output:',
  '  One provider per line; * marks the default, ! marks one not found on PATH.',
];

const HELP_TOPICS: Record<HelpTopic, (version?: string) => string[]> = {
  root: ROOT_HELP,
  shell: SHELL_HELP,
  ai: AI_HELP,
  run: RUN_HELP,
  providers: PROVIDERS_HELP,
};

export function formatHelp(topic: HelpTopic, version?: string): string {
  const formatter = HELP_TOPICS[topic] ?? ROOT_HELP;
  return formatter(version).join('\n');
}
