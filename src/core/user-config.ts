/**
 * User configuration loader for ~/.config/ptydeck/config.toml.
 */

import fs from 'node:fs';
import path from 'node:path';
import * as TOML from '@iarna/toml';
import {
  DEFAULT_PANE_SETTINGS,
  DEFAULT_PANE_THEME,
  type OverlayTheme,
  type PaneSettings,
  type PaneTheme,
} from './config';

export interface UserConfig {
  pane: PaneSettings;
  theme: PaneTheme;
}

export const DEFAULT_USER_CONFIG: UserConfig = {
  pane: DEFAULT_PANE_SETTINGS,
  theme: DEFAULT_PANE_THEME,
};

const CONFIG_FILE_NAME = 'config.toml';

export function getConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const home = env.HOME ?? env.USERPROFILE;
  const base = env.XDG_CONFIG_HOME ?? (home ? path.join(home, '.config') : path.join(process.cwd(), '.config'));
  return path.join(base, 'ptydeck');
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getConfigDir(env), CONFIG_FILE_NAME);
}

type TomlTable = { [key: string]: unknown };

function isTable(value: unknown): value is TomlTable {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readTable(table: TomlTable, key: string): TomlTable {
  const value = table[key];
  return isTable(value) ? value : {};
}

function readString(table: TomlTable, key: string): string | undefined {
  const value = table[key];
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function readPositiveInt(table: TomlTable, key: string): number | undefined {
  const value = table[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) return undefined;
  const intValue = Math.floor(value);
  return intValue >= 0 ? intValue : undefined;
}

function readHexColor(table: TomlTable, key: string): string | undefined {
  const value = readString(table, key);
  return value && /^#[0-9a-fA-F]{6}$/.test(value) ? value : undefined;
}

function mergeOverlay(base: OverlayTheme, table: TomlTable): OverlayTheme {
  return {
    foreground: readHexColor(table, 'foreground') ?? base.foreground,
    background: readHexColor(table, 'background') ?? base.background,
  };
}

/**
 * Merge a parsed TOML document over the defaults.
 * Unknown keys and values of the wrong type are ignored.
 */
export function mergeUserConfig(base: UserConfig, raw: TomlTable): UserConfig {
  const pane = readTable(raw, 'pane');
  const theme = readTable(raw, 'theme');

  return {
    pane: {
      shell: readString(pane, 'shell') ?? base.pane.shell,
      term: readString(pane, 'term') ?? base.pane.term,
      scrollbackLimit: readPositiveInt(pane, 'scrollbackLimit') ?? base.pane.scrollbackLimit,
      dedupWindow: readPositiveInt(pane, 'dedupWindow') ?? base.pane.dedupWindow,
      renderIntervalMs: readPositiveInt(pane, 'renderIntervalMs') ?? base.pane.renderIntervalMs,
      minRenderIntervalMs: readPositiveInt(pane, 'minRenderIntervalMs') ?? base.pane.minRenderIntervalMs,
      wheelStep: readPositiveInt(pane, 'wheelStep') ?? base.pane.wheelStep,
      aiProvider: readString(pane, 'aiProvider') ?? base.pane.aiProvider,
    },
    theme: {
      cursor: mergeOverlay(base.theme.cursor, readTable(theme, 'cursor')),
      selection: mergeOverlay(base.theme.selection, readTable(theme, 'selection')),
      scrollIndicatorColor: readHexColor(theme, 'scrollIndicatorColor') ?? base.theme.scrollIndicatorColor,
      errorColor: readHexColor(theme, 'errorColor') ?? base.theme.errorColor,
      mutedColor: readHexColor(theme, 'mutedColor') ?? base.theme.mutedColor,
    },
  };
}

export function parseUserConfig(source: string): UserConfig {
  return mergeUserConfig(DEFAULT_USER_CONFIG, TOML.parse(source));
}

/**
 * Read the user config file. Returns the defaults when the file does not
 * exist; throws when it exists but cannot be read or parsed.
 */
export function readUserConfigFile(configPath: string = getConfigPath()): UserConfig {
  if (!fs.existsSync(configPath)) {
    return DEFAULT_USER_CONFIG;
  }
  return parseUserConfig(fs.readFileSync(configPath, 'utf8'));
}
