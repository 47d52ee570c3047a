/**
 * Command resolution ahead of a pty spawn.
 */

import fs from 'node:fs';
import path from 'node:path';

function isExecutableFile(candidate: string): boolean {
  try {
    fs.accessSync(candidate, fs.constants.X_OK);
    return fs.statSync(candidate).isFile();
  } catch {
    return false;
  }
}

export function isDirectory(candidate: string): boolean {
  try {
    return fs.statSync(candidate).isDirectory();
  } catch {
    return false;
  }
}

/**
 * First executable named `binary` on PATH, or null.
 */
export function findExecutable(binary: string, env: NodeJS.ProcessEnv = process.env): string | null {
  const dirs = (env.PATH ?? '').split(path.delimiter).filter((dir) => dir.length > 0);
  const extensions = process.platform === 'win32' ? (env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';') : [''];
  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = path.join(dir, binary + ext);
      if (isExecutableFile(candidate)) return candidate;
    }
  }
  return null;
}

/**
 * Absolute path of the file `command` would run, or null. A command with a
 * path separator is taken relative to `cwd`; a bare name is looked up on PATH.
 */
export function resolveCommand(command: string, cwd: string, env: NodeJS.ProcessEnv = process.env): string | null {
  if (command.length === 0) return null;
  const hasSeparator = command.includes('/') || (process.platform === 'win32' && command.includes('\\'));
  if (!hasSeparator) return findExecutable(command, env);
  const candidate = path.resolve(cwd, command);
  return isExecutableFile(candidate) ? candidate : null;
}
