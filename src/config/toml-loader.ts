import fs from 'fs';
import path from 'path';
import { homedir } from 'os';
import toml from '@iarna/toml';
import type { z } from 'zod';
import { MisconfiguredError } from '../utils/errors.js';

/**
 * Read, parse and validate a TOML file against a zod schema.
 * The caller is expected to have checked that the file exists.
 */
export function loadTomlFile<S extends z.ZodTypeAny>(
  filePath: string,
  schema: S
): z.output<S> {
  let parsed: unknown;
  try {
    parsed = toml.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new MisconfiguredError(
      `Failed to parse TOML file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new MisconfiguredError(`Invalid configuration in ${filePath}:\n${problems}`);
  }
  return result.data;
}

/**
 * Expand ~ to home directory in paths
 */
export function expandHomeDir(filePath: string): string {
  if (filePath === '~') {
    return homedir();
  }
  if (filePath.startsWith('~/')) {
    return path.join(homedir(), filePath.substring(2));
  }
  return filePath;
}

/**
 * Walk up from `startDir` until `relativePath` exists below a directory.
 * Returns the full path, or null when the filesystem root is reached.
 */
export function findUpwards(relativePath: string, startDir: string = process.cwd()): string | null {
  let current = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(current, relativePath);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
    const parent = path.dirname(current);
    if (parent === current) {
      return null;
    }
    current = parent;
  }
}
