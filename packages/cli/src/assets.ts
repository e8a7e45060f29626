import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { ConfigError, errorMessage } from '@sysml-sql/core';

/** Beside the sources, or from the build output under dist/packages/cli/src */
const ASSET_DIRS = ['../assets/', '../../../../packages/cli/assets/'];

export function assetPath(name: string): string {
  const candidates = ASSET_DIRS.map((dir) => fileURLToPath(new URL(`${dir}${name}`, import.meta.url)));
  const found = candidates.find((candidate) => existsSync(candidate));
  if (found === undefined) {
    throw new ConfigError({
      code: 'INVALID_CONFIG',
      message: `Bundled asset ${name} is missing`,
      suggestion: 'Reinstall sysml-sql; the assets directory ships with the CLI package.',
      context: { candidates },
    });
  }
  return found;
}

export async function readAsset(name: string): Promise<string> {
  const path = assetPath(name);
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError({
      code: 'INVALID_CONFIG',
      message: `Cannot read bundled asset ${path}: ${errorMessage(error)}`,
      cause: error instanceof Error ? error : undefined,
    });
  }
}
