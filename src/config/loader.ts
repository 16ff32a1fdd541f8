// Reads the optional screeps.yaml at the project root. Missing file means defaults;
// anything present must parse and match BuildConfigSchema, otherwise the run stops.
import fs from 'fs/promises';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { BuildError, BuildErrorCode, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { BuildConfigSchema } from './types.js';
import type { BuildConfig } from './types.js';

export const CONFIG_FILE_NAME = 'screeps.yaml';

export interface ConfigResult {
  config: BuildConfig;
  configPath: string;
  fromFile: boolean;
}

export async function loadConfig(root: string, explicitPath?: string): Promise<ConfigResult> {
  const configPath = explicitPath ? path.resolve(root, explicitPath) : path.join(root, CONFIG_FILE_NAME);

  let raw: string;
  try {
    raw = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    // An explicitly named file has to exist.
    if ((err as NodeJS.ErrnoException).code === 'ENOENT' && !explicitPath) {
      logger.debug({ configPath }, 'no config file, using defaults');
      return { config: BuildConfigSchema.parse({}), configPath, fromFile: false };
    }
    throw new BuildError(BuildErrorCode.INVALID_CONFIG, `Cannot read config ${configPath}: ${errorMessage(err)}`);
  }

  return { config: parseConfig(raw, configPath), configPath, fromFile: true };
}

export function parseConfig(raw: string, configPath: string): BuildConfig {
  let doc: unknown;
  try {
    doc = parseYaml(raw);
  } catch (err) {
    throw new BuildError(BuildErrorCode.INVALID_CONFIG, `Invalid YAML in ${configPath}: ${errorMessage(err)}`);
  }

  // An empty file parses to null.
  const result = BuildConfigSchema.safeParse(doc ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new BuildError(
      BuildErrorCode.INVALID_CONFIG,
      `Invalid config ${configPath}: ${issues.join('; ')}`,
      { issues }
    );
  }
  return result.data;
}
