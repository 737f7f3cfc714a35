import Ajv from 'ajv/dist/2020';
import fs from 'node:fs/promises';
import path from 'node:path';
import { RULES } from '../rules/registry';
import type { Rule, RuleId } from '../rules/types';
import configSchema from './config-schema.json';

export const CONFIG_FILE_NAME = 'mvvm-migrate.json';

/** Contents of `mvvm-migrate.json` as written. */
export type MigrateConfigFile = {
  rules?: Partial<Record<RuleId, { enabled?: boolean }>>;
  exclude?: string[];
  includeGenerated?: boolean;
};

export type MigrateConfig = {
  /** Absolute path of the file the values came from; absent when defaults apply. */
  path?: string;
  disabledRules: RuleId[];
  exclude: string[];
  includeGenerated: boolean;
};

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly file: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validateConfig = ajv.compile<MigrateConfigFile>(configSchema);

export function defaultConfig(): MigrateConfig {
  return { disabledRules: [], exclude: [], includeGenerated: false };
}

async function exists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export function parseConfig(text: string, file: string): MigrateConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e: unknown) {
    throw new ConfigError(`${file}: invalid JSON (${e instanceof Error ? e.message : String(e)})`, file);
  }
  if (!validateConfig(raw)) {
    throw new ConfigError(`${file}: ${ajv.errorsText(validateConfig.errors, { dataVar: 'config' })}`, file);
  }

  const disabledRules = RULES.map((r) => r.descriptor.id).filter((id) => raw.rules?.[id]?.enabled === false);
  return {
    path: file,
    disabledRules,
    exclude: raw.exclude ?? [],
    includeGenerated: raw.includeGenerated ?? false,
  };
}

/**
 * Reads `explicitPath`, or `mvvm-migrate.json` in the source root when present.
 * A missing explicit file is an error; a missing default file means defaults.
 */
export async function loadConfig(sourceRoot: string, explicitPath?: string): Promise<MigrateConfig> {
  const file = path.resolve(explicitPath ?? path.join(sourceRoot, CONFIG_FILE_NAME));
  if (!(await exists(file))) {
    if (explicitPath !== undefined) throw new ConfigError(`${file}: configuration file not found`, file);
    return defaultConfig();
  }
  return parseConfig(await fs.readFile(file, 'utf8'), file);
}

/** Rules named on the command line, else every rule the configuration leaves enabled. */
export function enabledRules(config: MigrateConfig, requested?: readonly RuleId[]): Rule[] {
  if (requested && requested.length > 0) return RULES.filter((r) => requested.includes(r.descriptor.id));
  return RULES.filter((r) => !config.disabledRules.includes(r.descriptor.id));
}
