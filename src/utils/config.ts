import { existsSync, readFileSync, realpathSync, statSync } from 'fs';
import { homedir } from 'os';
import { isAbsolute, join, relative, sep } from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './error.js';
import type { Logger } from './logger.js';

/**
 * Layered configuration: ~/.params2env.yaml, overridden field by field by
 * ./.params2env.yaml. CLI flags are applied on top by the coordinator.
 */

export const CONFIG_FILE_NAME = '.params2env.yaml';

// ============== Types ==============

export const OUTPUT_MODES = ['env', 'file'] as const;

export type OutputMode = (typeof OUTPUT_MODES)[number];

export interface ParamConfig {
  readonly name: string;
  readonly env?: string;
  readonly region?: string;
  readonly output?: OutputMode;
}

export interface Config {
  readonly region?: string;
  readonly replica?: string;
  /** Reserved, not applied to paths */
  readonly prefix?: string;
  readonly output?: OutputMode;
  readonly file?: string;
  /** Tri-state: undefined inherits, false is an explicit override */
  readonly upper?: boolean;
  readonly env_prefix?: string;
  readonly role?: string;
  readonly kms?: string;
  readonly params: readonly ParamConfig[];
}

export const EMPTY_CONFIG: Config = Object.freeze({ params: Object.freeze([]) });

// ============== Schema ==============

const unsetToUndefined = (value: unknown): unknown => (value === null || value === '' ? undefined : value);

const optionalText = z.preprocess(unsetToUndefined, z.string().optional());

const outputMode = z.preprocess(
  unsetToUndefined,
  z.enum(OUTPUT_MODES, { message: "invalid output format (must be 'env' or 'file')" }).optional(),
);

const paramConfigSchema = z.object({
  name: z
    .string({ required_error: 'parameter name is required', invalid_type_error: 'parameter name must be a string' })
    .min(1, 'parameter name must not be empty'),
  env: optionalText,
  region: optionalText,
  output: outputMode,
});

const configFileSchema = z.object({
  region: optionalText,
  replica: optionalText,
  prefix: optionalText,
  output: outputMode,
  file: optionalText,
  upper: z.preprocess((value) => (value === null ? undefined : value), z.boolean().optional()),
  env_prefix: optionalText,
  role: optionalText,
  kms: optionalText,
  params: z.preprocess((value) => (value === null ? undefined : value), z.array(paramConfigSchema).optional()),
});

type ConfigFile = z.infer<typeof configFileSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const location = issue.path.join('.');
      return location ? `${location}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

function toConfig(file: ConfigFile): Config {
  return {
    region: file.region,
    replica: file.replica,
    prefix: file.prefix,
    output: file.output,
    file: file.file,
    upper: file.upper,
    env_prefix: file.env_prefix,
    role: file.role,
    kms: file.kms,
    params: file.params ?? [],
  };
}

// ============== Loading ==============

/**
 * Parse and validate one YAML document
 */
export function parseConfig(content: string, file: string): Config {
  let document: unknown;
  try {
    document = yaml.load(content, { filename: file });
  } catch (error) {
    throw new ConfigurationError('unparseable', file, `failed to parse config file ${file}: ${errorMessage(error)}`, error);
  }

  if (document === undefined || document === null) {
    return EMPTY_CONFIG;
  }

  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new ConfigurationError('invalid', file, `invalid config file ${file}: top level must be a mapping`);
  }

  const result = configFileSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigurationError('invalid', file, `invalid config file ${file}: ${formatIssues(result.error)}`, result.error);
  }

  return toConfig(result.data);
}

export function loadConfigFile(file: string): Config {
  let content: string;
  try {
    content = readFileSync(file, 'utf-8');
  } catch (error) {
    throw new ConfigurationError('unreadable', file, `failed to read config file ${file}: ${errorMessage(error)}`, error);
  }
  return parseConfig(content, file);
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * Canonical path of the home config file, or undefined when it is absent or
 * resolves outside the home directory.
 */
export function locateHomeConfig(home: string, logger?: Logger): string | undefined {
  let canonicalHome: string;
  try {
    canonicalHome = realpathSync(home);
  } catch {
    logger?.debug('home directory cannot be resolved, skipping global config', { home });
    return undefined;
  }

  const candidate = join(canonicalHome, CONFIG_FILE_NAME);
  if (!existsSync(candidate)) {
    return undefined;
  }

  let resolved: string;
  try {
    resolved = realpathSync(candidate);
  } catch {
    logger?.warn('invalid home config path detected, skipping global config', { file: candidate });
    return undefined;
  }

  const rel = relative(canonicalHome, resolved);
  if (rel.split(sep)[0] === '..' || isAbsolute(rel)) {
    logger?.warn('home config resolves outside the home directory, skipping global config', { file: candidate });
    return undefined;
  }

  return isFile(resolved) ? resolved : undefined;
}

function defaultHomeDir(): string | undefined {
  try {
    return homedir() || undefined;
  } catch {
    return undefined;
  }
}

// ============== Merge ==============

function pick(local: string | undefined, global: string | undefined): string | undefined {
  return local !== undefined && local !== '' ? local : global;
}

/**
 * Field-wise merge: set local values win. Strings count as set when non-empty,
 * `upper` when present (false included), `params` when non-empty (replaced whole).
 */
export function mergeConfig(global: Config, local: Config): Config {
  return {
    region: pick(local.region, global.region),
    replica: pick(local.replica, global.replica),
    prefix: pick(local.prefix, global.prefix),
    output: local.output ?? global.output,
    file: pick(local.file, global.file),
    upper: local.upper !== undefined ? local.upper : global.upper,
    env_prefix: pick(local.env_prefix, global.env_prefix),
    role: pick(local.role, global.role),
    kms: pick(local.kms, global.kms),
    params: local.params.length > 0 ? local.params : global.params,
  };
}

// ============== Resolution ==============

export interface ResolveConfigOptions {
  /** null means the home directory is unknown */
  homeDir?: string | null;
  cwd?: string;
  logger?: Logger;
}

/**
 * Load, validate and merge both config files. Any unreadable, unparseable or
 * invalid file aborts resolution; no partially merged config is returned.
 */
export function resolveConfig(options: ResolveConfigOptions = {}): Config {
  const { logger } = options;
  const home = options.homeDir === undefined ? defaultHomeDir() : options.homeDir;
  const cwd = options.cwd ?? process.cwd();

  let config = EMPTY_CONFIG;

  if (home) {
    const homeConfig = locateHomeConfig(home, logger);
    if (homeConfig) {
      logger?.debug('loading global config', { file: homeConfig });
      config = loadConfigFile(homeConfig);
    }
  } else {
    logger?.debug('home directory unavailable, skipping global config');
  }

  const localConfig = join(cwd, CONFIG_FILE_NAME);
  if (isFile(localConfig)) {
    logger?.debug('loading local config', { file: localConfig });
    config = mergeConfig(config, loadConfigFile(localConfig));
  }

  return config;
}
