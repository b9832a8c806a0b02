import chalk from 'chalk';
import { open, mkdir } from 'fs/promises';
import { dirname, posix } from 'path';

// ============== Human-readable output ==============

/**
 * Green check line on stdout
 */
export function printSuccess(message: string): void {
  console.log(chalk.green(`✓ ${message}`));
}

/**
 * Blue info line on stdout
 */
export function printInfo(message: string): void {
  console.log(chalk.blue(`ℹ ${message}`));
}

// ============== Export lines ==============

export interface EnvNameOptions {
  /** Explicit variable name, replaces the derived one */
  env?: string;
  prefix?: string;
  upper: boolean;
}

/**
 * Variable name for a parameter: explicit name or last path segment,
 * `<prefix>_` prepended, upper-cased unless disabled.
 */
export function formatEnvName(path: string, options: EnvNameOptions): string {
  let name = options.env || posix.basename(path);

  if (options.prefix) {
    name = `${options.prefix}_${name}`;
  }

  return options.upper ? name.toUpperCase() : name;
}

/**
 * Double-quoted, with backslashes, quotes and control characters escaped.
 * `$` and backticks are left as they are, so the line is not shell-safe under
 * `eval` when the value holds them; a newline becomes a literal `\n`.
 */
export function quoteValue(value: string): string {
  return JSON.stringify(value);
}

export function formatExportLine(name: string, value: string): string {
  return `export ${name}=${quoteValue(value)}\n`;
}

// ============== Files ==============

const OWNER_ONLY_DIR = 0o700;
const OWNER_ONLY_FILE = 0o600;

/**
 * Create-or-truncate `file` and write `content` in one go. Missing parent
 * directories and the file itself are owner-only before anything is written,
 * since the content may hold decrypted secrets.
 */
export async function writeOutputFile(file: string, content: string): Promise<void> {
  await mkdir(dirname(file), { recursive: true, mode: OWNER_ONLY_DIR });

  const handle = await open(file, 'w', OWNER_ONLY_FILE);
  try {
    await handle.chmod(OWNER_ONLY_FILE);
    await handle.writeFile(content, 'utf-8');
  } finally {
    await handle.close();
  }
}
