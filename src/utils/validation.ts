import { InvalidArgumentError } from 'commander';
import { ValidationError } from './error.js';

/**
 * AWS input validators. Every check runs before any client is built.
 */

const PARAMETER_PATH_PATTERN = /^\/[a-zA-Z0-9_.-]+(\/[a-zA-Z0-9_.-]+)*$/;
const REGION_PATTERN = /^[a-z]{2}(-[a-z]+)+-\d$/;
const KMS_KEY_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
const KMS_ALIAS_PATTERN = /^alias\/[a-zA-Z0-9/_-]+$/;
const KMS_ARN_PATTERN =
  /^arn:aws:kms:[a-z]{2}(-[a-z]+)+-\d:\d{12}:key\/[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;
const ROLE_ARN_PATTERN = /^arn:aws:iam::\d{12}:role\/[a-zA-Z0-9+=,.@_-]+(\/[a-zA-Z0-9+=,.@_-]+)*$/;

export const PARAMETER_TYPES = ['String', 'SecureString'] as const;

export type ParameterType = (typeof PARAMETER_TYPES)[number];

export function validateParameterPath(path: string): void {
  if (path === '') {
    throw new ValidationError('parameter path cannot be empty');
  }
  if (!path.startsWith('/')) {
    throw new ValidationError("parameter path must start with '/'", { path });
  }
  if (path.endsWith('/')) {
    throw new ValidationError("parameter path must not end with '/'", { path });
  }
  if (path.includes('//')) {
    throw new ValidationError("parameter path must not contain consecutive '/'", { path });
  }
  if (!PARAMETER_PATH_PATTERN.test(path)) {
    throw new ValidationError(`invalid parameter path format: ${path}`, { path });
  }
}

/**
 * An empty region means "unset" and passes
 */
export function validateRegion(region: string | undefined): void {
  if (region && !REGION_PATTERN.test(region)) {
    throw new ValidationError(`invalid region format: ${region}`, { region });
  }
}

export function validateReplicaRegion(replica: string | undefined): void {
  if (replica && !REGION_PATTERN.test(replica)) {
    throw new ValidationError(`invalid replica region: invalid region format: ${replica}`, { replica });
  }
}

/**
 * Accepts a key id (UUID), an alias or a full key ARN
 */
export function validateKmsKey(key: string | undefined): void {
  if (!key) {
    return;
  }
  if (KMS_KEY_ID_PATTERN.test(key) || KMS_ALIAS_PATTERN.test(key) || KMS_ARN_PATTERN.test(key)) {
    return;
  }
  throw new ValidationError(`invalid KMS key format: ${key}`, { kms: key });
}

export function validateRoleArn(arn: string | undefined): void {
  if (!arn) {
    return;
  }
  if (!ROLE_ARN_PATTERN.test(arn)) {
    throw new ValidationError(`invalid role ARN format: ${arn}`, { role: arn });
  }
}

export function validateRegions(primary: string, replica: string | undefined): void {
  if (replica && primary === replica) {
    throw new ValidationError(`replica region '${replica}' cannot be the same as primary region '${primary}'`, {
      region: primary,
      replica,
    });
  }
}

export function isParameterType(value: string): value is ParameterType {
  return PARAMETER_TYPES.some((type) => type === value);
}

export function validateParameterType(value: string): ParameterType {
  const trimmed = value.trim();
  if (!isParameterType(trimmed)) {
    throw new ValidationError(`invalid parameter type: ${trimmed} (must be 'String' or 'SecureString')`, {
      type: trimmed,
    });
  }
  return trimmed;
}

export function validateRequired(value: string | undefined, flag: string): string {
  if (!value) {
    throw new ValidationError(`required flag "${flag}" not set`);
  }
  return value;
}

// ============== CLI flag parsers ==============

const TRUE_VALUES = ['true', '1', 'yes'];
const FALSE_VALUES = ['false', '0', 'no'];

/**
 * commander argument parser for `--flag [bool]` options
 */
export function parseBooleanFlag(value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) {
    return true;
  }
  if (FALSE_VALUES.includes(normalized)) {
    return false;
  }
  throw new InvalidArgumentError(`expected true or false, got "${value}"`);
}
