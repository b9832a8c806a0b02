/**
 * Test helpers
 */

import chalk from 'chalk';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ClientError, ParameterAlreadyExistsError, ParameterNotFoundError } from '../utils/error.js';
import { Logger, type LogLevel } from '../utils/logger.js';
import type { ParameterStoreClient, ParameterStoreClientFactory, PutParameterRequest } from '../utils/aws/ssm.js';
import type { ParameterType } from '../utils/validation.js';

// Plain text assertions
chalk.level = 0;

export interface StoredParameter {
  value: string;
  type?: ParameterType;
  description?: string;
  kmsKeyId?: string;
}

export interface StoreCall {
  region: string;
  method: 'get' | 'put' | 'delete';
  path: string;
}

/**
 * Region-bound store backed by a Map
 */
export class InMemoryParameterStore implements ParameterStoreClient {
  readonly parameters = new Map<string, StoredParameter>();
  /** Thrown by every call while set */
  failure?: Error;

  constructor(
    readonly region: string,
    private readonly calls: StoreCall[],
  ) {}

  async getParameter(path: string): Promise<string> {
    this.record('get', path);
    const parameter = this.parameters.get(path);
    if (!parameter) {
      throw new ParameterNotFoundError(path, this.region);
    }
    return parameter.value;
  }

  async putParameter(request: PutParameterRequest): Promise<void> {
    this.record('put', request.path);
    const existing = this.parameters.get(request.path);
    if (request.mustExist && !existing) {
      throw new ParameterNotFoundError(request.path, this.region);
    }
    if (existing && !request.overwrite) {
      throw new ParameterAlreadyExistsError(request.path, this.region);
    }
    this.parameters.set(request.path, {
      value: request.value,
      type: request.type ?? existing?.type,
      description: request.description ?? existing?.description,
      kmsKeyId: request.kmsKeyId,
    });
  }

  async deleteParameter(path: string): Promise<void> {
    this.record('delete', path);
    if (!this.parameters.delete(path)) {
      throw new ParameterNotFoundError(path, this.region);
    }
  }

  private record(method: StoreCall['method'], path: string): void {
    this.calls.push({ region: this.region, method, path });
    if (this.failure) {
      throw this.failure;
    }
  }
}

/**
 * Hands out one in-memory store per region and records every client built
 */
export class FakeClientFactory implements ParameterStoreClientFactory {
  readonly calls: StoreCall[] = [];
  readonly created: Array<{ region: string; role?: string }> = [];
  private readonly stores = new Map<string, InMemoryParameterStore>();
  private readonly broken = new Set<string>();

  store(region: string): InMemoryParameterStore {
    let store = this.stores.get(region);
    if (!store) {
      store = new InMemoryParameterStore(region, this.calls);
      this.stores.set(region, store);
    }
    return store;
  }

  failClientFor(region: string): void {
    this.broken.add(region);
  }

  async createClient(region: string, role?: string): Promise<ParameterStoreClient> {
    this.created.push({ region, role });
    if (this.broken.has(region)) {
      throw new ClientError(`failed to create AWS client for region '${region}'`, { region });
    }
    return this.store(region);
  }
}

/**
 * Logger writing into an array instead of stderr
 */
export function createTestLogger(level: LogLevel = 'debug'): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new Logger(level, (line) => lines.push(line)), lines };
}

export function createTempDir(prefix = 'params2env-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * Rejection of `fn`; fails the test when it resolves
 */
export async function captureError(fn: () => Promise<unknown>): Promise<unknown> {
  try {
    await fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw an error');
}
