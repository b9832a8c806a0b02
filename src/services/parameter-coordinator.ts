import type { Config, OutputMode, ParamConfig } from '../utils/config.js';
import {
  ClientError,
  MissingRegionError,
  ParameterNotFoundError,
  ReplicaSyncError,
  ValidationError,
  errorMessage,
} from '../utils/error.js';
import type { Logger } from '../utils/logger.js';
import { formatEnvName } from '../utils/output.js';
import { replicaKmsKeyId } from '../utils/aws/kms.js';
import type { ParameterStoreClient, ParameterStoreClientFactory } from '../utils/aws/ssm.js';
import {
  validateKmsKey,
  validateParameterPath,
  validateParameterType,
  validateRegion,
  validateRegions,
  validateReplicaRegion,
  validateRequired,
  validateRoleArn,
} from '../utils/validation.js';

// ============== Arguments ==============

export interface ReadArgs {
  readonly path?: string;
  readonly region?: string;
  readonly role?: string;
  readonly file?: string;
  readonly upper?: boolean;
  readonly envPrefix?: string;
  readonly env?: string;
}

export interface CreateArgs {
  readonly path: string;
  readonly value: string;
  readonly type?: string;
  readonly description?: string;
  readonly kms?: string;
  readonly region?: string;
  readonly role?: string;
  readonly replica?: string;
  readonly overwrite?: boolean;
}

export interface ModifyArgs {
  readonly path: string;
  readonly value: string;
  readonly description?: string;
  readonly region?: string;
  readonly role?: string;
  readonly replica?: string;
}

export interface DeleteArgs {
  readonly path: string;
  readonly region?: string;
  readonly role?: string;
  readonly replica?: string;
}

// ============== Results ==============

export type WriteOperation = 'create' | 'modify' | 'delete';

export type RegionTarget = 'primary' | 'replica';

export interface RegionOutcome {
  region: string;
  target: RegionTarget;
  status: 'applied' | 'already-absent';
}

export interface OperationResult {
  operation: WriteOperation;
  path: string;
  outcomes: RegionOutcome[];
}

export interface ExportEntry {
  path: string;
  region: string;
  name: string;
  value: string;
}

export interface ReadResult {
  /** Entries printed as export lines */
  stdout: ExportEntry[];
  /** Entries written to the output file */
  file?: { path: string; entries: ExportEntry[] };
}

interface WritePlan {
  operation: WriteOperation;
  path: string;
  region: string;
  replica?: string;
  role?: string;
}

interface ReadPlan {
  path: string;
  region: string;
  name: string;
  destination: OutputMode;
}

type ApplyFn = (client: ParameterStoreClient, target: RegionTarget) => Promise<void>;

// ============== Coordinator ==============

/**
 * Merges CLI arguments over the resolved config and runs each verb against the
 * primary region, then the replica region when one is set.
 *
 * A primary failure aborts before the replica is touched. A replica failure
 * fails the whole operation and leaves the primary write in place, except a
 * replica delete of a parameter that is already gone, which only warns.
 */
export class ParameterCoordinator {
  constructor(
    private readonly clientFactory: ParameterStoreClientFactory,
    private readonly logger: Logger,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {}

  /**
   * --region flag, then config, then AWS_REGION
   */
  resolveRegion(flag?: string, configured?: string): string {
    const region = flag || configured || this.env.AWS_REGION;
    if (!region) {
      throw new MissingRegionError();
    }
    validateRegion(region);
    return region;
  }

  async read(args: ReadArgs, config: Config): Promise<ReadResult> {
    const role = args.role || config.role;
    validateRegion(args.region);
    validateRoleArn(role);

    let targets: readonly ParamConfig[];
    if (args.path) {
      targets = [{ name: args.path, env: args.env }];
    } else if (config.params.length > 0) {
      targets = config.params;
    } else {
      throw new ValidationError('required flag "path" not set');
    }

    const file = args.file || config.file;
    const prefix = args.envPrefix || config.env_prefix;
    const upper = args.upper ?? config.upper ?? true;

    const plans = targets.map((param): ReadPlan => {
      validateParameterPath(param.name);

      const destination: OutputMode = args.file ? 'file' : (param.output ?? config.output ?? (file ? 'file' : 'env'));
      if (destination === 'file' && !file) {
        throw new ValidationError(`output mode 'file' for parameter '${param.name}' requires --file or a 'file' config entry`);
      }

      return {
        path: param.name,
        region: this.resolveRegion(args.region || param.region, config.region),
        name: formatEnvName(param.name, { env: param.env, prefix, upper }),
        destination,
      };
    });

    const clients = new Map<string, ParameterStoreClient>();
    const result: ReadResult = { stdout: [] };

    for (const plan of plans) {
      let client = clients.get(plan.region);
      if (!client) {
        client = await this.connect(plan.region, role);
        clients.set(plan.region, client);
      }

      this.logger.debug('reading parameter', { path: plan.path, region: plan.region });
      const value = await client.getParameter(plan.path);
      const entry: ExportEntry = { path: plan.path, region: plan.region, name: plan.name, value };

      if (plan.destination === 'file' && file) {
        result.file = result.file ?? { path: file, entries: [] };
        result.file.entries.push(entry);
      } else {
        result.stdout.push(entry);
      }
    }

    return result;
  }

  async create(args: CreateArgs, config: Config): Promise<OperationResult> {
    const path = validateRequired(args.path, 'path');
    validateParameterPath(path);
    const value = validateRequired(args.value, 'value');
    const type = validateParameterType(args.type ?? 'String');

    if (args.kms && type !== 'SecureString') {
      throw new ValidationError('KMS key can only be used with SecureString parameters', { kms: args.kms, type });
    }
    const kms = args.kms || (type === 'SecureString' ? config.kms : undefined);
    validateKmsKey(kms);

    const plan = this.planWrite('create', path, args, config);
    // Rewritten before the primary write so a malformed ARN fails with nothing applied
    const replicaKms = kms && plan.replica ? replicaKmsKeyId(kms, plan.replica) : kms;

    return this.replicate(plan, (client, target) =>
      client.putParameter({
        path,
        value,
        type,
        description: args.description,
        kmsKeyId: target === 'primary' ? kms : replicaKms,
        overwrite: args.overwrite ?? false,
      }),
    );
  }

  async modify(args: ModifyArgs, config: Config): Promise<OperationResult> {
    const path = validateRequired(args.path, 'path');
    validateParameterPath(path);
    const value = validateRequired(args.value, 'value');

    const plan = this.planWrite('modify', path, args, config);

    return this.replicate(plan, (client) =>
      client.putParameter({
        path,
        value,
        description: args.description,
        overwrite: true,
        mustExist: true,
      }),
    );
  }

  async delete(args: DeleteArgs, config: Config): Promise<OperationResult> {
    const path = validateRequired(args.path, 'path');
    validateParameterPath(path);

    const plan = this.planWrite('delete', path, args, config);

    return this.replicate(plan, (client) => client.deleteParameter(path), true);
  }

  private planWrite(
    operation: WriteOperation,
    path: string,
    args: { region?: string; role?: string; replica?: string },
    config: Config,
  ): WritePlan {
    validateRegion(args.region);
    validateReplicaRegion(args.replica);

    const region = this.resolveRegion(args.region, config.region);
    const replica = args.replica || config.replica;
    const role = args.role || config.role;

    validateReplicaRegion(replica);
    validateRegions(region, replica);
    validateRoleArn(role);

    return { operation, path, region, replica, role };
  }

  private async connect(region: string, role?: string): Promise<ParameterStoreClient> {
    try {
      return await this.clientFactory.createClient(region, role);
    } catch (error) {
      if (error instanceof ClientError) {
        throw error;
      }
      throw new ClientError(`failed to create AWS client: ${errorMessage(error)}`, { region }, error);
    }
  }

  private async replicate(plan: WritePlan, apply: ApplyFn, replicaMissingIsDone = false): Promise<OperationResult> {
    const { operation, path, region, replica, role } = plan;

    const primary = await this.connect(region, role);
    this.logger.debug(`${operation} parameter`, { path, region });
    await apply(primary, 'primary');

    const result: OperationResult = {
      operation,
      path,
      outcomes: [{ region, target: 'primary', status: 'applied' }],
    };

    if (!replica) {
      return result;
    }

    const details = { operation, path, region: replica, primaryRegion: region };

    let replicaClient: ParameterStoreClient;
    try {
      replicaClient = await this.connect(replica, role);
    } catch (error) {
      throw new ReplicaSyncError(
        `failed to create AWS client for replica region '${replica}' after primary region '${region}' succeeded: ${errorMessage(error)}`,
        details,
        error,
      );
    }

    this.logger.debug(`${operation} parameter in replica region`, { path, region: replica });
    try {
      await apply(replicaClient, 'replica');
      result.outcomes.push({ region: replica, target: 'replica', status: 'applied' });
    } catch (error) {
      if (!(replicaMissingIsDone && error instanceof ParameterNotFoundError)) {
        throw new ReplicaSyncError(
          `failed to ${operation} parameter in replica region '${replica}' after primary region '${region}' succeeded: ${errorMessage(error)}`,
          details,
          error,
        );
      }

      this.logger.warn(`parameter '${path}' not found in replica region '${replica}' (already deleted or never existed)`);
      result.outcomes.push({ region: replica, target: 'replica', status: 'already-absent' });
    }

    return result;
  }
}
