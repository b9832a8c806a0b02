import {
  SSMClient,
  GetParameterCommand,
  PutParameterCommand,
  DeleteParameterCommand,
  ParameterNotFound,
  ParameterAlreadyExists,
  type GetParameterCommandInput,
  type GetParameterCommandOutput,
  type PutParameterCommandInput,
  type PutParameterCommandOutput,
  type DeleteParameterCommandInput,
  type DeleteParameterCommandOutput,
} from '@aws-sdk/client-ssm';
import { fromTemporaryCredentials } from '@aws-sdk/credential-providers';
import {
  AWSError,
  ClientError,
  ParameterAlreadyExistsError,
  ParameterNotFoundError,
  errorMessage,
} from '../error.js';
import type { ParameterType } from '../validation.js';

// ============== Interfaces ==============

export interface PutParameterRequest {
  path: string;
  value: string;
  type?: ParameterType;
  description?: string;
  kmsKeyId?: string;
  overwrite: boolean;
  /** Fail with ParameterNotFoundError instead of creating the parameter */
  mustExist?: boolean;
}

/**
 * A parameter store bound to one region
 */
export interface ParameterStoreClient {
  readonly region: string;
  getParameter(path: string): Promise<string>;
  putParameter(request: PutParameterRequest): Promise<void>;
  deleteParameter(path: string): Promise<void>;
}

export interface ParameterStoreClientFactory {
  createClient(region: string, role?: string): Promise<ParameterStoreClient>;
}

/**
 * The three SSM calls the store needs
 */
export interface SSMApi {
  getParameter(input: GetParameterCommandInput): Promise<GetParameterCommandOutput>;
  putParameter(input: PutParameterCommandInput): Promise<PutParameterCommandOutput>;
  deleteParameter(input: DeleteParameterCommandInput): Promise<DeleteParameterCommandOutput>;
}

export function ssmApiFor(client: SSMClient): SSMApi {
  return {
    getParameter: (input) => client.send(new GetParameterCommand(input)),
    putParameter: (input) => client.send(new PutParameterCommand(input)),
    deleteParameter: (input) => client.send(new DeleteParameterCommand(input)),
  };
}

function isAccessDenied(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AccessDeniedException' || error.name === 'AccessDenied');
}

// ============== Parameter store ==============

export class SSMParameterStore implements ParameterStoreClient {
  constructor(
    private readonly api: SSMApi,
    readonly region: string,
  ) {}

  /**
   * Read a parameter, decrypting SecureString values
   */
  async getParameter(path: string): Promise<string> {
    let response: GetParameterCommandOutput;
    try {
      response = await this.api.getParameter({ Name: path, WithDecryption: true });
    } catch (error) {
      throw this.translate(error, 'get', path);
    }

    const value = response.Parameter?.Value;
    if (value === undefined) {
      throw new AWSError(`parameter '${path}' has no value`, { path, region: this.region });
    }
    return value;
  }

  async putParameter(request: PutParameterRequest): Promise<void> {
    let type = request.type;

    if (request.mustExist) {
      const existing = await this.describe(request.path);
      type = type ?? existing;
    }

    const input: PutParameterCommandInput = {
      Name: request.path,
      Value: request.value,
      Overwrite: request.overwrite,
    };
    if (type) {
      input.Type = type;
    }
    if (request.description) {
      input.Description = request.description;
    }
    if (request.kmsKeyId) {
      input.KeyId = request.kmsKeyId;
    }

    try {
      await this.api.putParameter(input);
    } catch (error) {
      throw this.translate(error, request.mustExist ? 'modify' : 'create', request.path);
    }
  }

  async deleteParameter(path: string): Promise<void> {
    try {
      await this.api.deleteParameter({ Name: path });
    } catch (error) {
      throw this.translate(error, 'delete', path);
    }
  }

  /**
   * Type of an existing parameter; no decryption needed
   */
  private async describe(path: string): Promise<ParameterType | undefined> {
    let response: GetParameterCommandOutput;
    try {
      response = await this.api.getParameter({ Name: path, WithDecryption: false });
    } catch (error) {
      throw this.translate(error, 'modify', path);
    }

    const type = response.Parameter?.Type;
    return type === 'String' || type === 'SecureString' ? type : undefined;
  }

  private translate(error: unknown, action: string, path: string): Error {
    if (error instanceof ParameterNotFound) {
      return new ParameterNotFoundError(path, this.region, error);
    }
    if (error instanceof ParameterAlreadyExists) {
      return new ParameterAlreadyExistsError(path, this.region, error);
    }
    if (isAccessDenied(error)) {
      return new AWSError(
        `insufficient permissions to ${action} parameter '${path}' in region '${this.region}'`,
        { path, region: this.region },
        error,
      );
    }
    return new AWSError(
      `failed to ${action} parameter '${path}' in region '${this.region}': ${errorMessage(error)}`,
      { path, region: this.region },
      error,
    );
  }
}

// ============== Client factory ==============

const ROLE_SESSION_NAME = 'params2env';

export type RoleCredentialsFactory = typeof fromTemporaryCredentials;

type RoleCredentials = Awaited<ReturnType<ReturnType<RoleCredentialsFactory>>>;

/**
 * Builds SSM clients from the default credential chain, optionally through an
 * assumed role. The role is assumed once, up front, so a failed assumption
 * surfaces as a ClientError before any parameter call and the client reuses
 * the resolved credentials.
 */
export class SSMClientFactory implements ParameterStoreClientFactory {
  constructor(private readonly assumeRole: RoleCredentialsFactory = fromTemporaryCredentials) {}

  async createClient(region: string, role?: string): Promise<ParameterStoreClient> {
    if (!region) {
      throw new ClientError('region is required');
    }

    let credentials: RoleCredentials | undefined;
    if (role) {
      const provider = this.assumeRole({
        params: { RoleArn: role, RoleSessionName: ROLE_SESSION_NAME },
        clientConfig: { region },
      });

      try {
        credentials = await provider();
      } catch (error) {
        throw new ClientError(`failed to assume role ${role}: ${errorMessage(error)}`, { region, role }, error);
      }
    }

    let client: SSMClient;
    try {
      client = new SSMClient({ region, credentials });
    } catch (error) {
      throw new ClientError(`failed to create AWS client: ${errorMessage(error)}`, { region }, error);
    }

    return new SSMParameterStore(ssmApiFor(client), region);
  }
}
