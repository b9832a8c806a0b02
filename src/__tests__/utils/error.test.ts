/**
 * Error handling tests
 */

import { jest } from '@jest/globals';
import {
  Params2EnvError,
  ConfigurationError,
  ValidationError,
  InvalidKmsArnError,
  MissingRegionError,
  ClientError,
  ParameterNotFoundError,
  ParameterAlreadyExistsError,
  AWSError,
  ReplicaSyncError,
  errorMessage,
  handleError,
  withErrorHandler,
} from '../../utils/error.js';
import { createTestLogger } from '../helpers.js';

describe('utils/error', () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  describe('Params2EnvError', () => {
    it('should create base error with message', () => {
      const error = new Params2EnvError('Test error');
      expect(error.message).toBe('Test error');
      expect(error.name).toBe('Params2EnvError');
      expect(error.code).toBe('PARAMS2ENV_ERROR');
      expect(error).toBeInstanceOf(Error);
    });

    it('should include details', () => {
      const error = new Params2EnvError('Test error', 'TEST_CODE', { key: 'value' });
      expect(error.details).toEqual({ key: 'value' });
      expect(error.code).toBe('TEST_CODE');
    });

    it('should keep the cause', () => {
      const cause = new Error('root');
      const error = new Params2EnvError('Test error', 'TEST_CODE', undefined, cause);
      expect(error.cause).toBe(cause);
    });
  });

  describe('ConfigurationError', () => {
    it('should carry kind and file', () => {
      const error = new ConfigurationError('unparseable', '/home/user/.params2env.yaml', 'bad yaml');

      expect(error.kind).toBe('unparseable');
      expect(error.file).toBe('/home/user/.params2env.yaml');
      expect(error.code).toBe('CONFIGURATION_ERROR');
      expect(error.details).toEqual({ kind: 'unparseable', file: '/home/user/.params2env.yaml' });
      expect(error).toBeInstanceOf(Params2EnvError);
    });
  });

  describe('ValidationError', () => {
    it('should create validation error', () => {
      const error = new ValidationError('invalid region format: nowhere', { region: 'nowhere' });

      expect(error.name).toBe('ValidationError');
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.details?.region).toBe('nowhere');
    });

    it('should be the base of InvalidKmsArnError', () => {
      const error = new InvalidKmsArnError('invalid KMS key ARN arn:aws:kms');

      expect(error).toBeInstanceOf(ValidationError);
      expect(error.code).toBe('INVALID_KMS_ARN');
      expect(error.name).toBe('InvalidKmsArnError');
    });
  });

  describe('MissingRegionError', () => {
    it('should name every region source', () => {
      expect(new MissingRegionError().message).toBe(
        'AWS region must be specified via --region, config file, or AWS_REGION environment variable',
      );
    });
  });

  describe('parameter errors', () => {
    it('should describe a missing parameter', () => {
      const error = new ParameterNotFoundError('/app/key', 'eu-central-1');

      expect(error.message).toBe("parameter '/app/key' not found in region 'eu-central-1'");
      expect(error.details).toEqual({ path: '/app/key', region: 'eu-central-1' });
    });

    it('should point at --overwrite for an existing parameter', () => {
      const error = new ParameterAlreadyExistsError('/app/key', 'eu-central-1');

      expect(error.message).toBe(
        "parameter '/app/key' already exists in region 'eu-central-1' (use --overwrite to replace it)",
      );
      expect(error.code).toBe('PARAMETER_ALREADY_EXISTS');
    });
  });

  describe('AWS errors', () => {
    it('should create client and AWS errors', () => {
      expect(new ClientError('no credentials').code).toBe('CLIENT_ERROR');
      expect(new AWSError('throttled').code).toBe('AWS_ERROR');
    });

    it('should create replica sync error with cause', () => {
      const cause = new AWSError('throttled');
      const error = new ReplicaSyncError('replica failed', { region: 'us-west-2' }, cause);

      expect(error.code).toBe('REPLICA_SYNC_ERROR');
      expect(error.cause).toBe(cause);
      expect(error.details).toEqual({ region: 'us-west-2' });
    });
  });

  describe('errorMessage', () => {
    it('should use the message of an Error', () => {
      expect(errorMessage(new Error('boom'))).toBe('boom');
    });

    it('should stringify anything else', () => {
      expect(errorMessage('plain')).toBe('plain');
      expect(errorMessage(42)).toBe('42');
    });
  });

  describe('handleError', () => {
    it('should log one error line and set the exit code', () => {
      const { logger, lines } = createTestLogger('info');

      handleError(new ValidationError('invalid region format: nowhere'), logger);

      expect(lines).toEqual(['ERROR invalid region format: nowhere\n']);
      expect(process.exitCode).toBe(1);
    });

    it('should log error details at debug level', () => {
      const { logger, lines } = createTestLogger('debug');

      handleError(new ParameterNotFoundError('/app/key', 'eu-central-1'), logger);

      expect(lines).toEqual([
        "ERROR parameter '/app/key' not found in region 'eu-central-1'\n",
        'DEBUG error details code=PARAMETER_NOT_FOUND path=/app/key region=eu-central-1\n',
      ]);
    });

    it('should handle non-Error values', () => {
      const { logger, lines } = createTestLogger('info');

      handleError('something odd', logger);

      expect(lines).toEqual(['ERROR something odd\n']);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('withErrorHandler', () => {
    it('should pass arguments through and report failures', async () => {
      const { logger, lines } = createTestLogger('info');
      const action = jest.fn(async (name: string) => {
        throw new ClientError(`cannot build client for ${name}`);
      });

      await withErrorHandler(logger, action)('eu-central-1');

      expect(action).toHaveBeenCalledWith('eu-central-1');
      expect(lines).toEqual(['ERROR cannot build client for eu-central-1\n']);
      expect(process.exitCode).toBe(1);
    });

    it('should leave the exit code alone on success', async () => {
      const { logger, lines } = createTestLogger('info');

      await withErrorHandler(logger, async () => undefined)();

      expect(lines).toEqual([]);
      expect(process.exitCode).toBeUndefined();
    });
  });
});
