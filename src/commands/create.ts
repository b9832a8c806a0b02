import { Command } from 'commander';
import type { CreateArgs } from '../services/parameter-coordinator.js';
import { withErrorHandler } from '../utils/error.js';
import { parseBooleanFlag } from '../utils/validation.js';
import { createCoordinator, reportOperation, type CommandContext } from './shared.js';

interface CreateOptions {
  path: string;
  value: string;
  type: string;
  description?: string;
  kms?: string;
  region?: string;
  role?: string;
  replica?: string;
  overwrite?: boolean;
}

export function buildCreateCommand(context: CommandContext): Command {
  return new Command('create')
    .description('Create a parameter in SSM Parameter Store')
    .requiredOption('--path <path>', 'Parameter path')
    .requiredOption('--value <value>', 'Parameter value')
    .option('--type <type>', 'Parameter type (String or SecureString)', 'String')
    .option('--description <text>', 'Parameter description')
    .option('--kms <key>', 'KMS key id, alias or ARN for SecureString parameters')
    .option('--region <region>', 'AWS region (default: config file or AWS_REGION)')
    .option('--role <arn>', 'AWS role ARN to assume')
    .option('--replica <region>', 'Region to replicate the parameter to')
    .option('--overwrite [bool]', 'Overwrite an existing parameter (default: false)', parseBooleanFlag)
    .addHelpText(
      'after',
      `
Examples:
  $ params2env create --path /myapp/config/url --value https://example.com
  $ params2env create --path /myapp/secrets/api-key --value s3cr3t --type SecureString --kms alias/mykey
  $ params2env create --path /myapp/config/shared --value v1 --replica us-west-2`,
    )
    .action(
      withErrorHandler(context.logger, async (options: CreateOptions) => {
        const args: CreateArgs = Object.freeze({ ...options });
        const result = await createCoordinator(context).create(args, context.loadConfig());
        reportOperation(result);
      }),
    );
}
