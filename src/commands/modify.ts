import { Command } from 'commander';
import type { ModifyArgs } from '../services/parameter-coordinator.js';
import { withErrorHandler } from '../utils/error.js';
import { createCoordinator, reportOperation, type CommandContext } from './shared.js';

interface ModifyOptions {
  path: string;
  value: string;
  description?: string;
  region?: string;
  role?: string;
  replica?: string;
}

export function buildModifyCommand(context: CommandContext): Command {
  return new Command('modify')
    .description('Modify an existing parameter in SSM Parameter Store')
    .requiredOption('--path <path>', 'Parameter path')
    .requiredOption('--value <value>', 'New parameter value')
    .option('--description <text>', 'New parameter description')
    .option('--region <region>', 'AWS region (default: config file or AWS_REGION)')
    .option('--role <arn>', 'AWS role ARN to assume')
    .option('--replica <region>', 'Region holding a replica to update as well')
    .action(
      withErrorHandler(context.logger, async (options: ModifyOptions) => {
        const args: ModifyArgs = Object.freeze({ ...options });
        const result = await createCoordinator(context).modify(args, context.loadConfig());
        reportOperation(result);
      }),
    );
}
