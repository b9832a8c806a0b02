import { Command } from 'commander';
import type { DeleteArgs } from '../services/parameter-coordinator.js';
import { withErrorHandler } from '../utils/error.js';
import { createCoordinator, reportOperation, type CommandContext } from './shared.js';

interface DeleteOptions {
  path: string;
  region?: string;
  role?: string;
  replica?: string;
}

export function buildDeleteCommand(context: CommandContext): Command {
  return new Command('delete')
    .description('Delete a parameter from SSM Parameter Store')
    .requiredOption('--path <path>', 'Parameter path')
    .option('--region <region>', 'AWS region (default: config file or AWS_REGION)')
    .option('--role <arn>', 'AWS role ARN to assume')
    .option('--replica <region>', 'Region to delete the replica from')
    .addHelpText(
      'after',
      `
A replica that is already gone only produces a warning.`,
    )
    .action(
      withErrorHandler(context.logger, async (options: DeleteOptions) => {
        const args: DeleteArgs = Object.freeze({ ...options });
        const result = await createCoordinator(context).delete(args, context.loadConfig());
        reportOperation(result);
      }),
    );
}
