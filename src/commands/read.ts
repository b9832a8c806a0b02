import { Command } from 'commander';
import type { ReadArgs } from '../services/parameter-coordinator.js';
import { withErrorHandler } from '../utils/error.js';
import { formatExportLine, printInfo, printSuccess, writeOutputFile } from '../utils/output.js';
import { parseBooleanFlag } from '../utils/validation.js';
import { createCoordinator, type CommandContext } from './shared.js';

interface ReadOptions {
  path?: string;
  region?: string;
  role?: string;
  file?: string;
  upper?: boolean;
  envPrefix?: string;
  env?: string;
}

export function buildReadCommand(context: CommandContext): Command {
  return new Command('read')
    .description('Read parameters from SSM Parameter Store as export lines')
    .option('--path <path>', 'Parameter path (required if no parameters are defined in config)')
    .option('--region <region>', 'AWS region (default: config file or AWS_REGION)')
    .option('--role <arn>', 'AWS role ARN to assume')
    .option('--file <file>', 'Write the export lines to this file instead of stdout')
    .option('--upper [bool]', 'Upper-case environment variable names (default: true)', parseBooleanFlag)
    .option('--env-prefix <prefix>', 'Prefix for environment variable names')
    .option('--env <name>', 'Environment variable name (single parameter only)')
    .addHelpText(
      'after',
      `
Examples:
  $ params2env read --path /myapp/config/url
  $ params2env read --path /myapp/config/url --file ./env/myapp.env
  $ params2env read --path /myapp/config/url --env MY_URL --env-prefix APP --upper=false
  $ params2env read                      # every parameter listed under "params" in .params2env.yaml`,
    )
    .action(
      withErrorHandler(context.logger, async (options: ReadOptions) => {
        const args: ReadArgs = Object.freeze({ ...options });
        const config = context.loadConfig();
        const result = await createCoordinator(context).read(args, config);

        if (result.file) {
          // Export lines share stdout; status goes to the stderr logger then
          const exportsOnStdout = result.stdout.length > 0;
          const info = exportsOnStdout ? (message: string) => context.logger.info(message) : printInfo;
          const success = exportsOnStdout ? (message: string) => context.logger.info(message) : printSuccess;

          const { path, entries } = result.file;
          for (const entry of entries) {
            info(`Reading parameter '${entry.path}' from region '${entry.region}'`);
          }
          await writeOutputFile(path, entries.map((entry) => formatExportLine(entry.name, entry.value)).join(''));
          success(`Parameter values written to ${path}`);
        }

        if (result.stdout.length > 0) {
          process.stdout.write(result.stdout.map((entry) => formatExportLine(entry.name, entry.value)).join(''));
        }
      }),
    );
}
