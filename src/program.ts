import { Command, Option } from 'commander';
import { buildCreateCommand } from './commands/create.js';
import { buildDeleteCommand } from './commands/delete.js';
import { buildModifyCommand } from './commands/modify.js';
import { buildReadCommand } from './commands/read.js';
import type { CommandContext } from './commands/shared.js';
import { LOG_LEVELS, parseLogLevel } from './utils/logger.js';

export const VERSION = '1.0.0';

export function buildProgram(context: CommandContext): Command {
  const program = new Command();

  program
    .name('params2env')
    .description('Manage AWS SSM Parameter Store entries and export them as environment variables')
    .version(`params2env version ${VERSION}`, '--version', 'Show version information')
    .addOption(new Option('--loglevel <level>', 'Log level').choices(LOG_LEVELS).default('info'))
    .hook('preAction', (thisCommand) => {
      const { loglevel } = thisCommand.opts<{ loglevel?: string }>();
      context.logger.setLevel(parseLogLevel(loglevel));
    });

  program.addCommand(buildReadCommand(context));
  program.addCommand(buildCreateCommand(context));
  program.addCommand(buildModifyCommand(context));
  program.addCommand(buildDeleteCommand(context));

  return program;
}
