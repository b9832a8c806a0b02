import type { Config } from '../utils/config.js';
import type { Logger } from '../utils/logger.js';
import type { ParameterStoreClientFactory } from '../utils/aws/ssm.js';
import { ParameterCoordinator, type OperationResult, type WriteOperation } from '../services/parameter-coordinator.js';
import { printSuccess } from '../utils/output.js';

/**
 * Everything a command needs from the outside world
 */
export interface CommandContext {
  logger: Logger;
  clientFactory: ParameterStoreClientFactory;
  loadConfig: () => Config;
  env: NodeJS.ProcessEnv;
}

export function createCoordinator(context: CommandContext): ParameterCoordinator {
  return new ParameterCoordinator(context.clientFactory, context.logger, context.env);
}

const PAST_TENSE: Record<WriteOperation, string> = {
  create: 'created',
  modify: 'modified',
  delete: 'deleted',
};

/**
 * One confirmation line per region that was written
 */
export function reportOperation(result: OperationResult): void {
  for (const outcome of result.outcomes) {
    if (outcome.status !== 'applied') {
      continue;
    }
    const where = outcome.target === 'replica' ? 'replica region' : 'region';
    printSuccess(`Successfully ${PAST_TENSE[result.operation]} parameter '${result.path}' in ${where} '${outcome.region}'`);
  }
}
