/**
 * Node naming
 *
 * `--name` starts distribution with long names, `--sname` with short names.
 * Giving both is rejected before anything else runs.
 */

import type { CliLogger } from '../cli/logger.js';
import { DISTRIBUTION } from '../constants/index.js';
import { ConfigurationError } from '../error-handling/shell-errors.js';
import type { DistributionService, NameMode } from '../platform/distribution.js';
import type { OptionMapping } from './types.js';

export type NodeIdentity = {
  name: string;
  mode: NameMode;
};

/**
 * Throws ConfigurationError when both identity modes are requested.
 */
export function resolveNodeIdentity(options: OptionMapping): NodeIdentity | undefined {
  const { name, sname } = options;
  if (name !== undefined && sname !== undefined) {
    throw new ConfigurationError('Cannot have both short and long node names defined', { name, sname });
  }
  if (name !== undefined) {
    return { name, mode: 'longnames' };
  }
  if (sname !== undefined) {
    return { name: sname, mode: 'shortnames' };
  }
  return undefined;
}

/**
 * Returns the node name in effect afterwards.
 */
export async function setupName(
  options: OptionMapping,
  distribution: DistributionService,
  logger: Pick<CliLogger, 'error' | 'debug'>
): Promise<string> {
  const identity = resolveNodeIdentity(options);
  if (!identity) {
    return distribution.currentNode();
  }
  const result = await distribution.start(identity.name, identity.mode);
  if (result.ok) {
    logger.debug(`Distribution started as ${result.node}`);
    return result.node;
  }
  if (result.reason === 'invalid_name') {
    throw new ConfigurationError(`Invalid node name ${identity.name}`, { name: identity.name, mode: identity.mode });
  }
  logger.error(
    `Distribution failed, falling back to ${DISTRIBUTION.UNNAMED_NODE}. ` +
      'Verify that the port mapper daemon is running and try again.'
  );
  return distribution.currentNode();
}
