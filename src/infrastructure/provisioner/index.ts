/**
 * Infrastructure Provisioner
 *
 * Creates the project directories and container networks the stack expects.
 * Everything here tolerates already-existing resources.
 */

import fs from 'fs';
import path from 'path';
import { NETWORK_PREFIX, NETWORK_TIERS, REQUIRED_DIRECTORIES } from '../../config/constants.js';
import { InfrastructureError, getErrorMessage } from '../../core/errors.js';
import type { ComposeClient, NetworkCreateResult } from '../compose/index.js';
import { getComponentLogger } from '../logger/index.js';

const logger = getComponentLogger('Infrastructure');

export interface InfrastructureResult {
  directories: string[];
  networks: Array<{ name: string; result: NetworkCreateResult }>;
}

export function networkNames(prefix: string = NETWORK_PREFIX): string[] {
  return NETWORK_TIERS.map((tier) => `${prefix}-${tier}`);
}

export class InfrastructureProvisioner {
  constructor(
    private readonly compose: Pick<ComposeClient, 'createNetwork'>,
    private readonly projectDir: string,
    private readonly directories: readonly string[] = REQUIRED_DIRECTORIES,
    private readonly networks: readonly string[] = networkNames()
  ) {}

  /**
   * @throws {InfrastructureError} On any failure other than "already exists"
   */
  async provision(): Promise<InfrastructureResult> {
    const directories = await this.ensureDirectories();
    const networks = await this.ensureNetworks();
    return { directories, networks };
  }

  async ensureDirectories(): Promise<string[]> {
    const created: string[] = [];

    for (const relative of this.directories) {
      const target = path.join(this.projectDir, relative);
      try {
        await fs.promises.mkdir(target, { recursive: true });
      } catch (error) {
        throw new InfrastructureError(`Cannot create directory ${relative}: ${getErrorMessage(error)}`, {
          directory: target,
        });
      }
      created.push(relative);
    }

    logger.debug('Project directories ensured', { count: created.length });
    return created;
  }

  async ensureNetworks(): Promise<Array<{ name: string; result: NetworkCreateResult }>> {
    const results: Array<{ name: string; result: NetworkCreateResult }> = [];

    for (const name of this.networks) {
      try {
        const result = await this.compose.createNetwork(name);
        results.push({ name, result });
        logger.info(`Network ${result === 'created' ? 'created' : 'already present'}`, { network: name });
      } catch (error) {
        throw new InfrastructureError(`Cannot create network ${name}: ${getErrorMessage(error)}`, {
          network: name,
        });
      }
    }

    return results;
  }
}
