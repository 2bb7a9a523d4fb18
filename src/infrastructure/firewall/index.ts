/**
 * Firewall Configurator
 *
 * Applies host firewall rules through ufw so the containers are reachable
 * only through the reverse proxy. Linux only.
 */

import { FIREWALL_RULES } from '../../config/constants.js';
import { getComponentLogger } from '../logger/index.js';
import { runOrThrow, type CommandRunner } from '../shell/index.js';

const logger = getComponentLogger('Firewall');

export type FirewallResult =
  | { applied: true; rules: string[] }
  | { applied: false; reason: string };

/**
 * ufw arguments in the order they are applied.
 */
export function firewallCommands(): string[][] {
  return [
    ['--force', 'enable'],
    ['default', 'deny', 'incoming'],
    ['default', 'allow', 'outgoing'],
    ...FIREWALL_RULES.allow.map((port) => ['allow', port]),
    ...FIREWALL_RULES.deny.map((port) => ['deny', port]),
  ];
}

export class FirewallConfigurator {
  constructor(
    private readonly runner: CommandRunner,
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly isRoot: boolean = process.getuid?.() === 0
  ) {}

  async apply(): Promise<FirewallResult> {
    if (this.platform !== 'linux') {
      return { applied: false, reason: 'firewall rules are only managed on Linux' };
    }
    if (!(await this.runner.which('ufw'))) {
      logger.warn('ufw not installed, firewall left unchanged');
      return { applied: false, reason: 'ufw is not installed; configure the firewall manually' };
    }

    const rules: string[] = [];
    for (const args of firewallCommands()) {
      if (this.isRoot) {
        await runOrThrow(this.runner, 'ufw', args);
      } else {
        await runOrThrow(this.runner, 'sudo', ['ufw', ...args]);
      }
      rules.push(args.join(' '));
    }

    logger.info('Firewall rules applied', { rules });
    return { applied: true, rules };
  }
}
