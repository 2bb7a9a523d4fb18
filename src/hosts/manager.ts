/**
 * Hosts-Table Manager
 *
 * Owns the marker-bounded block of local domains in the hosts table and
 * checks that those domains resolve to loopback.
 */

import dns from 'dns';
import { LOOPBACK_ADDRESS } from '../config/constants.js';
import { getErrorMessage } from '../core/errors.js';
import { getComponentLogger } from '../infrastructure/logger/index.js';
import type { DomainSet } from './domains.js';
import {
  applyDomainSet,
  findSuffixEntries,
  stripManagedBlocks,
  type HostsTableEntry,
} from './hosts-file.js';
import type { HostsPlatform } from './platform.js';

const logger = getComponentLogger('HostsTable');

// =============================================================================
// TYPES
// =============================================================================

/** Resolves a name to its addresses, rejecting when it does not resolve */
export type DomainResolver = (domain: string) => Promise<string[]>;

export interface HostsSetupResult {
  hostsPath: string;
  domains: DomainSet;
  /** False when the table already held the exact block */
  written: boolean;
  /** Suffix mappings outside the managed block, left in place */
  unmanaged: HostsTableEntry[];
}

export interface HostsRemoveResult {
  hostsPath: string;
  removed: HostsTableEntry[];
  written: boolean;
}

export interface DomainVerification {
  domain: string;
  addresses: string[];
  loopback: boolean;
  error: string | null;
}

export interface HostsCheckResult {
  hostsPath: string;
  managed: HostsTableEntry[];
  unmanaged: HostsTableEntry[];
  missing: string[];
  verification: DomainVerification[];
}

export const systemResolver: DomainResolver = async (domain) => {
  const results = await dns.promises.lookup(domain, { all: true });
  return results.map((result) => result.address);
};

// =============================================================================
// MANAGER
// =============================================================================

export class HostsTableManager {
  private readonly resolver: DomainResolver;

  constructor(
    private readonly platform: HostsPlatform,
    private readonly domains: DomainSet,
    private readonly suffix: string,
    options: { resolver?: DomainResolver } = {}
  ) {
    this.resolver = options.resolver ?? systemResolver;
  }

  get hostsPath(): string {
    return this.platform.locateHostsTable();
  }

  /**
   * Replaces the managed block with the full domain set.
   *
   * @throws {PrivilegeError} If the table cannot be written
   */
  async setup(): Promise<HostsSetupResult> {
    const before = await this.platform.readHostsTable();
    const after = applyDomainSet(before, this.domains, this.suffix);
    const unmanaged = findSuffixEntries(before, this.suffix).filter((entry) => !entry.managed);

    if (unmanaged.length > 0) {
      logger.warn('Unmanaged entries under the local suffix left in place', {
        entries: unmanaged.map((entry) => `${entry.address} ${entry.domain}`),
      });
    }

    const written = after !== before;
    if (written) {
      await this.platform.writeHostsTable(after);
      logger.info('Hosts table updated', { path: this.hostsPath, domains: this.domains.length });
    } else {
      logger.debug('Hosts table already up to date', { path: this.hostsPath });
    }

    return { hostsPath: this.hostsPath, domains: this.domains, written, unmanaged };
  }

  /**
   * Deletes the managed block(s) and nothing else.
   */
  async remove(): Promise<HostsRemoveResult> {
    const before = await this.platform.readHostsTable();
    const { content, removed, blocks } = stripManagedBlocks(before, this.suffix);

    if (blocks === 0) {
      return { hostsPath: this.hostsPath, removed: [], written: false };
    }

    await this.platform.writeHostsTable(content);
    logger.info('Local domains removed from hosts table', { path: this.hostsPath, removed: removed.length });
    return { hostsPath: this.hostsPath, removed, written: true };
  }

  async check(): Promise<HostsCheckResult> {
    const content = await this.platform.readHostsTable();
    const entries = findSuffixEntries(content, this.suffix);
    const managed = entries.filter((entry) => entry.managed);
    const present = new Set(managed.map((entry) => entry.domain));

    return {
      hostsPath: this.hostsPath,
      managed,
      unmanaged: entries.filter((entry) => !entry.managed),
      missing: this.domains.filter((domain) => !present.has(domain)),
      verification: await this.verify(),
    };
  }

  /**
   * Resolves every domain and reports whether it maps to loopback.
   */
  async verify(): Promise<DomainVerification[]> {
    const results: DomainVerification[] = [];

    for (const domain of this.domains) {
      try {
        const addresses = await this.resolver(domain);
        results.push({ domain, addresses, loopback: addresses.includes(LOOPBACK_ADDRESS), error: null });
      } catch (error) {
        results.push({ domain, addresses: [], loopback: false, error: getErrorMessage(error) });
      }
    }

    return results;
  }
}
