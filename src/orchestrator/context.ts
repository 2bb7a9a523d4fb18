/**
 * Setup Context
 *
 * The collaborators every stage works with, built once per invocation. Tests
 * swap individual members for in-process stand-ins.
 */

import fs from 'fs';
import type { SetupConfig } from '../config/index.js';
import type { Prompter } from '../core/types.js';
import { createDomainSet, HostsTableManager, selectHostsPlatform, type DomainResolver, type HostsPlatform } from '../hosts/index.js';
import { ComposeClient } from '../infrastructure/compose/index.js';
import { processRunner, type CommandRunner } from '../infrastructure/shell/index.js';
import type { Sleeper } from '../utils/polling.js';
import type { HttpCheck } from './health.js';

export interface SetupContext {
  config: SetupConfig;
  runner: CommandRunner;
  compose: ComposeClient;
  prompter: Prompter;
  hostsPlatform: HostsPlatform;
  platform: NodeJS.Platform;
  resolver?: DomainResolver;
  sleeper?: Sleeper;
  httpCheck?: HttpCheck;
  clock?: () => Date;
  freeDiskBytes: (dir: string) => Promise<number>;
}

export async function statfsFreeBytes(dir: string): Promise<number> {
  const stats = await fs.promises.statfs(dir);
  return stats.bavail * stats.bsize;
}

export function createSetupContext(
  config: SetupConfig,
  prompter: Prompter,
  overrides: Partial<Omit<SetupContext, 'config' | 'prompter'>> = {}
): SetupContext {
  const runner = overrides.runner ?? processRunner;
  const platform = overrides.platform ?? process.platform;

  return {
    ...overrides,
    config,
    prompter,
    runner,
    platform,
    compose:
      overrides.compose ??
      new ComposeClient(runner, {
        composeFile: config.paths.composeFile,
        projectDir: config.projectDir,
        command: config.env.TRADEDECK_COMPOSE_COMMAND,
      }),
    hostsPlatform:
      overrides.hostsPlatform ??
      selectHostsPlatform({ runner, override: config.paths.hostsFileOverride, platform }),
    freeDiskBytes: overrides.freeDiskBytes ?? statfsFreeBytes,
  };
}

export function createHostsManager(context: SetupContext): HostsTableManager {
  const suffix = context.config.domainSuffix;
  return new HostsTableManager(context.hostsPlatform, createDomainSet(suffix), suffix, {
    resolver: context.resolver,
  });
}
