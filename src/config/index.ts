/**
 * Configuration Module
 *
 * Combines the validated TRADEDECK_* settings with the stack constants into
 * one object with every path resolved against the project directory.
 */

import path from 'path';
import { getEnvConfig, type EnvConfig } from './env.js';
import { FILES, DOMAIN_LABELS } from './constants.js';

// =============================================================================
// AGGREGATED CONFIG TYPE
// =============================================================================

export interface SetupConfig {
  env: EnvConfig;

  projectDir: string;
  domainSuffix: string;

  paths: {
    activeConfig: string;
    stagedConfig: string;
    envFile: string;
    envTemplate: string;
    envBackup: string;
    nginxConf: string;
    nginxConfDir: string;
    certDir: string;
    prometheusConfig: string;
    composeFile: string;
    hostsFileOverride: string | null;
    logDir: string;
  };

  timing: {
    readyTimeoutMs: number;
    readyPollMs: number;
    graceMs: number;
    httpTimeoutMs: number;
  };

  certificates: {
    keyBits: number;
  };
}

// =============================================================================
// CONFIG BUILDER
// =============================================================================

/** Keyed by the project directory override; '' when none was given */
const cachedSetupConfigs = new Map<string, SetupConfig>();

/**
 * Builds the setup configuration from an environment config.
 */
export function buildConfig(env: EnvConfig, projectDirOverride?: string): SetupConfig {
  const projectDir = path.resolve(projectDirOverride ?? env.TRADEDECK_PROJECT_DIR ?? process.cwd());
  const resolve = (relative: string) => path.join(projectDir, relative);

  return {
    env,
    projectDir,
    domainSuffix: env.TRADEDECK_DOMAIN_SUFFIX,

    paths: {
      activeConfig: resolve(FILES.ACTIVE_CONFIG),
      stagedConfig: resolve(FILES.STAGED_CONFIG),
      envFile: resolve(FILES.ENV_FILE),
      envTemplate: resolve(FILES.ENV_TEMPLATE),
      envBackup: resolve(FILES.ENV_BACKUP),
      nginxConf: resolve(FILES.NGINX_CONF),
      nginxConfDir: resolve(FILES.NGINX_CONF_DIR),
      certDir: resolve(FILES.CERT_DIR),
      prometheusConfig: resolve(FILES.PROMETHEUS_CONFIG),
      composeFile: resolve(env.TRADEDECK_COMPOSE_FILE),
      hostsFileOverride: env.TRADEDECK_HOSTS_FILE ? path.resolve(env.TRADEDECK_HOSTS_FILE) : null,
      logDir: path.resolve(projectDir, env.TRADEDECK_LOG_DIR),
    },

    timing: {
      readyTimeoutMs: env.TRADEDECK_READY_TIMEOUT_SECONDS * 1000,
      readyPollMs: env.TRADEDECK_READY_POLL_SECONDS * 1000,
      graceMs: env.TRADEDECK_GRACE_SECONDS * 1000,
      httpTimeoutMs: env.TRADEDECK_HTTP_TIMEOUT_MS,
    },

    certificates: {
      keyBits: env.TRADEDECK_CERT_KEY_BITS,
    },
  };
}

/**
 * Returns the cached setup configuration for a project directory, building it
 * on first use.
 *
 * @throws {ConfigurationError} If environment validation fails
 */
export function getConfig(projectDirOverride?: string): SetupConfig {
  const key = projectDirOverride ?? '';
  let config = cachedSetupConfigs.get(key);
  if (!config) {
    config = buildConfig(getEnvConfig(), projectDirOverride);
    cachedSetupConfigs.set(key, config);
  }
  return config;
}

/**
 * Service URLs shown in the completion guide.
 */
export function getServiceUrls(domainSuffix: string): Array<{ service: string; url: string }> {
  return DOMAIN_LABELS.map(({ label, service }) => ({
    service,
    url: `http://${label ? `${label}.${domainSuffix}` : domainSuffix}`,
  }));
}

// =============================================================================
// RE-EXPORTS
// =============================================================================

export { getEnvConfig, parseEnvConfig, resetEnvConfig, type EnvConfig } from './env.js';
export * from './constants.js';
