/**
 * Constants Configuration
 *
 * Static names, paths and thresholds of the provisioned stack.
 */

import { ServiceProfile } from '../core/types.js';

// =============================================================================
// DOMAINS
// =============================================================================

export const DEFAULT_DOMAIN_SUFFIX = 'tradedeck.local';

export const LOOPBACK_ADDRESS = '127.0.0.1';

/**
 * Subdomains registered under the suffix. The empty string stands for the
 * bare suffix (main dashboard).
 */
export const DOMAIN_LABELS = [
  { label: '', service: 'Trading dashboard' },
  { label: 'grafana', service: 'Grafana' },
  { label: 'jupyter', service: 'Jupyter Lab' },
  { label: 'prometheus', service: 'Prometheus' },
  { label: 'adminer', service: 'Adminer' },
  { label: 'redis', service: 'Redis Commander' },
  { label: 'dev', service: 'Development tools' },
  { label: 'mailhog', service: 'MailHog (development)' },
  { label: 'status', service: 'Nginx status' },
] as const;

export const HOSTS_BLOCK_BEGIN = '# BEGIN tradedeck local domains';
export const HOSTS_BLOCK_END = '# END tradedeck local domains';

export const HOSTS_PATHS = {
  posix: '/etc/hosts',
  windowsRelative: ['System32', 'drivers', 'etc', 'hosts'],
} as const;

// =============================================================================
// FILES
// =============================================================================

export const FILES = {
  ACTIVE_CONFIG: 'tradedeck.config.yaml',
  STAGED_CONFIG: 'tradedeck.config.next.yaml',
  ENV_FILE: '.env',
  ENV_TEMPLATE: '.env.example',
  ENV_BACKUP: '.env.backup',
  NGINX_CONF: 'nginx/nginx.conf',
  NGINX_CONF_DIR: 'nginx/conf.d',
  CERT_DIR: 'nginx/certs',
  PROMETHEUS_CONFIG: 'monitoring/prometheus/prometheus.yml',
} as const;

export const REQUIRED_DIRECTORIES = [
  'nginx/conf.d',
  'nginx/certs',
  'logs',
  'data',
  'ml_models',
  'results',
  'backups',
  'monitoring/grafana',
  'monitoring/prometheus',
  'monitoring/vector',
  'scripts/db',
  'scripts/backup',
] as const;

// =============================================================================
// ENVIRONMENT PROFILE
// =============================================================================

export const REQUIRED_ENV_KEYS = [
  'DB__PASSWORD',
  'EXCHANGES__BINANCE_API_KEY',
  'MONITORING__TELEGRAM__BOT_TOKEN',
] as const;

/** Values starting with this sentinel are template placeholders */
export const PLACEHOLDER_PREFIX = 'your_';

// =============================================================================
// CONTAINERS
// =============================================================================

export const NETWORK_PREFIX = 'tradedeck';

export const NETWORK_TIERS = ['frontend', 'backend', 'database'] as const;

export const CORE_SERVICES = ['nginx', 'timescaledb', 'redis', 'trading-bot'] as const;

export interface ProfilePlan {
  description: string;
  /** Explicit services; empty means every service enabled by the profiles */
  services: readonly string[];
  /** Compose feature profiles passed with --profile */
  composeProfiles: readonly string[];
}

export const PROFILE_PLANS: Record<ServiceProfile, ProfilePlan> = {
  [ServiceProfile.BASIC]: {
    description: 'Database, cache, trading bot and reverse proxy',
    services: CORE_SERVICES,
    composeProfiles: [],
  },
  [ServiceProfile.DEVELOPMENT]: {
    description: 'Basic stack plus development tools',
    services: [],
    composeProfiles: ['dev', 'tools'],
  },
  [ServiceProfile.FULL]: {
    description: 'Development stack plus monitoring and analysis tooling',
    services: [],
    composeProfiles: ['dev', 'monitoring', 'tools', 'analysis'],
  },
};

/**
 * Known upstreams of the reverse proxy, used for per-service log tagging.
 */
export const PROXY_UPSTREAMS = ['trading-bot', 'grafana', 'jupyter'] as const;

export const UNKNOWN_UPSTREAM_TAG = 'unknown';

// =============================================================================
// CERTIFICATES
// =============================================================================

export const CERTIFICATES = {
  CA_VALIDITY_DAYS: 3650,
  LEAF_VALIDITY_DAYS: 365,
  SUBJECT: {
    C: 'KR',
    ST: 'Seoul',
    L: 'Seoul',
    O: 'Tradedeck',
    OU: 'Development',
  },
  CA_COMMON_NAME: 'Tradedeck Local Root CA',
} as const;

// =============================================================================
// PREREQUISITES
// =============================================================================

/** Minimum free disk space before a warning is raised (2 GiB) */
export const MIN_FREE_DISK_BYTES = 2 * 1024 * 1024 * 1024;

export const FIREWALL_RULES = {
  allow: ['22/tcp', '80/tcp', '443/tcp'],
  deny: ['3000/tcp', '8080/tcp', '8888/tcp'],
} as const;
