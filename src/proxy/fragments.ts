/**
 * Proxy Config Generator
 *
 * Renders the reverse proxy's conf.d fragments. The fragments are owned by
 * this tool and rewritten on every run.
 */

import fs from 'fs';
import path from 'path';
import { PROXY_UPSTREAMS, UNKNOWN_UPSTREAM_TAG } from '../config/constants.js';
import { getSystemErrorCode } from '../core/errors.js';
import { getComponentLogger } from '../infrastructure/logger/index.js';

const logger = getComponentLogger('ProxyConfig');

// =============================================================================
// FRAGMENTS
// =============================================================================

export function renderSecurityFragment(): string {
  return `# security.conf - request limits and hardening
# Generated by tradedeck-setup; rewritten on every run.

server_tokens off;

client_max_body_size 100M;
client_body_buffer_size 16K;
client_header_buffer_size 1k;
large_client_header_buffers 2 1k;

client_body_timeout 12;
client_header_timeout 12;
keepalive_timeout 15;
send_timeout 10;

limit_req_zone $binary_remote_addr zone=global:10m rate=1r/s;
limit_conn_zone $binary_remote_addr zone=addr:10m;

client_body_in_file_only clean;
client_body_in_single_buffer on;
`;
}

export function renderCacheFragment(): string {
  return `# cache.conf - static asset and API response caching
# Generated by tradedeck-setup; rewritten on every run.

location ~* \\.(jpg|jpeg|png|gif|ico|css|js|woff|woff2|ttf|svg)$ {
    expires 1y;
    add_header Cache-Control "public, immutable";
    add_header X-Cache "HIT";
}

location ~* /api/(market-data|pairs)/ {
    proxy_cache_bypass $http_pragma;
    proxy_cache_revalidate on;
    proxy_cache_min_uses 1;
    proxy_cache_use_stale error timeout invalid_header updating http_500 http_502 http_503 http_504;
    expires 1m;
}
`;
}

/**
 * Access log format plus a map tagging each request with its upstream
 * service. Unlisted upstreams are tagged `unknown`.
 */
export function renderLoggingFragment(upstreams: readonly string[] = PROXY_UPSTREAMS): string {
  const mapEntries = upstreams.map((upstream) => `    ~${upstream} ${upstream};`).join('\n');

  return `# logging.conf - access log format and per-service tagging
# Generated by tradedeck-setup; rewritten on every run.

log_format detailed '$remote_addr - $remote_user [$time_local] '
                   '"$request" $status $bytes_sent '
                   '"$http_referer" "$http_user_agent" '
                   '"$http_x_forwarded_for" '
                   'rt=$request_time uct="$upstream_connect_time" '
                   'uht="$upstream_header_time" urt="$upstream_response_time" '
                   'service="$upstream_addr"';

map $upstream_addr $service_name {
${mapEntries}
    default ${UNKNOWN_UPSTREAM_TAG};
}

map $request_uri $loggable {
    ~*\\.(css|js|png|jpg|jpeg|gif|ico|woff|woff2)$ 0;
    default 1;
}
`;
}

/**
 * Tag the generated `map $upstream_addr` assigns to an upstream address:
 * the first upstream whose name occurs in it, else `unknown`.
 */
export function classifyUpstream(address: string, upstreams: readonly string[] = PROXY_UPSTREAMS): string {
  return upstreams.find((upstream) => address.includes(upstream)) ?? UNKNOWN_UPSTREAM_TAG;
}

/**
 * Minimal proxy config used only when the project ships none. security.conf
 * and logging.conf belong to the http block, cache.conf holds locations and
 * goes inside the dashboard server. The status server backs the status page
 * health target.
 */
export function renderBaseConfig(domainSuffix: string): string {
  return `events { worker_connections 1024; }
http {
    include conf.d/security.conf;
    include conf.d/logging.conf;
    access_log /var/log/nginx/access.log detailed if=$loggable;

    upstream trading_bot { server trading-bot:8000; }

    server {
        listen 80;
        server_name ${domainSuffix};
        include conf.d/cache.conf;

        location /health { proxy_pass http://trading_bot/health; }
        location /nginx_status { stub_status; }
        location / {
            proxy_pass http://trading_bot;
            proxy_set_header Host $host;
            proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;
        }
    }

    server {
        listen 80;
        server_name status.${domainSuffix};
        location / { stub_status; }
    }
}
`;
}

// =============================================================================
// GENERATOR
// =============================================================================

export interface GeneratedFragment {
  name: string;
  path: string;
}

export class ProxyConfigGenerator {
  constructor(
    private readonly confDir: string,
    private readonly upstreams: readonly string[] = PROXY_UPSTREAMS
  ) {}

  /**
   * Overwrites security.conf, cache.conf and logging.conf.
   */
  async generate(): Promise<GeneratedFragment[]> {
    await fs.promises.mkdir(this.confDir, { recursive: true });

    const fragments: Array<[string, string]> = [
      ['security.conf', renderSecurityFragment()],
      ['cache.conf', renderCacheFragment()],
      ['logging.conf', renderLoggingFragment(this.upstreams)],
    ];

    const written: GeneratedFragment[] = [];
    for (const [name, content] of fragments) {
      const target = path.join(this.confDir, name);
      await fs.promises.writeFile(target, content, 'utf8');
      written.push({ name, path: target });
    }

    logger.info('Proxy fragments generated', { dir: this.confDir, count: written.length });
    return written;
  }
}

/**
 * Writes the base proxy config unless one exists. Returns true when written.
 */
export async function ensureBaseConfig(confPath: string, domainSuffix: string): Promise<boolean> {
  try {
    await fs.promises.mkdir(path.dirname(confPath), { recursive: true });
    await fs.promises.writeFile(confPath, renderBaseConfig(domainSuffix), { encoding: 'utf8', flag: 'wx' });
  } catch (error) {
    if (getSystemErrorCode(error) === 'EEXIST') {
      return false;
    }
    throw error;
  }
  logger.warn('No proxy config found, wrote a minimal default', { path: confPath });
  return true;
}
