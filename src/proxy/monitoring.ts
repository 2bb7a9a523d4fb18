/**
 * Monitoring Config Generator
 *
 * Writes the Prometheus scrape configuration for the bot and the proxy.
 */

import fs from 'fs';
import path from 'path';
import { stringify } from 'yaml';
import { getComponentLogger } from '../infrastructure/logger/index.js';

const logger = getComponentLogger('MonitoringConfig');

export interface ScrapeJob {
  job_name: string;
  static_configs: Array<{ targets: string[] }>;
  metrics_path: string;
  scrape_interval?: string;
}

export interface PrometheusConfig {
  global: { scrape_interval: string; evaluation_interval: string };
  scrape_configs: ScrapeJob[];
}

export function buildPrometheusConfig(): PrometheusConfig {
  return {
    global: { scrape_interval: '15s', evaluation_interval: '15s' },
    scrape_configs: [
      {
        job_name: 'trading-bot',
        static_configs: [{ targets: ['trading-bot:8000'] }],
        metrics_path: '/metrics',
        scrape_interval: '30s',
      },
      {
        job_name: 'nginx',
        static_configs: [{ targets: ['nginx:80'] }],
        metrics_path: '/nginx_status',
      },
    ],
  };
}

export async function writePrometheusConfig(target: string): Promise<string> {
  await fs.promises.mkdir(path.dirname(target), { recursive: true });
  await fs.promises.writeFile(target, stringify(buildPrometheusConfig()), 'utf8');
  logger.info('Prometheus config written', { path: target });
  return target;
}
