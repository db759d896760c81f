/**
 * Network Config Service
 * =======================
 *
 * Resolves egress (explicit proxy, direct, or CI-disabled) and per-source
 * timeouts. The decision core never looks at any of this.
 */

import type { Env } from '../../config/env.js';
import {
  NetworkConfig,
  DEFAULT_SOURCE_TIMEOUTS_MS,
  DEFAULT_USER_AGENT,
} from './network.config.types.js';

export function buildNetworkConfig(env: Env): NetworkConfig {
  return {
    egressMode: env.EGRESS_MODE,
    proxy: env.PROXY_URL
      ? { url: env.PROXY_URL, enabled: env.EGRESS_MODE === 'proxy' }
      : undefined,
    forceDirect: env.CI || env.GITHUB_ACTIONS,
    defaultTimeoutMs: env.HTTP_TIMEOUT_MS,
    sourceTimeoutsMs: { ...DEFAULT_SOURCE_TIMEOUTS_MS },
    userAgent: DEFAULT_USER_AGENT,
  };
}

/**
 * Proxy URL to use, or null for a direct connection
 */
export function getActiveProxyUrl(config: NetworkConfig): string | null {
  if (config.forceDirect) return null;
  if (config.egressMode === 'proxy' && config.proxy?.enabled && config.proxy.url) {
    return config.proxy.url;
  }
  return null;
}

export function resolveTimeout(config: NetworkConfig, sourceId: string): number {
  return config.sourceTimeoutsMs[sourceId] ?? config.defaultTimeoutMs;
}

/**
 * Hide proxy credentials before logging or returning the URL
 */
export function maskProxyUrl(url: string): string {
  return url.replace(/:[^:@/]+@/, ':***@');
}

export function describeEgress(config: NetworkConfig): string {
  const proxyUrl = getActiveProxyUrl(config);
  if (proxyUrl) return `proxy ${maskProxyUrl(proxyUrl)}`;
  return config.forceDirect ? 'direct (CI)' : 'direct';
}
