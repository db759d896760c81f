/**
 * Network Config Types
 * =====================
 *
 * Egress and timeout settings for every market-data request.
 * Derived from the environment once per process, read-only afterwards.
 */

// ═══════════════════════════════════════════════════════════════
// EGRESS MODES
// ═══════════════════════════════════════════════════════════════

export type EgressMode = 'direct' | 'proxy';

export interface ProxyConfig {
  url: string;           // http://user:pass@ip:port
  enabled: boolean;
}

// ═══════════════════════════════════════════════════════════════
// NETWORK CONFIG (MAIN)
// ═══════════════════════════════════════════════════════════════

export interface NetworkConfig {
  egressMode: EgressMode;
  proxy?: ProxyConfig;

  // CI runners: never route through the proxy whatever EGRESS_MODE says
  forceDirect: boolean;

  defaultTimeoutMs: number;
  sourceTimeoutsMs: Record<string, number>;

  userAgent: string;
}

// ═══════════════════════════════════════════════════════════════
// DEFAULTS
// ═══════════════════════════════════════════════════════════════

export const DEFAULT_SOURCE_TIMEOUTS_MS: Record<string, number> = {
  YAHOO: 10000,
  STOOQ: 8000,
  EASTMONEY: 8000,
  FUNDGZ: 5000,
  SINA: 8000,
};

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36';

// ═══════════════════════════════════════════════════════════════
// TRANSPORT FAILURE CLASSIFICATION
// ═══════════════════════════════════════════════════════════════

export type TransportFailureReason = 'TIMEOUT' | 'NETWORK' | 'HTTP_STATUS' | 'INVALID_RESPONSE' | 'UNKNOWN';
