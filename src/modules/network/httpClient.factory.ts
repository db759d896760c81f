/**
 * HTTP Client Factory
 * ====================
 *
 * Creates the axios-backed transport every quote source goes through.
 * Proxy selection happens here; sources only pass a URL and a timeout.
 *
 * No retry interceptor: the source chain is the only fallback.
 */

import axios, { AxiosInstance, AxiosRequestConfig, isAxiosError } from 'axios';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { InvalidResponseShapeError } from '../../common/errors.js';
import { getActiveProxyUrl } from './network.config.service.js';
import type { NetworkConfig, TransportFailureReason } from './network.config.types.js';

// ═══════════════════════════════════════════════════════════════
// TRANSPORT CONTRACT
// ═══════════════════════════════════════════════════════════════

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  params?: Record<string, string | number>;
  timeoutMs?: number;
}

export interface HttpResponse {
  status: number;
  body: string;
}

export interface HttpTransport {
  get: (url: string, options?: HttpRequestOptions) => Promise<HttpResponse>;
}

// ═══════════════════════════════════════════════════════════════
// AXIOS TRANSPORT
// ═══════════════════════════════════════════════════════════════

function createAxiosInstance(config: NetworkConfig): AxiosInstance {
  const proxyUrl = getActiveProxyUrl(config);

  const axiosConfig: AxiosRequestConfig = {
    timeout: config.defaultTimeoutMs,
    headers: {
      'User-Agent': config.userAgent,
      'Accept-Language': 'zh-CN,zh;q=0.8,en-US;q=0.5,en;q=0.3',
    },
    // Bodies are parsed by each source, status is checked by each source
    responseType: 'text',
    validateStatus: () => true,
  };

  if (proxyUrl) {
    const agent = new HttpsProxyAgent(proxyUrl);
    axiosConfig.httpsAgent = agent;
    axiosConfig.httpAgent = agent;
    axiosConfig.proxy = false; // Disable axios proxy, use agent instead
  }

  return axios.create(axiosConfig);
}

export function createHttpTransport(config: NetworkConfig): HttpTransport {
  const client = createAxiosInstance(config);

  return {
    async get(url, options = {}) {
      const response = await client.get<unknown>(url, {
        headers: options.headers,
        params: options.params,
        timeout: options.timeoutMs,
      });

      const body = typeof response.data === 'string'
        ? response.data
        : JSON.stringify(response.data ?? '');

      return { status: response.status, body };
    },
  };
}

// ═══════════════════════════════════════════════════════════════
// FAILURE CLASSIFICATION
// ═══════════════════════════════════════════════════════════════

export class HttpStatusError extends Error {
  readonly status: number;

  constructor(url: string, status: number) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}

export function classifyTransportError(error: unknown): TransportFailureReason {
  if (error instanceof HttpStatusError) return 'HTTP_STATUS';
  if (error instanceof InvalidResponseShapeError) return 'INVALID_RESPONSE';

  if (isAxiosError(error)) {
    const message = error.message.toLowerCase();
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT' || message.includes('timeout')) {
      return 'TIMEOUT';
    }
    if (error.code === 'ENOTFOUND' || error.code === 'ECONNREFUSED' || error.code === 'ECONNRESET') {
      return 'NETWORK';
    }
  }

  return 'UNKNOWN';
}
