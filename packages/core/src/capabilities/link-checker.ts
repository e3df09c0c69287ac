import { errorMessage } from '@contentbench/shared';

export interface LinkProbe {
  url: string;
  status: number | 'error';
  valid: boolean;
  error?: string;
}

/**
 * Probes one URL. Never rejects: network failures become `valid: false`.
 */
export interface LinkChecker {
  probe(url: string, timeoutMs: number): Promise<LinkProbe>;
}

export type FetchLike = (url: string, init: RequestInit) => Promise<{ status: number }>;

/** 2xx and 3xx count as reachable */
export function isValidStatus(status: number): boolean {
  return status >= 200 && status < 400;
}

/**
 * HEAD request with redirects followed and a per-probe timeout.
 */
export class HttpLinkChecker implements LinkChecker {
  constructor(private readonly fetchImpl: FetchLike = fetch) {}

  async probe(url: string, timeoutMs: number): Promise<LinkProbe> {
    try {
      const response = await this.fetchImpl(url, {
        method: 'HEAD',
        redirect: 'follow',
        signal: AbortSignal.timeout(timeoutMs),
      });
      return { url, status: response.status, valid: isValidStatus(response.status) };
    } catch (error) {
      return { url, status: 'error', valid: false, error: errorMessage(error) };
    }
  }
}
