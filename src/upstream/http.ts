import axios, { AxiosError } from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';

import { UpstreamUnavailableError, errorMessage } from '../errors';
import type { UpstreamService } from '../errors';

export interface HttpClientOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
  adapter?: AxiosAdapter;
}

const SERVICE_LABELS: Record<UpstreamService, string> = {
  nationalize: 'Nationalize.io',
  countries: 'REST Countries'
};

export function serviceLabel(service: UpstreamService): string {
  return SERVICE_LABELS[service];
}

export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.baseUrl,
    timeout: options.timeoutMs,
    responseType: 'json',
    headers: {
      Accept: 'application/json',
      'User-Agent': options.userAgent
    },
    ...(options.adapter ? { adapter: options.adapter } : {})
  });
}

export function responseStatus(error: unknown): number | null {
  if (axios.isAxiosError(error) && error.response) {
    return error.response.status;
  }
  return null;
}

function isTimeout(error: AxiosError): boolean {
  return error.code === AxiosError.ECONNABORTED || error.code === AxiosError.ETIMEDOUT;
}

export function toUnavailable(service: UpstreamService, error: unknown): UpstreamUnavailableError {
  const label = serviceLabel(service);

  if (axios.isAxiosError(error)) {
    const status = responseStatus(error);
    if (status !== null) {
      const reason = status === 429 ? 'rate limit exceeded' : `HTTP ${status}`;
      return new UpstreamUnavailableError(service, `${label} responded with ${reason}`, status, { cause: error });
    }
    if (isTimeout(error)) {
      return new UpstreamUnavailableError(service, `${label} request timed out`, null, { cause: error });
    }
  }

  return new UpstreamUnavailableError(service, `${label} request failed: ${errorMessage(error)}`, null, {
    cause: error
  });
}
