// Shared HTTP helpers for data providers
// Non-2xx responses raise ProviderHttpError for classifyProviderError

import { ProviderHttpError } from '../../utils/errors.js';

export interface RequestOptions {
  timeoutMs?: number;
  headers?: Record<string, string>;
}

async function requestJson(
  service: string,
  endpoint: URL,
  init: { method: 'GET' | 'POST'; body?: string },
  options: RequestOptions
): Promise<{ status: number; payload: unknown }> {
  const response = await fetch(endpoint.toString(), {
    method: init.method,
    headers: {
      Accept: 'application/json',
      ...(init.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
      ...options.headers,
    },
    body: init.body,
    signal: options.timeoutMs ? AbortSignal.timeout(options.timeoutMs) : undefined,
  });

  if (!response.ok) {
    const body = await response.text().catch(() => '');
    throw new ProviderHttpError(service, response.status, body.slice(0, 500));
  }

  if (response.status === 204) {
    return { status: 204, payload: null };
  }

  const payload: unknown = await response.json();
  return { status: response.status, payload };
}

export async function getJson(service: string, endpoint: URL, options: RequestOptions = {}): Promise<unknown> {
  const { payload } = await requestJson(service, endpoint, { method: 'GET' }, options);
  return payload;
}

// POST a JSON body; a 204 No Content answer resolves to null
export async function postJson(
  service: string,
  endpoint: URL,
  body: unknown,
  options: RequestOptions = {}
): Promise<unknown> {
  const { payload } = await requestJson(service, endpoint, { method: 'POST', body: JSON.stringify(body) }, options);
  return payload;
}
