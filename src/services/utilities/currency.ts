// Currency conversion via an open exchange-rate API

import { z } from 'zod';
import { env } from '../../env.js';
import {
  ErrorCode,
  ProviderApiError,
  ProviderHttpError,
  classifyProviderError,
  providerFailure,
  type ProviderFailure,
} from '../../utils/errors.js';
import { getJson } from './http.js';

const SERVICE = 'currency';

export interface RateTable {
  base: string;
  date: string;
  rates: Record<string, number>;
}

export interface ExchangeRateProvider {
  // Resolves to null when the base currency is not supported
  latest(base: string): Promise<RateTable | null>;
}

const RatesResponseSchema = z.object({
  result: z.string().optional(),
  'error-type': z.string().optional(),
  base_code: z.string().optional(),
  time_last_update_utc: z.string().optional(),
  rates: z.record(z.number()).optional(),
});

export class ExchangeRateClient implements ExchangeRateProvider {
  constructor(
    private baseUrl: string = env.EXCHANGE_RATE_BASE_URL,
    private timeoutMs: number = env.CURRENCY_TIMEOUT_MS
  ) {}

  async latest(base: string): Promise<RateTable | null> {
    const endpoint = new URL(`${this.baseUrl.replace(/\/+$/, '')}/${encodeURIComponent(base)}`);

    let raw: unknown;
    try {
      raw = await getJson(SERVICE, endpoint, { timeoutMs: this.timeoutMs });
    } catch (error) {
      if (error instanceof ProviderHttpError && error.status === 404) return null;
      throw error;
    }

    const data = RatesResponseSchema.parse(raw);
    if (data.result === 'error') {
      if (data['error-type'] === 'unsupported-code') return null;
      throw new ProviderApiError(SERVICE, data['error-type'] ?? 'unknown error');
    }

    return {
      base: data.base_code ?? base,
      date: data.time_last_update_utc ?? '',
      rates: data.rates ?? {},
    };
  }
}

export interface ConversionRequest {
  from: string;
  to: string;
  amount: number;
}

export type ConversionPayload = {
  error: false;
  from_currency: string;
  to_currency: string;
  amount: number;
  converted_amount: number;
  exchange_rate: number;
  rate_date: string;
  message?: string;
};

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export async function convertCurrency(
  provider: ExchangeRateProvider,
  request: ConversionRequest
): Promise<ConversionPayload | ProviderFailure> {
  const from = request.from.trim().toUpperCase();
  const to = request.to.trim().toUpperCase();

  if (from === to) {
    return {
      error: false,
      from_currency: from,
      to_currency: to,
      amount: request.amount,
      converted_amount: request.amount,
      exchange_rate: 1,
      rate_date: '',
      message: 'Same currency - no conversion needed',
    };
  }

  let table: RateTable | null;
  try {
    table = await provider.latest(from);
  } catch (error) {
    return classifyProviderError(error, SERVICE);
  }

  if (!table) {
    return providerFailure(ErrorCode.DATA_UNAVAILABLE, `Currency code '${from}' not found or not supported.`, {
      from_currency: from,
    });
  }

  const rate = table.rates[to];
  if (rate === undefined) {
    return providerFailure(ErrorCode.DATA_UNAVAILABLE, `Currency code '${to}' not found or not supported.`, {
      to_currency: to,
    });
  }

  return {
    error: false,
    from_currency: from,
    to_currency: to,
    amount: request.amount,
    converted_amount: round(request.amount * rate, 2),
    exchange_rate: round(rate, 6),
    rate_date: table.date,
  };
}
