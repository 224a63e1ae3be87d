// Utility Tools
// Weather forecast and currency conversion

import { z } from 'zod';
import { env } from '../../env.js';
import { convertCurrency, type ExchangeRateProvider } from '../utilities/currency.js';
import { getWeather, type WeatherProvider } from '../utilities/weather.js';
import type { ToolRegistry } from './registry.js';

export function registerWeatherTools(registry: ToolRegistry, provider: WeatherProvider): void {
  registry.register({
    name: 'get_weather',
    kind: 'utility',
    timeoutMs: env.WEATHER_TIMEOUT_MS,
    description:
      'Get current conditions and the daily forecast for a location. Forecasts cover the next 16 days; ' +
      'pass date (YYYY-MM-DD) to get a single day.',
    returns: { type: 'object', description: 'Current conditions and daily forecast' },
    parameters: z.object({
      latitude: z.number().min(-90).max(90).describe('Latitude in decimal degrees'),
      longitude: z.number().min(-180).max(180).describe('Longitude in decimal degrees'),
      date: z.string().optional().describe('Forecast date, YYYY-MM-DD'),
      location: z.string().optional().describe('Location name, echoed in the result'),
    }),
    execute: args => getWeather(provider, args),
  });
}

export function registerCurrencyTools(registry: ToolRegistry, provider: ExchangeRateProvider): void {
  registry.register({
    name: 'convert_currency',
    kind: 'utility',
    timeoutMs: env.CURRENCY_TIMEOUT_MS,
    description: 'Convert an amount between two currencies at the latest exchange rate.',
    returns: { type: 'object', description: 'Converted amount and the rate used' },
    parameters: z.object({
      from_currency: z.string().describe('ISO 4217 code to convert from (e.g., USD)'),
      to_currency: z.string().describe('ISO 4217 code to convert to (e.g., EUR)'),
      amount: z.number().default(1).describe('Amount to convert'),
    }),
    execute: args => convertCurrency(provider, { from: args.from_currency, to: args.to_currency, amount: args.amount }),
  });
}
