// Weather lookups via the Open-Meteo forecast API (no key required)

import { z } from 'zod';
import { env } from '../../env.js';
import { ErrorCode, classifyProviderError, providerFailure, type ProviderFailure } from '../../utils/errors.js';
import { getJson } from './http.js';

const SERVICE = 'weather';

export interface DailyForecast {
  date: string;
  temperature_max: number | null;
  temperature_min: number | null;
  precipitation_sum: number | null;
  weather_code: number | null;
}

export interface Forecast {
  timezone: string;
  current: {
    temperature: number | null;
    humidity: number | null;
    wind_speed: number | null;
    weather_code: number | null;
  };
  daily: DailyForecast[];
}

export interface WeatherProvider {
  fetchForecast(latitude: number, longitude: number): Promise<Forecast>;
}

const nullableNumbers = z.array(z.number().nullable()).default([]);

const OpenMeteoResponseSchema = z.object({
  timezone: z.string().default('UTC'),
  current: z
    .object({
      temperature_2m: z.number().nullable().optional(),
      relative_humidity_2m: z.number().nullable().optional(),
      wind_speed_10m: z.number().nullable().optional(),
      weather_code: z.number().nullable().optional(),
    })
    .default({}),
  daily: z
    .object({
      time: z.array(z.string()).default([]),
      temperature_2m_max: nullableNumbers,
      temperature_2m_min: nullableNumbers,
      precipitation_sum: nullableNumbers,
      weather_code: nullableNumbers,
    })
    .default({}),
});

export class OpenMeteoClient implements WeatherProvider {
  constructor(
    private baseUrl: string = env.OPEN_METEO_BASE_URL,
    private timeoutMs: number = env.WEATHER_TIMEOUT_MS
  ) {}

  async fetchForecast(latitude: number, longitude: number): Promise<Forecast> {
    const endpoint = new URL(this.baseUrl);
    endpoint.searchParams.set('latitude', String(latitude));
    endpoint.searchParams.set('longitude', String(longitude));
    endpoint.searchParams.set('current', 'temperature_2m,relative_humidity_2m,wind_speed_10m,weather_code');
    endpoint.searchParams.set('daily', 'temperature_2m_max,temperature_2m_min,precipitation_sum,weather_code');
    endpoint.searchParams.set('timezone', 'auto');
    endpoint.searchParams.set('forecast_days', '16');

    const data = OpenMeteoResponseSchema.parse(await getJson(SERVICE, endpoint, { timeoutMs: this.timeoutMs }));
    const daily = data.daily;

    return {
      timezone: data.timezone,
      current: {
        temperature: data.current.temperature_2m ?? null,
        humidity: data.current.relative_humidity_2m ?? null,
        wind_speed: data.current.wind_speed_10m ?? null,
        weather_code: data.current.weather_code ?? null,
      },
      daily: daily.time.map((date, i) => ({
        date,
        temperature_max: daily.temperature_2m_max[i] ?? null,
        temperature_min: daily.temperature_2m_min[i] ?? null,
        precipitation_sum: daily.precipitation_sum[i] ?? null,
        weather_code: daily.weather_code[i] ?? null,
      })),
    };
  }
}

export interface WeatherRequest {
  latitude: number;
  longitude: number;
  date?: string;
  location?: string;
}

export type WeatherPayload = {
  error: false;
  location: string;
  latitude: number;
  longitude: number;
  timezone: string;
  current: Forecast['current'];
  forecast: DailyForecast[];
  units: { temperature: string; wind_speed: string; precipitation: string };
};

export async function getWeather(
  provider: WeatherProvider,
  request: WeatherRequest
): Promise<WeatherPayload | ProviderFailure> {
  const location = request.location ?? `${request.latitude},${request.longitude}`;

  let forecast: Forecast;
  try {
    forecast = await provider.fetchForecast(request.latitude, request.longitude);
  } catch (error) {
    return classifyProviderError(error, SERVICE, { location });
  }

  let days = forecast.daily;
  if (request.date) {
    days = days.filter(day => day.date === request.date);
    if (days.length === 0) {
      return providerFailure(
        ErrorCode.DATA_UNAVAILABLE,
        `No forecast is available for ${location} on ${request.date}. Forecasts cover the next 16 days only.`,
        { location, date: request.date }
      );
    }
  }

  return {
    error: false,
    location,
    latitude: request.latitude,
    longitude: request.longitude,
    timezone: forecast.timezone,
    current: forecast.current,
    forecast: days,
    units: { temperature: 'Celsius', wind_speed: 'km/h', precipitation: 'mm' },
  };
}
