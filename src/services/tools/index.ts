// Tool System Initialization
// Registers every enabled tool group on startup

import { env } from '../../env.js';
import { createChildLogger } from '../../utils/logger.js';
import { SerpApiFlightProvider } from '../flights/serpapi.js';
import type { FlightProvider } from '../flights/types.js';
import { LiteApiHotelProvider } from '../hotels/liteapi.js';
import type { HotelProvider } from '../hotels/types.js';
import type { LegInvoker } from '../orchestration/round-trip.js';
import { InMemoryPlanStore, type PlanStore } from '../planner/plan-store.js';
import { ExchangeRateClient, type ExchangeRateProvider } from '../utilities/currency.js';
import { OpenMeteoClient, type WeatherProvider } from '../utilities/weather.js';
import { registerFlightTools } from './flight-tools.js';
import { registerHotelTools } from './hotel-tools.js';
import { registerPlannerTools } from './planner-tools.js';
import type { ToolRegistry } from './registry.js';
import { registerCurrencyTools, registerWeatherTools } from './utilities-tools.js';

const log = createChildLogger('tools');

export { ToolRegistry } from './registry.js';
export { ToolDispatcher } from './dispatcher.js';
export type { ToolDescriptor, ToolListing, InvocationResult, ToolPayload } from './types.js';

export interface ToolDependencies {
  flights?: FlightProvider;
  hotels?: HotelProvider;
  weather?: WeatherProvider;
  currency?: ExchangeRateProvider;
  plans?: PlanStore;
}

export function initializeTools(registry: ToolRegistry, invoker: LegInvoker, deps: ToolDependencies = {}): void {
  if (!env.TOOLS_ENABLED) {
    log.warn('Tool system disabled (TOOLS_ENABLED=false)');
    return;
  }

  if (env.FLIGHT_TOOLS_ENABLED) {
    registerFlightTools(registry, { provider: deps.flights ?? new SerpApiFlightProvider(), invoker });
    if (!deps.flights && !env.SERPAPI_API_KEY) {
      log.warn('SERPAPI_API_KEY is not set; flight searches will fail with API_ERROR');
    }
  }

  if (env.HOTEL_TOOLS_ENABLED) {
    registerHotelTools(registry, deps.hotels ?? new LiteApiHotelProvider());
    if (!deps.hotels && !env.LITEAPI_API_KEY) {
      log.warn('LITEAPI_API_KEY is not set; hotel searches will fail with API_ERROR');
    }
  }

  if (env.WEATHER_TOOLS_ENABLED) {
    registerWeatherTools(registry, deps.weather ?? new OpenMeteoClient());
  }

  if (env.CURRENCY_TOOLS_ENABLED) {
    registerCurrencyTools(registry, deps.currency ?? new ExchangeRateClient());
  }

  if (env.PLANNER_TOOLS_ENABLED) {
    registerPlannerTools(registry, deps.plans ?? new InMemoryPlanStore());
  }

  const names = registry.list().map(tool => tool.name);
  log.info({ count: names.length, tools: names }, 'Tool system initialized');
}
