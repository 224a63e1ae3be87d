// Task agents
// Each agent may only call the tools on its allow-list, and stores its accepted result under one key

import { FLIGHT_RESULT_KEY } from './normalizer.js';

export interface AgentProfile {
  name: string;
  resultKey: string;
  tools: readonly string[];
  instructions: string;
}

export const AGENTS = {
  flight: {
    name: 'flight',
    resultKey: FLIGHT_RESULT_KEY,
    tools: ['search_flights', 'search_flight_leg'],
    instructions:
      'You search flights. Use search_flights for trips (one-way or round-trip) and search_flight_leg for a ' +
      'single direction. Dates are YYYY-MM-DD; airports are IATA codes.',
  },
  hotel: {
    name: 'hotel',
    resultKey: 'hotel_result',
    tools: ['get_hotel_rates', 'get_hotel_details'],
    instructions:
      'You search hotels. Use get_hotel_rates with hotel_ids, city_name and country_code, or iata_code; dates are ' +
      'YYYY-MM-DD. Use get_hotel_details for one hotel from the results.',
  },
  utilities: {
    name: 'utilities',
    resultKey: 'utilities_result',
    tools: ['get_weather', 'convert_currency'],
    instructions:
      'You answer weather and currency questions. Issue one call per location or conversion; independent ' +
      'calls may be issued together.',
  },
  planner: {
    name: 'planner',
    resultKey: 'plan_result',
    tools: ['add_plan_item', 'get_plan_items', 'update_plan_item', 'delete_plan_item'],
    instructions:
      'You manage the trip plan. When the user picks an offer, save it with add_plan_item; details may be a ' +
      'reference such as "outbound_option_2".',
  },
} satisfies Record<string, AgentProfile>;

export type AgentName = keyof typeof AGENTS;

export function isAgentName(value: string): value is AgentName {
  return Object.prototype.hasOwnProperty.call(AGENTS, value);
}

export function isAllowed(agent: AgentProfile, tool: string): boolean {
  return agent.tools.includes(tool);
}
