// Hotel Tools
// Rate search over hotel ids, a city or an airport code, and hotel details

import { z } from 'zod';
import { env } from '../../env.js';
import { MAX_HOTEL_RESULTS, getHotelDetails, searchHotelRates } from '../hotels/search.js';
import type { HotelProvider } from '../hotels/types.js';
import type { ToolRegistry } from './registry.js';

export function registerHotelTools(registry: ToolRegistry, provider: HotelProvider): void {
  registry.register({
    name: 'get_hotel_rates',
    kind: 'discovery',
    timeoutMs: env.HOTEL_TIMEOUT_MS,
    description:
      'Search hotel rates for a stay. Give hotel_ids, city_name with country_code, or iata_code. ' +
      `Set sort_by to "price" for the cheapest offers first; k limits the result count (max ${MAX_HOTEL_RESULTS}).`,
    returns: { type: 'object', description: 'Hotel offers with room rates' },
    parameters: z.object({
      checkin: z.string().describe('Check-in date, YYYY-MM-DD'),
      checkout: z.string().describe('Check-out date, YYYY-MM-DD'),
      occupancies: z
        .array(
          z.object({
            adults: z.number().int().describe('Adults in the room'),
            children: z.array(z.number().int()).optional().describe('Ages of the children in the room'),
          })
        )
        .describe('One entry per room'),
      hotel_ids: z.array(z.string()).optional().describe('Specific hotel ids'),
      city_name: z.string().optional().describe('City name (requires country_code)'),
      country_code: z.string().optional().describe('ISO 3166 country code (e.g., FR)'),
      iata_code: z.string().optional().describe('Airport code to search around (e.g., CDG)'),
      currency: z.string().default('USD').describe('Currency code for prices'),
      guest_nationality: z.string().default('US').describe('Guest nationality, ISO 3166 code'),
      max_rates_per_hotel: z.number().int().default(1).describe('Rates returned per hotel'),
      refundable_rates_only: z.boolean().default(false).describe('Only refundable rates'),
      sort_by: z.enum(['price']).optional().describe('Sort key'),
      k: z.number().int().default(10).describe('Maximum number of hotels to return'),
    }),
    execute: args =>
      searchHotelRates(provider, {
        checkin: args.checkin,
        checkout: args.checkout,
        occupancies: args.occupancies,
        hotelIds: args.hotel_ids,
        cityName: args.city_name,
        countryCode: args.country_code,
        iataCode: args.iata_code,
        currency: args.currency,
        guestNationality: args.guest_nationality,
        maxRatesPerHotel: args.max_rates_per_hotel,
        refundableRatesOnly: args.refundable_rates_only,
        sortBy: args.sort_by,
        k: args.k,
      }),
  });

  registry.register({
    name: 'get_hotel_details',
    kind: 'utility',
    timeoutMs: env.HOTEL_DETAILS_TIMEOUT_MS,
    description: 'Get the description, facilities, location and policies of one hotel.',
    returns: { type: 'object', description: 'Hotel details' },
    parameters: z.object({
      hotel_id: z.string().min(1).describe('Hotel id from get_hotel_rates'),
      language: z.string().optional().describe('Language code for descriptions (e.g., en)'),
    }),
    execute: args => getHotelDetails(provider, args.hotel_id, args.language),
  });
}
