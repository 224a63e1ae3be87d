// Single-direction flight search
// Searches every date of a ±days_flex window and tags each offer with the date it matched

import { createChildLogger } from '../../utils/logger.js';
import { applyFilters, dateRange, sortOffers } from './filters.js';
import type { FlightFilters, FlightOffer, FlightProvider, LegQuery } from './types.js';

const log = createChildLogger('flight-search');

export interface LegSearch {
  query: LegQuery;
  daysFlex: number;
  filters: FlightFilters;
}

export interface LegSearchOutcome {
  flights: FlightOffer[];
  searchedDates: string[];
}

export async function searchLeg(provider: FlightProvider, search: LegSearch): Promise<LegSearchOutcome> {
  const dates = search.daysFlex > 0 ? dateRange(search.query.date, search.daysFlex) : [search.query.date];

  const settled = await Promise.allSettled(
    dates.map(async date => {
      const offers = await provider.searchOneWay({ ...search.query, date });
      return offers.map(offer => ({ ...structuredClone(offer), search_date: date }));
    })
  );

  const flights: FlightOffer[] = [];
  const failures: unknown[] = [];

  settled.forEach((outcome, index) => {
    if (outcome.status === 'fulfilled') {
      flights.push(...outcome.value);
    } else {
      failures.push(outcome.reason);
      log.warn({ date: dates[index], err: outcome.reason }, 'Flight search failed for date');
    }
  });

  // A window is only a failure when no date could be searched at all
  if (failures.length === dates.length) {
    throw failures[0];
  }

  const filtered = applyFilters(flights, search.filters);
  const ordered =
    search.daysFlex > 0 && !search.filters.sortBy ? sortOffers(filtered, 'price', true) : filtered;

  return { flights: ordered, searchedDates: dates };
}
