import { z } from 'zod';

const AmountSchema = z.union([z.number(), z.string()]);

const RetailAmountSchema = z.object({ amount: AmountSchema.optional() }).passthrough();

const RoomTypeSchema = z
  .object({
    offerRetailRate: RetailAmountSchema.optional(),
    rates: z
      .array(
        z
          .object({
            retailRate: z.object({ total: z.array(RetailAmountSchema).optional() }).passthrough().optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

// Rate records vary between searches; only the fields prices are read from are typed
export const HotelOfferSchema = z
  .object({
    hotelId: z.string().optional(),
    name: z.string().optional(),
    price: AmountSchema.optional(),
    amount: AmountSchema.optional(),
    roomTypes: z.array(RoomTypeSchema).optional(),
  })
  .passthrough();

export type HotelOffer = z.infer<typeof HotelOfferSchema>;

export interface Occupancy {
  adults: number;
  children?: number[];
}

export type HotelLocation = { hotelIds: string[] } | { cityName: string; countryCode: string } | { iataCode: string };

export interface HotelRatesQuery {
  checkin: string;
  checkout: string;
  occupancies: Occupancy[];
  location: HotelLocation;
  currency: string;
  guestNationality: string;
  maxRatesPerHotel: number;
  refundableRatesOnly: boolean;
}

export interface HotelProvider {
  searchRates(query: HotelRatesQuery): Promise<HotelOffer[]>;
  // Resolves to null when the provider has no record of the hotel
  getHotel(hotelId: string, language?: string): Promise<Record<string, unknown> | null>;
}
