/**
 * Booking.com hotel search through RapidAPI, filtered down to discounted
 * and long-stay deals.
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import {
  HotelSearchParams,
  HotelSearchResult,
  HotelStay,
  RawProperty,
  UpstreamError,
  errorMessage,
  nightsBetween,
  rankHotelDeals,
  resolveDestinationId,
  validateHotelStay
} from '@tripplanner/shared';
import { HOTEL_FALLBACK_NOTE, fallbackHotels } from './fallback-data';

export const FILTERS_APPLIED = ['discount > 10%', 'long-stay deals (>3 nights)'];

interface BookingSearchResponse {
  properties?: RawProperty[];
}

export interface BookingComOptions {
  apiKey?: string;
  apiHost?: string;
  baseUrl?: string;
  timeoutMs?: number;
}

export class BookingComAdapter {
  private client: AxiosInstance;
  private apiKey: string;
  private apiHost: string;

  constructor(options: BookingComOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.RAPIDAPI_KEY ?? '';
    this.apiHost = options.apiHost ?? process.env.RAPIDAPI_HOST ?? 'booking-com.p.rapidapi.com';

    this.client = axios.create({
      baseURL: options.baseUrl ?? process.env.BOOKING_BASE_URL ?? `https://${this.apiHost}`,
      timeout: options.timeoutMs ?? 30000,
      validateStatus: () => true
    });
  }

  get isConfigured(): boolean {
    return this.apiKey !== '';
  }

  async search(params: HotelSearchParams): Promise<HotelSearchResult> {
    validateHotelStay(params.checkIn, params.checkOut);

    const stay: HotelStay = {
      destination: params.destination,
      checkIn: params.checkIn,
      checkOut: params.checkOut,
      nights: nightsBetween(params.checkIn, params.checkOut),
      priceRange: `$${params.priceMin}-$${params.priceMax}`
    };

    if (!this.isConfigured) {
      return this.fallback(stay, 'RapidAPI key is not configured');
    }

    const response = await this.send(() =>
      this.client.get<BookingSearchResponse>('/v1/hotels/search', {
        headers: {
          'X-RapidAPI-Key': this.apiKey,
          'X-RapidAPI-Host': this.apiHost
        },
        params: this.buildQuery(params)
      })
    );

    const status = response.status;
    if (status === 429) {
      return { kind: 'rate_limited', message: 'API rate limit exceeded. Please try again later.' };
    }
    if (status === 403) {
      return this.fallback(stay, 'hotel provider answered 403');
    }
    if (status < 200 || status >= 300) {
      console.error(`Booking.com hotel search failed with status ${status}`);
      return { kind: 'error', message: `Hotel provider returned status ${status}`, status };
    }

    const properties = response.data?.properties;
    if (!Array.isArray(properties) || properties.length === 0) {
      return { kind: 'no_results', stay, message: 'No hotels found for the given criteria.' };
    }

    const hotels = rankHotelDeals(properties, stay.nights, params.priceMin, params.priceMax);
    if (hotels.length === 0) {
      return { kind: 'no_filtered_results', stay, message: 'No hotels found with discounts >10% or long-stay deals.' };
    }

    return { kind: 'live', stay, hotels, filtersApplied: FILTERS_APPLIED };
  }

  private buildQuery(params: HotelSearchParams): Record<string, string> {
    const query: Record<string, string> = {
      locale: params.locale,
      dest_type: 'city',
      dest_id: resolveDestinationId(params.destination),
      checkin_date: params.checkIn,
      checkout_date: params.checkOut,
      adults_number: String(params.adults),
      order_by: params.sortBy,
      filter_by_currency: params.currency,
      room_number: String(params.rooms)
    };
    if (params.children > 0) {
      query.children_number = String(params.children);
    }
    return query;
  }

  private fallback(stay: HotelStay, reason: string): HotelSearchResult {
    console.warn(`⚠️ Returning sample hotel data: ${reason}`);
    return { kind: 'fallback', stay, hotels: fallbackHotels(stay.nights), note: HOTEL_FALLBACK_NOTE };
  }

  private async send<T>(request: () => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
    try {
      return await request();
    } catch (error) {
      console.error('❌ Booking.com request failed:', errorMessage(error));
      throw new UpstreamError('booking.com', `Hotel provider unreachable: ${errorMessage(error)}`);
    }
  }
}
