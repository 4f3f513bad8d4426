/**
 * Amadeus flight offers adapter.
 *
 * One OAuth2 client-credentials exchange per process; the bearer is reused until
 * shortly before it expires. Provider error statuses are folded into the tagged
 * result, only a missing response (network failure, timeout) throws.
 */

import axios, { AxiosInstance, AxiosResponse } from 'axios';
import {
  FlightItinerary,
  FlightOffer,
  FlightSearchParams,
  FlightSearchResult,
  FlightSegment,
  UpstreamError,
  errorMessage,
  validateFlightSearch
} from '@tripplanner/shared';
import { FLIGHT_FALLBACK_NOTE, fallbackFlights } from './fallback-data';

const DEFAULT_EXPIRES_IN_SECONDS = 1799;
const TOKEN_EXPIRY_MARGIN_SECONDS = 60;
const MAX_OFFERS = 10;

interface AmadeusAccessTokenResponse {
  access_token?: string;
  expires_in?: number;
  token_type?: string;
}

interface AmadeusLocation {
  iataCode?: string;
  terminal?: string;
  at?: string;
}

interface AmadeusSegment {
  departure?: AmadeusLocation;
  arrival?: AmadeusLocation;
  carrierCode?: string;
  number?: string;
  aircraft?: { code?: string };
  duration?: string;
}

interface AmadeusOffer {
  id?: string;
  price?: {
    total?: string;
    base?: string;
    currency?: string;
    fees?: Array<{ amount?: string; type?: string }>;
  };
  itineraries?: Array<{
    duration?: string;
    segments?: AmadeusSegment[];
  }>;
}

interface AmadeusFlightOffersResponse {
  data?: AmadeusOffer[];
  meta?: { links?: { self?: string } };
}

export interface AmadeusOptions {
  apiKey?: string;
  apiSecret?: string;
  baseUrl?: string;
  timeoutMs?: number;
  clock?: () => number;
}

type TokenOutcome =
  | { kind: 'token'; value: string }
  | { kind: 'fallback'; reason: string }
  | { kind: 'rate_limited' }
  | { kind: 'error'; status: number };

function toAmount(value: string | undefined): number | null {
  if (value === undefined) {
    return null;
  }
  const amount = parseFloat(value);
  return Number.isFinite(amount) ? amount : null;
}

function toSegment(segment: AmadeusSegment): FlightSegment {
  return {
    departure: {
      airport: segment.departure?.iataCode ?? 'N/A',
      terminal: segment.departure?.terminal ?? null,
      time: segment.departure?.at ?? null
    },
    arrival: {
      airport: segment.arrival?.iataCode ?? 'N/A',
      terminal: segment.arrival?.terminal ?? null,
      time: segment.arrival?.at ?? null
    },
    carrier: segment.carrierCode ?? 'N/A',
    flightNumber: segment.number ?? 'N/A',
    aircraft: segment.aircraft?.code ?? null,
    duration: segment.duration ?? null
  };
}

/**
 * Maps one provider offer, or returns null when its itinerary structure is unusable.
 */
export function normalizeOffer(offer: AmadeusOffer): FlightOffer | null {
  if (typeof offer !== 'object' || offer === null || !Array.isArray(offer.itineraries)) {
    return null;
  }
  const itineraries: FlightItinerary[] = [];
  for (const itinerary of offer.itineraries) {
    if (!Array.isArray(itinerary.segments)) {
      return null;
    }
    const segments = itinerary.segments.map(toSegment);
    itineraries.push({
      duration: itinerary.duration ?? null,
      stops: Math.max(segments.length - 1, 0),
      segments
    });
  }
  const rawFees = offer.price?.fees;
  const fees = Array.isArray(rawFees) ? rawFees : [];
  return {
    id: offer.id ?? 'N/A',
    price: {
      total: toAmount(offer.price?.total),
      base: toAmount(offer.price?.base),
      currency: offer.price?.currency ?? 'USD',
      fees: fees.map((fee) => ({ amount: toAmount(fee.amount) ?? 0, type: fee.type ?? 'UNKNOWN' }))
    },
    itineraries
  };
}

export class AmadeusAdapter {
  private client: AxiosInstance;
  private apiKey: string;
  private apiSecret: string;
  private clock: () => number;
  private cachedToken: { value: string; expiresAt: number } | null = null;

  constructor(options: AmadeusOptions = {}) {
    this.apiKey = options.apiKey ?? process.env.AMADEUS_API_KEY ?? '';
    this.apiSecret = options.apiSecret ?? process.env.AMADEUS_API_SECRET ?? '';
    this.clock = options.clock ?? Date.now;

    this.client = axios.create({
      baseURL: options.baseUrl ?? process.env.AMADEUS_BASE_URL ?? 'https://test.api.amadeus.com',
      timeout: options.timeoutMs ?? 30000,
      validateStatus: () => true
    });
  }

  get isConfigured(): boolean {
    return this.apiKey !== '' && this.apiSecret !== '';
  }

  async search(input: FlightSearchParams): Promise<FlightSearchResult> {
    const params = validateFlightSearch(input);

    if (!this.isConfigured) {
      return this.fallback(params, 'Amadeus credentials are not configured');
    }

    const token = await this.getAccessToken();
    if (token.kind === 'fallback') {
      return this.fallback(params, token.reason);
    }
    if (token.kind === 'rate_limited') {
      return { kind: 'rate_limited', message: 'Rate limit exceeded. Please try again later.' };
    }
    if (token.kind === 'error') {
      return { kind: 'error', message: `Flight provider authentication failed with status ${token.status}`, status: token.status };
    }
    const bearer = token.value;

    const response = await this.send<AmadeusFlightOffersResponse>(() =>
      this.client.get<AmadeusFlightOffersResponse>('/v2/shopping/flight-offers', {
        headers: { Authorization: `Bearer ${bearer}`, Accept: 'application/json' },
        params: this.buildQuery(params)
      })
    );

    const status = response.status;
    if (status === 429) {
      return { kind: 'rate_limited', message: 'Rate limit exceeded. Please try again later.' };
    }
    if (status === 400 || status === 401 || status === 403) {
      return this.fallback(params, `Flight provider answered ${status}`);
    }
    if (status < 200 || status >= 300) {
      console.error(`Amadeus flight search failed with status ${status}`);
      return { kind: 'error', message: `Flight provider returned status ${status}`, status };
    }

    return this.toLiveResult(response.data);
  }

  private buildQuery(params: FlightSearchParams): Record<string, string | number> {
    const query: Record<string, string | number> = {
      originLocationCode: params.origin,
      destinationLocationCode: params.destination,
      departureDate: params.departureDate,
      adults: params.adults,
      currencyCode: params.currency,
      max: MAX_OFFERS
    };
    if (params.returnDate) {
      query.returnDate = params.returnDate;
    }
    if (params.children > 0) {
      query.children = params.children;
    }
    if (params.infants > 0) {
      query.infants = params.infants;
    }
    if (params.maxStops !== undefined) {
      query.nonStop = params.maxStops === 0 ? 'true' : 'false';
    }
    if (params.excludedAirlineCodes && params.excludedAirlineCodes.length > 0) {
      query.excludedAirlineCodes = params.excludedAirlineCodes.join(',');
    }
    if (params.travelClass) {
      query.travelClass = params.travelClass;
    }
    return query;
  }

  private toLiveResult(body: AmadeusFlightOffersResponse | undefined): FlightSearchResult {
    const data = body?.data;
    const offers = Array.isArray(data) ? data : [];
    if (offers.length === 0) {
      return { kind: 'live', message: 'No flights found for the given criteria', flights: [] };
    }

    const flights: FlightOffer[] = [];
    for (const offer of offers.slice(0, MAX_OFFERS)) {
      const normalized = normalizeOffer(offer);
      if (normalized) {
        flights.push(normalized);
      } else {
        console.warn('⚠️ Skipping flight offer that could not be normalized');
      }
    }

    return {
      kind: 'live',
      message: `Found ${flights.length} flight(s)`,
      flights,
      searchCriteria: body?.meta?.links?.self
    };
  }

  private fallback(params: FlightSearchParams, reason: string): FlightSearchResult {
    console.warn(`⚠️ Returning sample flight data: ${reason}`);
    const flights = fallbackFlights(params);
    return {
      kind: 'fallback',
      message: `Found ${flights.length} sample flight(s)`,
      flights,
      note: FLIGHT_FALLBACK_NOTE
    };
  }

  private async getAccessToken(): Promise<TokenOutcome> {
    if (this.cachedToken && this.clock() < this.cachedToken.expiresAt) {
      return { kind: 'token', value: this.cachedToken.value };
    }

    const response = await this.send<AmadeusAccessTokenResponse>(() =>
      this.client.post<AmadeusAccessTokenResponse>(
        '/v1/security/oauth2/token',
        new URLSearchParams({
          grant_type: 'client_credentials',
          client_id: this.apiKey,
          client_secret: this.apiSecret
        }),
        { headers: { 'Content-Type': 'application/x-www-form-urlencoded' } }
      )
    );

    const status = response.status;
    if (status === 429) {
      return { kind: 'rate_limited' };
    }
    if (status >= 400 && status < 500) {
      return { kind: 'fallback', reason: `token exchange answered ${status}` };
    }
    const accessToken = response.data?.access_token;
    if (status < 200 || status >= 300 || !accessToken) {
      console.error(`❌ Amadeus token exchange failed with status ${status}`);
      return { kind: 'error', status };
    }

    const expiresIn = Number(response.data.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS);
    const lifetime = Number.isFinite(expiresIn) ? expiresIn : DEFAULT_EXPIRES_IN_SECONDS;
    this.cachedToken = {
      value: accessToken,
      expiresAt: this.clock() + (lifetime - TOKEN_EXPIRY_MARGIN_SECONDS) * 1000
    };
    console.log('✅ Authenticated with Amadeus');
    return { kind: 'token', value: accessToken };
  }

  private async send<T>(request: () => Promise<AxiosResponse<T>>): Promise<AxiosResponse<T>> {
    try {
      return await request();
    } catch (error) {
      console.error('❌ Amadeus request failed:', errorMessage(error));
      throw new UpstreamError('amadeus', `Flight provider unreachable: ${errorMessage(error)}`);
    }
  }
}
