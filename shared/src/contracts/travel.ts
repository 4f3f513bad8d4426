/**
 * Flight and hotel contracts shared by the adapters, the orchestrator and the composer.
 * Both adapters answer with a tagged result so callers switch on `kind`
 * instead of probing for optional keys.
 */

export type CurrencyCode = 'USD' | 'EUR' | 'GBP' | 'CAD' | 'AUD' | 'JPY';

export const SUPPORTED_CURRENCIES: readonly CurrencyCode[] = ['USD', 'EUR', 'GBP', 'CAD', 'AUD', 'JPY'];

export type TravelClass = 'ECONOMY' | 'PREMIUM_ECONOMY' | 'BUSINESS' | 'FIRST';

/**
 * Flight service contracts
 */
export interface FlightSearchParams {
  origin: string; // IATA code
  destination: string; // IATA code
  departureDate: string;
  returnDate?: string;
  adults: number;
  children: number;
  infants: number;
  maxStops?: number;
  excludedAirlineCodes?: string[];
  currency: CurrencyCode;
  travelClass?: TravelClass;
}

export interface FlightEndpoint {
  airport: string;
  terminal: string | null;
  time: string | null;
}

export interface FlightSegment {
  departure: FlightEndpoint;
  arrival: FlightEndpoint;
  carrier: string;
  flightNumber: string;
  aircraft: string | null;
  duration: string | null;
}

export interface FlightItinerary {
  duration: string | null;
  stops: number;
  segments: FlightSegment[];
}

export interface FlightFee {
  amount: number;
  type: string;
}

export interface FlightOffer {
  id: string;
  price: {
    total: number | null;
    base: number | null;
    currency: string;
    fees: FlightFee[];
  };
  itineraries: FlightItinerary[];
}

export type FlightSearchResult =
  | { kind: 'live'; message: string; flights: FlightOffer[]; searchCriteria?: string }
  | { kind: 'fallback'; message: string; flights: FlightOffer[]; note: string }
  | { kind: 'rate_limited'; message: string }
  | { kind: 'error'; message: string; status?: number };

/**
 * Hotel service contracts
 */
export type HotelSortKey = 'price' | 'popularity' | 'distance' | 'class_descending' | 'review_score';

export const HOTEL_SORT_KEYS: readonly HotelSortKey[] = ['price', 'popularity', 'distance', 'class_descending', 'review_score'];

export const HOTEL_LOCALES: readonly string[] = ['en-gb', 'en-us', 'fr-fr', 'de-de', 'es-es', 'it-it', 'pt-pt', 'nl-nl'];

export interface HotelSearchParams {
  destination: string;
  checkIn: string;
  checkOut: string;
  adults: number;
  children: number;
  rooms: number;
  currency: CurrencyCode;
  priceMin: number;
  priceMax: number;
  sortBy: HotelSortKey;
  locale: string;
}

export interface HotelOffer {
  hotelId: string;
  name: string;
  pricePerNight: number;
  totalPrice: number;
  originalPricePerNight: number;
  discountPercentage: number;
  longStayBonus: number;
  dealScore: number;
  currency: string;
  rating: number | null;
  address: string;
  amenities: string[];
  promotion: {
    hasDiscount: boolean;
    discountAmount: number;
    isLongStayDeal: boolean;
  };
}

export interface HotelStay {
  destination: string;
  checkIn: string;
  checkOut: string;
  nights: number;
  priceRange: string;
}

export type HotelSearchResult =
  | { kind: 'live'; stay: HotelStay; hotels: HotelOffer[]; filtersApplied: string[] }
  | { kind: 'fallback'; stay: HotelStay; hotels: HotelOffer[]; note: string }
  | { kind: 'no_results'; stay: HotelStay; message: string }
  | { kind: 'no_filtered_results'; stay: HotelStay; message: string }
  | { kind: 'rate_limited'; message: string }
  | { kind: 'error'; message: string; status?: number };
