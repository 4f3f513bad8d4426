/**
 * Trip search contracts
 */
import { CurrencyCode, HotelSortKey } from './travel';

export type SearchStatus = 'processing' | 'completed' | 'failed';

export type TravelStyle = 'economy' | 'business' | 'first' | 'budget' | 'comfort' | 'luxury';

export const TRAVEL_STYLES: readonly TravelStyle[] = ['economy', 'business', 'first', 'budget', 'comfort', 'luxury'];

export interface TripSearchRequest {
  origin?: string;
  destination: string;
  departureDate: string;
  returnDate?: string;
  adults: number;
  children: number;
  infants: number;
  maxStops?: number;
  travelStyle: TravelStyle;
  flightCurrency: CurrencyCode;
  hotelNights: number;
  hotelAdults: number;
  hotelRooms: number;
  hotelChildren: number;
  hotelCurrency: CurrencyCode;
  hotelPriceMin: number;
  hotelPriceMax: number;
  hotelSort: HotelSortKey;
  hotelLocale: string;
  budget: number;
  preferences: string[];
  notes: string;
}

export interface Recommendation {
  title: string;
  destination: string;
  dates: string;
  budget: number;
  interests: string[];
  travelStyle: TravelStyle;
  body: string;
  steps: string[];
  sources: string[];
  generatedBy: 'llm' | 'template';
  generatedAt: string;
}

export interface SearchRecord {
  searchId: string;
  ownerId: string;
  status: SearchStatus;
  request: TripSearchRequest;
  result?: Recommendation;
  error?: string;
  createdAt: string;
  completedAt?: string;
}

// Wire shapes

export interface SearchAcceptedPayload {
  search_id: string;
  status: 'processing';
  created_at: string;
  poll_url: string;
}

export interface RecommendationPayload {
  type: 'trip_recommendation';
  title: string;
  description: string;
  full_recommendation: string;
  destination: string;
  dates: string;
  budget: number;
  interests: string[];
  travel_style: TravelStyle;
  tasks: string[];
  api_sources: string[];
  generated_by: 'llm' | 'template';
  generated_at: string;
}

export interface SearchStatusPayload {
  search_id: string;
  status: SearchStatus;
  results?: RecommendationPayload;
  error?: string;
  created_at: string;
  completed_at?: string;
}

export interface SearchSummaryPayload {
  search_id: string;
  status: SearchStatus;
  destination: string;
  departure_date: string;
  return_date: string | null;
  created_at: string;
  completed_at: string | null;
}

const DESCRIPTION_LIMIT = 500;

export function toRecommendationPayload(recommendation: Recommendation): RecommendationPayload {
  const body = recommendation.body;
  return {
    type: 'trip_recommendation',
    title: recommendation.title,
    description: body.length > DESCRIPTION_LIMIT ? `${body.slice(0, DESCRIPTION_LIMIT)}...` : body,
    full_recommendation: body,
    destination: recommendation.destination,
    dates: recommendation.dates,
    budget: recommendation.budget,
    interests: recommendation.interests,
    travel_style: recommendation.travelStyle,
    tasks: recommendation.steps,
    api_sources: recommendation.sources,
    generated_by: recommendation.generatedBy,
    generated_at: recommendation.generatedAt
  };
}

export function toSearchStatusPayload(record: SearchRecord): SearchStatusPayload {
  const payload: SearchStatusPayload = {
    search_id: record.searchId,
    status: record.status,
    created_at: record.createdAt
  };
  if (record.result) {
    payload.results = toRecommendationPayload(record.result);
  }
  if (record.error !== undefined) {
    payload.error = record.error;
  }
  if (record.completedAt) {
    payload.completed_at = record.completedAt;
  }
  return payload;
}

export function toSearchSummaryPayload(record: SearchRecord): SearchSummaryPayload {
  return {
    search_id: record.searchId,
    status: record.status,
    destination: record.request.destination,
    departure_date: record.request.departureDate,
    return_date: record.request.returnDate ?? null,
    created_at: record.createdAt,
    completed_at: record.completedAt ?? null
  };
}
