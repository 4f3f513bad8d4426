import { v4 as uuidv4 } from 'uuid';
import {
  AuthorizationError,
  FlightSearchParams,
  FlightSearchResult,
  HotelSearchParams,
  HotelSearchResult,
  NotFoundError,
  Recommendation,
  SearchRecord,
  SearchStatus,
  TravelClass,
  TravelStyle,
  TripSearchRequest,
  User,
  addDays,
  errorMessage,
  validateTripSearch
} from '@tripplanner/shared';
import { KeyValueStore } from '../store/keyValueStore';
import { TaskRunner } from './backgroundTasks';
import { FlightStage } from './recommendationComposer';

export interface FlightSearcher {
  search(params: FlightSearchParams): Promise<FlightSearchResult>;
}

export interface HotelSearcher {
  search(params: HotelSearchParams): Promise<HotelSearchResult>;
}

export interface Composer {
  compose(flights: FlightStage, hotels: HotelSearchResult, request: TripSearchRequest): Promise<Recommendation>;
}

export interface SearchOrchestratorOptions {
  store: KeyValueStore;
  flights: FlightSearcher;
  hotels: HotelSearcher;
  composer: Composer;
  tasks: TaskRunner;
  ttlSeconds: number;
  clock?: () => Date;
  onFinished?: (status: Exclude<SearchStatus, 'processing'>) => void;
}

export interface SearchPage {
  records: SearchRecord[];
  total: number;
}

const SEARCH_STATUSES: readonly string[] = ['processing', 'completed', 'failed'];

const CABIN_FOR_STYLE: Partial<Record<TravelStyle, TravelClass>> = {
  economy: 'ECONOMY',
  business: 'BUSINESS',
  first: 'FIRST'
};

function isSearchRecord(value: unknown): value is SearchRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'searchId' in value &&
    typeof value.searchId === 'string' &&
    'ownerId' in value &&
    typeof value.ownerId === 'string' &&
    'status' in value &&
    typeof value.status === 'string' &&
    SEARCH_STATUSES.includes(value.status) &&
    'request' in value &&
    typeof value.request === 'object' &&
    value.request !== null
  );
}

/**
 * Check-out is the return date, else departure plus the requested nights,
 * else the day after departure.
 */
export function hotelStayFor(request: TripSearchRequest): { checkIn: string; checkOut: string } {
  const checkIn = request.departureDate;
  if (request.returnDate) {
    return { checkIn, checkOut: request.returnDate };
  }
  return { checkIn, checkOut: addDays(checkIn, request.hotelNights > 0 ? request.hotelNights : 1) };
}

export function flightParamsFor(request: TripSearchRequest, origin: string): FlightSearchParams {
  return {
    origin,
    destination: request.destination,
    departureDate: request.departureDate,
    returnDate: request.returnDate,
    adults: request.adults,
    children: request.children,
    infants: request.infants,
    maxStops: request.maxStops,
    currency: request.flightCurrency,
    travelClass: CABIN_FOR_STYLE[request.travelStyle]
  };
}

export function hotelParamsFor(request: TripSearchRequest): HotelSearchParams {
  const { checkIn, checkOut } = hotelStayFor(request);
  return {
    destination: request.destination,
    checkIn,
    checkOut,
    adults: request.hotelAdults,
    children: request.hotelChildren,
    rooms: request.hotelRooms,
    currency: request.hotelCurrency,
    priceMin: request.hotelPriceMin,
    priceMax: request.hotelPriceMax,
    sortBy: request.hotelSort,
    locale: request.hotelLocale
  };
}

/**
 * Fire-and-poll trip searches. `submit` stores a processing record and hands
 * the lookups to the task runner; exactly that one task moves the record to a
 * terminal status.
 */
export class SearchOrchestrator {
  private store: KeyValueStore;
  private flights: FlightSearcher;
  private hotels: HotelSearcher;
  private composer: Composer;
  private tasks: TaskRunner;
  private ttlSeconds: number;
  private clock: () => Date;
  private onFinished?: (status: Exclude<SearchStatus, 'processing'>) => void;

  constructor(options: SearchOrchestratorOptions) {
    this.store = options.store;
    this.flights = options.flights;
    this.hotels = options.hotels;
    this.composer = options.composer;
    this.tasks = options.tasks;
    this.ttlSeconds = options.ttlSeconds;
    this.clock = options.clock ?? (() => new Date());
    this.onFinished = options.onFinished;
  }

  async submit(body: unknown, owner: User): Promise<SearchRecord> {
    const request = validateTripSearch(body, this.clock());
    const record: SearchRecord = {
      searchId: uuidv4(),
      ownerId: owner.id,
      status: 'processing',
      request,
      createdAt: this.clock().toISOString()
    };
    await this.save(record);
    await this.store.set(this.ownerKey(owner.id, record.searchId), record.searchId, this.ttlSeconds);

    this.tasks.schedule(`search:${record.searchId}`, () => this.process(record));
    console.log(`🔍 Search ${record.searchId} accepted for ${request.destination}`);
    return record;
  }

  async get(searchId: string, requester: User): Promise<SearchRecord> {
    const record = await this.load(searchId);
    if (!record) {
      throw new NotFoundError('Search not found');
    }
    if (record.ownerId !== requester.id) {
      throw new AuthorizationError('Access denied');
    }
    return record;
  }

  /** The owner's live records, newest first. */
  async listForOwner(ownerId: string, skip: number, limit: number): Promise<SearchPage> {
    const keys = await this.store.keys(this.ownerKey(ownerId, ''));
    const records: SearchRecord[] = [];
    for (const key of keys) {
      const searchId = key.slice(this.ownerKey(ownerId, '').length);
      const record = await this.load(searchId);
      if (record && record.ownerId === ownerId) {
        records.push(record);
      }
    }
    records.sort((a, b) => b.createdAt.localeCompare(a.createdAt));
    return { records: records.slice(skip, skip + limit), total: records.length };
  }

  private async process(record: SearchRecord): Promise<void> {
    const { request } = record;
    try {
      const flights: FlightStage = request.origin
        ? await this.flights.search(flightParamsFor(request, request.origin))
        : { kind: 'skipped', reason: 'no origin airport was given' };
      const hotels = await this.hotels.search(hotelParamsFor(request));
      const result = await this.composer.compose(flights, hotels, request);
      await this.finish(record.searchId, { status: 'completed', result });
    } catch (error) {
      console.error(`❌ Search ${record.searchId} failed:`, error);
      await this.finish(record.searchId, { status: 'failed', error: errorMessage(error) });
    }
  }

  private async finish(
    searchId: string,
    outcome: { status: 'completed'; result: Recommendation } | { status: 'failed'; error: string }
  ): Promise<void> {
    const current = await this.load(searchId);
    if (!current) {
      console.warn(`⚠️ Search ${searchId} expired before it finished`);
      return;
    }
    if (current.status !== 'processing') {
      console.warn(`⚠️ Search ${searchId} is already ${current.status}`);
      return;
    }
    await this.save({ ...current, ...outcome, completedAt: this.clock().toISOString() });
    this.onFinished?.(outcome.status);
    console.log(`✅ Search ${searchId} ${outcome.status}`);
  }

  private async load(searchId: string): Promise<SearchRecord | null> {
    const raw = await this.store.get(this.recordKey(searchId));
    if (raw === null) {
      return null;
    }
    const parsed: unknown = JSON.parse(raw);
    if (!isSearchRecord(parsed)) {
      console.error(`❌ Search ${searchId} has an unreadable record`);
      return null;
    }
    return parsed;
  }

  private async save(record: SearchRecord): Promise<void> {
    await this.store.set(this.recordKey(record.searchId), JSON.stringify(record), this.ttlSeconds);
  }

  private recordKey(searchId: string): string {
    return `search:${searchId}`;
  }

  private ownerKey(ownerId: string, searchId: string): string {
    return `searches:${ownerId}:${searchId}`;
  }
}
