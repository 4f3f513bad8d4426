import { describe, it, expect, beforeAll, afterAll, beforeEach } from '@jest/globals';
import express from 'express';
import { addDays, todayIso, HotelSearchParams, UpstreamError, ValidationError } from '@tripplanner/shared';
import { BookingComAdapter } from '../bookingCom';
import { startStub, unreachableBaseUrl, StubServer } from '../../../../tests/support/stub-server';

const state: {
  status: number;
  body: unknown;
  calls: number;
  lastQuery: Record<string, unknown>;
  lastKey: string | undefined;
} = { status: 200, body: { properties: [] }, calls: 0, lastQuery: {}, lastKey: undefined };

describe('BookingComAdapter', () => {
  let provider: StubServer;
  const checkIn = addDays(todayIso(), 10);
  const params: HotelSearchParams = {
    destination: 'cdg',
    checkIn,
    checkOut: addDays(checkIn, 5),
    adults: 2,
    children: 0,
    rooms: 1,
    currency: 'EUR',
    priceMin: 50,
    priceMax: 300,
    sortBy: 'price',
    locale: 'en-gb'
  };

  beforeAll(async () => {
    const app = express();
    app.get('/v1/hotels/search', (req, res) => {
      state.calls += 1;
      state.lastQuery = req.query;
      state.lastKey = req.header('x-rapidapi-key');
      res.status(state.status).json(state.body);
    });
    provider = await startStub(app);
  });

  afterAll(async () => {
    await provider.close();
  });

  beforeEach(() => {
    state.status = 200;
    state.body = { properties: [] };
    state.calls = 0;
    state.lastQuery = {};
    state.lastKey = undefined;
  });

  function adapter(): BookingComAdapter {
    return new BookingComAdapter({ apiKey: 'test-key', apiHost: 'hotels.test', baseUrl: provider.baseUrl });
  }

  it('should rank live deals and send the expected query', async () => {
    state.body = {
      properties: [
        { id: 1, name: 'Quai Hotel', price: { current: 120, original: 150, currency: 'EUR' }, rating: { value: 8.6 } },
        { id: 2, name: 'Rue Hotel', price: { current: 95, original: 100, currency: 'EUR' } },
        { id: 3, name: 'Palace', price: { current: 900, original: 1500, currency: 'EUR' } }
      ]
    };

    const result = await adapter().search(params);

    expect(result.kind).toBe('live');
    if (result.kind !== 'live') return;
    expect(result.stay).toEqual({
      destination: 'cdg',
      checkIn,
      checkOut: addDays(checkIn, 5),
      nights: 5,
      priceRange: '$50-$300'
    });
    expect(result.hotels.map((hotel) => [hotel.hotelId, hotel.dealScore])).toEqual([
      ['1', 30],
      ['2', 15]
    ]);
    expect(result.filtersApplied).toEqual(['discount > 10%', 'long-stay deals (>3 nights)']);
    expect(state.lastKey).toBe('test-key');
    expect(state.lastQuery).toEqual({
      locale: 'en-gb',
      dest_type: 'city',
      dest_id: '-1456928',
      checkin_date: checkIn,
      checkout_date: addDays(checkIn, 5),
      adults_number: '2',
      order_by: 'price',
      filter_by_currency: 'EUR',
      room_number: '1'
    });
  });

  it('should pass children only when there are some', async () => {
    await adapter().search({ ...params, children: 2 });
    expect(state.lastQuery.children_number).toBe('2');
  });

  it('should report when the provider lists nothing', async () => {
    const result = await adapter().search(params);
    expect(result.kind).toBe('no_results');
  });

  it('should report when no property is a deal', async () => {
    state.body = { properties: [{ id: 2, price: { current: 95, original: 100 } }] };
    const result = await adapter().search({ ...params, checkOut: addDays(checkIn, 2) });
    expect(result).toEqual({
      kind: 'no_filtered_results',
      stay: { destination: 'cdg', checkIn, checkOut: addDays(checkIn, 2), nights: 2, priceRange: '$50-$300' },
      message: 'No hotels found with discounts >10% or long-stay deals.'
    });
  });

  it('should return labelled sample data when access is denied', async () => {
    state.status = 403;
    const result = await adapter().search({ ...params, checkOut: addDays(checkIn, 2) });
    expect(result.kind).toBe('fallback');
    if (result.kind !== 'fallback') return;
    expect(result.hotels.map((hotel) => [hotel.name, hotel.totalPrice])).toEqual([
      ['Sample Hotel Downtown', 240],
      ['Budget Inn', 160]
    ]);
  });

  it('should return sample data without a key', async () => {
    const result = await new BookingComAdapter({ apiKey: '', baseUrl: provider.baseUrl }).search(params);
    expect(result.kind).toBe('fallback');
    expect(state.calls).toBe(0);
  });

  it('should report rate limiting and other failures', async () => {
    state.status = 429;
    expect((await adapter().search(params)).kind).toBe('rate_limited');
    state.status = 500;
    expect(await adapter().search(params)).toEqual({ kind: 'error', message: 'Hotel provider returned status 500', status: 500 });
  });

  it('should refuse a stay whose check-out is not after check-in', async () => {
    await expect(adapter().search({ ...params, checkOut: checkIn })).rejects.toBeInstanceOf(ValidationError);
    expect(state.calls).toBe(0);
  });

  it('should raise when the provider cannot be reached', async () => {
    const baseUrl = await unreachableBaseUrl();
    await expect(new BookingComAdapter({ apiKey: 'test-key', baseUrl }).search(params)).rejects.toBeInstanceOf(UpstreamError);
  });
});
