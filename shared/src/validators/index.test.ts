import { describe, it, expect } from '@jest/globals';
import { validateEmail, validatePassword, validateUsername, readList, FieldErrors, readInteger } from './common';
import { validateFlightSearch, normalizeAirportCode } from './flight.validator';
import { validateHotelStay } from './hotel.validator';
import { validateTripSearch } from './search.validator';
import { ValidationError } from '../errors';
import { FlightSearchParams } from '../contracts/travel';

const NOW = new Date('2030-06-15T12:00:00Z');

function validationErrors(run: () => unknown): Record<string, string> {
  try {
    run();
  } catch (error) {
    if (error instanceof ValidationError) {
      return error.errors;
    }
    throw error;
  }
  throw new Error('expected a ValidationError');
}

describe('Validation Tests', () => {
  describe('account fields', () => {
    it('should accept well-formed values', () => {
      expect(() => validateEmail('traveler@example.com')).not.toThrow();
      expect(() => validateUsername('road_runner_7')).not.toThrow();
      expect(() => validatePassword('secret1')).not.toThrow();
    });

    it('should reject malformed values', () => {
      expect(() => validateEmail('not-an-email')).toThrow(ValidationError);
      expect(() => validateUsername('ab')).toThrow(ValidationError);
      expect(() => validateUsername('has space')).toThrow(ValidationError);
      expect(() => validateUsername('a'.repeat(51))).toThrow(ValidationError);
      expect(() => validatePassword('12345')).toThrow(ValidationError);
    });
  });

  describe('form readers', () => {
    it('should split comma-separated lists and drop blanks', () => {
      expect(readList({ interests: 'food, museums , ,hiking' }, 'preferences', 'interests')).toEqual(['food', 'museums', 'hiking']);
    });

    it('should record out-of-range integers and fall back', () => {
      const errors = new FieldErrors();
      const value = readInteger({ adults: '12' }, errors, 'adults', { min: 1, max: 9 }, 1);
      expect(value).toBe(1);
      expect(errors.errors).toEqual({ adults: 'adults must be between 1 and 9' });
    });
  });

  describe('validateFlightSearch', () => {
    const base: FlightSearchParams = {
      origin: 'sfo',
      destination: 'jfk',
      departureDate: '2030-07-01',
      returnDate: '2030-07-08',
      adults: 2,
      children: 0,
      infants: 1,
      currency: 'USD'
    };

    it('should uppercase airport codes', () => {
      const params = validateFlightSearch(base, NOW);
      expect(params.origin).toBe('SFO');
      expect(params.destination).toBe('JFK');
    });

    it('should reject codes that are not three letters', () => {
      expect(normalizeAirportCode('LA')).toBeNull();
      expect(normalizeAirportCode('LAX1')).toBeNull();
      expect(normalizeAirportCode('L4X')).toBeNull();
      const errors = validationErrors(() => validateFlightSearch({ ...base, origin: 'SF0' }, NOW));
      expect(errors.origin).toBe('Origin must be a 3-letter airport code');
    });

    it('should report every violation at once', () => {
      const errors = validationErrors(() =>
        validateFlightSearch({ ...base, returnDate: '2030-07-01', adults: 1, infants: 2, maxStops: 4 }, NOW)
      );
      expect(Object.keys(errors).sort()).toEqual(['infants', 'maxStops', 'returnDate']);
    });

    it('should refuse dates more than a year in the past', () => {
      const errors = validationErrors(() =>
        validateFlightSearch({ ...base, departureDate: '2029-06-14', returnDate: undefined }, NOW)
      );
      expect(errors.departureDate).toBe('Departure date is more than a year in the past');
    });

    it('should reject impossible calendar dates', () => {
      const errors = validationErrors(() => validateFlightSearch({ ...base, departureDate: '2030-02-30' }, NOW));
      expect(errors.departureDate).toBe('Departure date must be a valid YYYY-MM-DD date');
    });
  });

  describe('validateHotelStay', () => {
    it('should accept a stay starting today', () => {
      expect(() => validateHotelStay('2030-06-15', '2030-06-16', NOW)).not.toThrow();
    });

    it('should require check-out strictly after check-in', () => {
      const errors = validationErrors(() => validateHotelStay('2030-07-01', '2030-07-01', NOW));
      expect(errors).toEqual({ checkOut: 'Check-out date must be after check-in date' });
    });

    it('should reject a check-in in the past', () => {
      const errors = validationErrors(() => validateHotelStay('2030-06-14', '2030-06-20', NOW));
      expect(errors).toEqual({ checkIn: 'Check-in date cannot be in the past' });
    });
  });

  describe('validateTripSearch', () => {
    it('should apply defaults for a minimal form', () => {
      const request = validateTripSearch({ destination: 'Lisbon', departure_date: '2030-07-01' }, NOW);
      expect(request).toEqual({
        origin: undefined,
        destination: 'Lisbon',
        departureDate: '2030-07-01',
        returnDate: undefined,
        adults: 1,
        children: 0,
        infants: 0,
        maxStops: undefined,
        travelStyle: 'economy',
        flightCurrency: 'USD',
        hotelNights: 0,
        hotelAdults: 2,
        hotelRooms: 1,
        hotelChildren: 0,
        hotelCurrency: 'USD',
        hotelPriceMin: 0,
        hotelPriceMax: 500,
        hotelSort: 'price',
        hotelLocale: 'en-gb',
        budget: 20000,
        preferences: [],
        notes: ''
      });
    });

    it('should honour field aliases and normalize codes', () => {
      const request = validateTripSearch(
        {
          origin: 'sfo',
          destination: 'cdg',
          start_date: '2030-07-01',
          end_date: '2030-07-05',
          trip_type: 'Luxury',
          hotel_currency: 'eur',
          interests: 'art,wine',
          budget: '5000'
        },
        NOW
      );
      expect(request.origin).toBe('SFO');
      expect(request.destination).toBe('CDG');
      expect(request.returnDate).toBe('2030-07-05');
      expect(request.travelStyle).toBe('luxury');
      expect(request.hotelCurrency).toBe('EUR');
      expect(request.preferences).toEqual(['art', 'wine']);
      expect(request.budget).toBe(5000);
    });

    it('should collect every invalid field', () => {
      const errors = validationErrors(() =>
        validateTripSearch(
          {
            origin: 'SF',
            destination: 'Paris',
            departure_date: '2030-06-10',
            hotel_price_min: '300',
            hotel_price_max: '200',
            budget: '100',
            travel_class: 'steerage'
          },
          NOW
        )
      );
      expect(Object.keys(errors).sort()).toEqual(['budget', 'departure_date', 'destination', 'hotel_price_max', 'origin', 'travel_class']);
    });

    it('should require a 3-letter destination when an origin is given', () => {
      const errors = validationErrors(() =>
        validateTripSearch({ origin: 'SFO', destination: 'Paris', departure_date: '2030-07-01' }, NOW)
      );
      expect(errors).toEqual({ destination: 'Destination must be a 3-letter airport code when an origin is given' });
    });

    it('should reject a non-object body', () => {
      const errors = validationErrors(() => validateTripSearch('destination=Paris', NOW));
      expect(errors).toEqual({
        destination: 'Destination is required',
        departure_date: 'Departure date is required'
      });
    });
  });
});
