import { HOTEL_LOCALES, HOTEL_SORT_KEYS, SUPPORTED_CURRENCIES } from '../contracts/travel';
import { TRAVEL_STYLES, TripSearchRequest } from '../contracts/search';
import { parseIsoDate, todayIso } from '../lib/dates';
import { FieldErrors, FormInput, isFormInput, readChoice, readInteger, readList, readNumber, readString } from './common';
import { normalizeAirportCode } from './flight.validator';

export const MAX_PREFERENCES = 10;
export const MAX_NOTES_LENGTH = 1000;
export const MAX_DESTINATION_LENGTH = 100;

const lower = (raw: string): string => raw.toLowerCase();
const upper = (raw: string): string => raw.toUpperCase();

/**
 * Validates a raw trip search form (urlencoded or JSON) and applies defaults.
 * The departure date doubles as hotel check-in, so it may not be in the past.
 */
export function validateTripSearch(body: unknown, now: Date = new Date()): TripSearchRequest {
  const input: FormInput = isFormInput(body) ? body : {};
  const errors = new FieldErrors();

  const originRaw = readString(input, 'origin');
  let origin: string | undefined;
  if (originRaw !== undefined) {
    const code = normalizeAirportCode(originRaw);
    if (code) {
      origin = code;
    } else {
      errors.add('origin', 'Origin must be a 3-letter airport code');
    }
  }

  let destination = readString(input, 'destination') ?? '';
  if (destination === '') {
    errors.add('destination', 'Destination is required');
  } else if (destination.length > MAX_DESTINATION_LENGTH) {
    errors.add('destination', `Destination must be at most ${MAX_DESTINATION_LENGTH} characters`);
  } else if (originRaw !== undefined) {
    const code = normalizeAirportCode(destination);
    if (code) {
      destination = code;
    } else {
      errors.add('destination', 'Destination must be a 3-letter airport code when an origin is given');
    }
  }

  const today = parseIsoDate(todayIso(now));
  const departureDate = readString(input, 'departure_date', 'start_date') ?? '';
  const departure = parseIsoDate(departureDate);
  if (departureDate === '') {
    errors.add('departure_date', 'Departure date is required');
  } else if (!departure) {
    errors.add('departure_date', 'Departure date must be a valid YYYY-MM-DD date');
  } else if (today && departure < today) {
    errors.add('departure_date', 'Departure date cannot be in the past');
  }

  const returnDate = readString(input, 'return_date', 'end_date');
  if (returnDate !== undefined) {
    const returning = parseIsoDate(returnDate);
    if (!returning) {
      errors.add('return_date', 'Return date must be a valid YYYY-MM-DD date');
    } else if (departure && returning <= departure) {
      errors.add('return_date', 'Return date must be after departure date');
    }
  }

  const adults = readInteger(input, errors, 'adults', { min: 1, max: 9 }, 1);
  const children = readInteger(input, errors, 'children', { min: 0, max: 9 }, 0);
  const infants = readInteger(input, errors, 'infants', { min: 0, max: 9 }, 0);
  if (!errors.has('infants') && !errors.has('adults') && infants > adults) {
    errors.add('infants', 'Number of infants cannot exceed number of adults');
  }
  const maxStops = readInteger(input, errors, 'max_stops', { min: 0, max: 3 }, undefined);

  const travelStyle = readChoice(input, errors, 'travel_class', TRAVEL_STYLES, 'economy', lower, 'trip_type', 'travel_style');
  const flightCurrency = readChoice(input, errors, 'flight_currency', SUPPORTED_CURRENCIES, 'USD', upper);

  const hotelNights = readInteger(input, errors, 'hotel_nights', { min: 0, max: 30 }, 0);
  const hotelAdults = readInteger(input, errors, 'hotel_adults', { min: 1, max: 8 }, 2);
  const hotelRooms = readInteger(input, errors, 'hotel_rooms', { min: 1, max: 5 }, 1);
  const hotelChildren = readInteger(input, errors, 'hotel_children', { min: 0, max: 4 }, 0);
  const hotelCurrency = readChoice(input, errors, 'hotel_currency', SUPPORTED_CURRENCIES, 'USD', upper);
  const hotelPriceMin = readNumber(input, errors, 'hotel_price_min', { min: 0, max: 1000 }, 0);
  const hotelPriceMax = readNumber(input, errors, 'hotel_price_max', { min: 0, max: 2000 }, 500);
  if (!errors.has('hotel_price_min') && !errors.has('hotel_price_max') && hotelPriceMin > hotelPriceMax) {
    errors.add('hotel_price_max', 'Maximum hotel price must not be below the minimum');
  }
  const hotelSort = readChoice(input, errors, 'hotel_sort', HOTEL_SORT_KEYS, 'price', lower);
  const hotelLocale = readChoice(input, errors, 'hotel_locale', HOTEL_LOCALES, 'en-gb', lower);

  const budget = readNumber(input, errors, 'budget', { min: 500, max: 100000 }, 20000);

  const preferences = readList(input, 'preferences', 'interests');
  if (preferences.length > MAX_PREFERENCES) {
    errors.add('preferences', `At most ${MAX_PREFERENCES} preferences are allowed`);
  }

  const notes = readString(input, 'notes') ?? '';
  if (notes.length > MAX_NOTES_LENGTH) {
    errors.add('notes', `Notes must be at most ${MAX_NOTES_LENGTH} characters`);
  }

  errors.throwIfAny();

  return {
    origin,
    destination,
    departureDate,
    returnDate,
    adults,
    children,
    infants,
    maxStops,
    travelStyle,
    flightCurrency,
    hotelNights,
    hotelAdults,
    hotelRooms,
    hotelChildren,
    hotelCurrency,
    hotelPriceMin,
    hotelPriceMax,
    hotelSort,
    hotelLocale,
    budget,
    preferences,
    notes
  };
}
