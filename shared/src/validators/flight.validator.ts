import { FlightSearchParams } from '../contracts/travel';
import { parseIsoDate, todayIso, addDays } from '../lib/dates';
import { FieldErrors } from './common';

const AIRPORT_CODE = /^[A-Za-z]{3}$/;

/**
 * Uppercased airport code, or null when the value is not three letters.
 */
export function normalizeAirportCode(code: string): string | null {
  const trimmed = code.trim();
  return AIRPORT_CODE.test(trimmed) ? trimmed.toUpperCase() : null;
}

/**
 * Checks a flight query and returns it with airport codes uppercased.
 * Every violation is reported in one ValidationError.
 */
export function validateFlightSearch(params: FlightSearchParams, now: Date = new Date()): FlightSearchParams {
  const errors = new FieldErrors();

  const origin = normalizeAirportCode(params.origin);
  if (!origin) {
    errors.add('origin', 'Origin must be a 3-letter airport code');
  }
  const destination = normalizeAirportCode(params.destination);
  if (!destination) {
    errors.add('destination', 'Destination must be a 3-letter airport code');
  }

  const earliest = parseIsoDate(addDays(todayIso(now), -365));
  const departure = parseIsoDate(params.departureDate);
  if (!departure) {
    errors.add('departureDate', 'Departure date must be a valid YYYY-MM-DD date');
  } else if (earliest && departure < earliest) {
    errors.add('departureDate', 'Departure date is more than a year in the past');
  }

  if (params.returnDate !== undefined) {
    const returning = parseIsoDate(params.returnDate);
    if (!returning) {
      errors.add('returnDate', 'Return date must be a valid YYYY-MM-DD date');
    } else if (earliest && returning < earliest) {
      errors.add('returnDate', 'Return date is more than a year in the past');
    } else if (departure && returning <= departure) {
      errors.add('returnDate', 'Return date must be after departure date');
    }
  }

  if (!Number.isInteger(params.adults) || params.adults < 1 || params.adults > 9) {
    errors.add('adults', 'Number of adults must be between 1 and 9');
  }
  if (!Number.isInteger(params.children) || params.children < 0 || params.children > 9) {
    errors.add('children', 'Number of children must be between 0 and 9');
  }
  if (!Number.isInteger(params.infants) || params.infants < 0 || params.infants > 9) {
    errors.add('infants', 'Number of infants must be between 0 and 9');
  } else if (params.infants > params.adults) {
    errors.add('infants', 'Number of infants cannot exceed number of adults');
  }

  if (params.maxStops !== undefined && (!Number.isInteger(params.maxStops) || params.maxStops < 0 || params.maxStops > 3)) {
    errors.add('maxStops', 'Max stops must be between 0 and 3');
  }

  errors.throwIfAny();

  return {
    ...params,
    origin: origin ?? params.origin,
    destination: destination ?? params.destination,
    excludedAirlineCodes: params.excludedAirlineCodes?.map((code) => code.trim().toUpperCase())
  };
}
