import { parseIsoDate, todayIso } from '../lib/dates';
import { FieldErrors } from './common';

/**
 * Check-in may not be before today (UTC calendar day); check-out must follow it.
 */
export function validateHotelStay(checkIn: string, checkOut: string, now: Date = new Date()): void {
  const errors = new FieldErrors();
  const start = parseIsoDate(checkIn);
  const end = parseIsoDate(checkOut);
  const today = parseIsoDate(todayIso(now));

  if (!start) {
    errors.add('checkIn', 'Check-in date must be a valid YYYY-MM-DD date');
  } else if (today && start < today) {
    errors.add('checkIn', 'Check-in date cannot be in the past');
  }

  if (!end) {
    errors.add('checkOut', 'Check-out date must be a valid YYYY-MM-DD date');
  } else if (start && end <= start) {
    errors.add('checkOut', 'Check-out date must be after check-in date');
  }

  errors.throwIfAny();
}
