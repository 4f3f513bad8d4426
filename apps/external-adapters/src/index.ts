/**
 * External API Adapters for Travel Services
 * Amadeus (Flights), Booking.com (Hotels)
 */

import { config } from 'dotenv';
import { ExternalAPIService } from './server';

export { AmadeusAdapter, AmadeusOptions, normalizeOffer } from './amadeus';
export { BookingComAdapter, BookingComOptions, FILTERS_APPLIED } from './bookingCom';
export { FLIGHT_FALLBACK_NOTE, HOTEL_FALLBACK_NOTE, fallbackFlights, fallbackHotels } from './fallback-data';
export { ExternalAPIService } from './server';

// Start the service
if (require.main === module) {
  config();
  new ExternalAPIService().start();
}
