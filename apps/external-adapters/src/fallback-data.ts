/**
 * Labelled sample data returned when a provider refuses our credentials,
 * so a trip can still be composed end to end.
 */

import { FlightOffer, FlightSearchParams, HotelOffer, RawProperty, rankHotelDeals } from '@tripplanner/shared';

export const FLIGHT_FALLBACK_NOTE =
  'Sample flight data returned because the flight provider rejected the request. Configure valid Amadeus credentials for live data.';

export const HOTEL_FALLBACK_NOTE =
  'Sample hotel data returned due to API access restrictions. Configure valid RapidAPI credentials for live data.';

export function fallbackFlights(params: FlightSearchParams): FlightOffer[] {
  const day = params.departureDate;
  return [
    {
      id: 'sample_flight_1',
      price: { total: 299.99, base: 250, currency: params.currency, fees: [] },
      itineraries: [
        {
          duration: 'PT5H30M',
          stops: 0,
          segments: [
            {
              departure: { airport: params.origin, terminal: '4', time: `${day}T08:00:00` },
              arrival: { airport: params.destination, terminal: '1', time: `${day}T10:30:00` },
              carrier: 'AA',
              flightNumber: '1234',
              aircraft: '321',
              duration: 'PT5H30M'
            }
          ]
        }
      ]
    },
    {
      id: 'sample_flight_2',
      price: { total: 399.99, base: 350, currency: params.currency, fees: [] },
      itineraries: [
        {
          duration: 'PT7H15M',
          stops: 1,
          segments: [
            {
              departure: { airport: params.origin, terminal: '4', time: `${day}T14:00:00` },
              arrival: { airport: 'DEN', terminal: 'A', time: `${day}T16:00:00` },
              carrier: 'UA',
              flightNumber: '5678',
              aircraft: '737',
              duration: 'PT2H00M'
            },
            {
              departure: { airport: 'DEN', terminal: 'A', time: `${day}T17:30:00` },
              arrival: { airport: params.destination, terminal: '3', time: `${day}T19:15:00` },
              carrier: 'UA',
              flightNumber: '9012',
              aircraft: '320',
              duration: 'PT2H45M'
            }
          ]
        }
      ]
    }
  ];
}

const SAMPLE_PROPERTIES: RawProperty[] = [
  {
    id: '12345',
    name: 'Sample Hotel Downtown',
    price: { current: 120, original: 150, currency: 'USD' },
    rating: { value: 4.2 },
    address: { full: 'Downtown (sample listing)' },
    amenities: ['WiFi', 'Pool', 'Gym', 'Parking', 'Restaurant']
  },
  {
    id: '67890',
    name: 'Budget Inn',
    price: { current: 80, original: 100, currency: 'USD' },
    rating: { value: 3.8 },
    address: { full: 'City centre (sample listing)' },
    amenities: ['WiFi', 'Parking', 'Continental Breakfast']
  }
];

/**
 * Sample offers scored with the same deal rules as live results. Price bounds are
 * ignored so the sample is never empty.
 */
export function fallbackHotels(nights: number): HotelOffer[] {
  return rankHotelDeals(SAMPLE_PROPERTIES, nights, 0, Number.POSITIVE_INFINITY);
}
