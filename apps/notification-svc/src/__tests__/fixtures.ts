import { Recommendation } from '@tripplanner/shared';

export function sampleRecommendation(overrides: Partial<Recommendation> = {}): Recommendation {
  return {
    title: 'AI-Powered Travel Plan for Lisbon',
    destination: 'Lisbon',
    dates: '2030-07-01 to 2030-07-05',
    budget: 12345,
    interests: ['food', 'history'],
    travelStyle: 'comfort',
    body: 'Day 1: **Alfama** walk',
    steps: ['Flights: skipped (no origin given)'],
    sources: ['Booking.com Hotels'],
    generatedBy: 'template',
    generatedAt: '2030-06-15T14:05:00.000Z',
    ...overrides
  };
}
