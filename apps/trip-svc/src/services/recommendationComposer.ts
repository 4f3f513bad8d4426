import Anthropic from '@anthropic-ai/sdk';
import {
  FlightOffer,
  FlightSearchResult,
  HotelOffer,
  HotelSearchResult,
  Recommendation,
  TripSearchRequest,
  errorMessage
} from '@tripplanner/shared';
import { formatBudget } from '@tripplanner/notification-svc';

/** A flight lookup outcome, or the reason none was made. */
export type FlightStage = FlightSearchResult | { kind: 'skipped'; reason: string };

export interface ComposerOptions {
  apiKey?: string;
  model?: string;
  baseUrl?: string;
  timeoutMs?: number;
  clock?: () => Date;
}

const MAX_TOKENS = 2000;
const LISTED_OFFERS = 5;

function titleCase(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function tripDates(request: TripSearchRequest): string {
  return request.returnDate
    ? `${request.departureDate} to ${request.returnDate}`
    : `${request.departureDate} (one-way)`;
}

function interestsLine(request: TripSearchRequest, fallback: string): string {
  return request.preferences.length > 0 ? request.preferences.join(', ') : fallback;
}

function describeFlight(offer: FlightOffer): string {
  const itinerary = offer.itineraries[0];
  const first = itinerary?.segments[0];
  const last = itinerary?.segments[itinerary.segments.length - 1];
  const route = first && last ? `${first.departure.airport} → ${last.arrival.airport}` : 'route unavailable';
  const flight = first ? `${first.carrier} ${first.flightNumber}` : offer.id;
  const stops = itinerary ? `${itinerary.stops} stop(s)` : 'stops unknown';
  const price = offer.price.total === null ? 'price unavailable' : `${offer.price.total.toFixed(2)} ${offer.price.currency}`;
  return `- ${flight}: ${route}, ${stops}, ${price}`;
}

function describeHotel(hotel: HotelOffer): string {
  const rating = hotel.rating === null ? 'unrated' : `rated ${hotel.rating}`;
  return (
    `- ${hotel.name}: ${hotel.pricePerNight.toFixed(2)} ${hotel.currency}/night ` +
    `(${hotel.discountPercentage}% off, ${hotel.totalPrice.toFixed(2)} total), ${rating}, ${hotel.address}`
  );
}

export function describeFlights(stage: FlightStage): string {
  switch (stage.kind) {
    case 'skipped':
      return `Flight search skipped: ${stage.reason}`;
    case 'rate_limited':
    case 'error':
      return stage.message;
    case 'live':
    case 'fallback': {
      const lines = [stage.message, ...stage.flights.slice(0, LISTED_OFFERS).map(describeFlight)];
      if (stage.kind === 'fallback') {
        lines.push(`_${stage.note}_`);
      }
      return lines.join('\n');
    }
  }
}

export function describeHotels(result: HotelSearchResult): string {
  switch (result.kind) {
    case 'rate_limited':
    case 'error':
    case 'no_results':
    case 'no_filtered_results':
      return result.message;
    case 'live':
    case 'fallback': {
      const header = `${result.hotels.length} deal(s) for ${result.stay.checkIn} to ${result.stay.checkOut} (${result.stay.nights} night(s), ${result.stay.priceRange})`;
      const lines = [header, ...result.hotels.slice(0, LISTED_OFFERS).map(describeHotel)];
      if (result.kind === 'fallback') {
        lines.push(`_${result.note}_`);
      }
      return lines.join('\n');
    }
  }
}

function flightStep(stage: FlightStage): string {
  switch (stage.kind) {
    case 'skipped':
      return `Flight search skipped: ${stage.reason}`;
    case 'live':
      return `Flight search completed via Amadeus API (${stage.flights.length} offer(s))`;
    case 'fallback':
      return `Flight search used sample data: ${stage.message}`;
    case 'rate_limited':
      return `Flight search rate limited: ${stage.message}`;
    case 'error':
      return `Flight search failed: ${stage.message}`;
  }
}

function hotelStep(result: HotelSearchResult): string {
  switch (result.kind) {
    case 'live':
      return `Hotel search completed via Booking.com API (${result.hotels.length} deal(s))`;
    case 'no_results':
    case 'no_filtered_results':
      return `Hotel search completed via Booking.com API: ${result.message}`;
    case 'fallback':
      return `Hotel search used sample data: ${result.note}`;
    case 'rate_limited':
      return `Hotel search rate limited: ${result.message}`;
    case 'error':
      return `Hotel search failed: ${result.message}`;
  }
}

function sourcesFor(flights: FlightStage, hotels: HotelSearchResult, generatedBy: Recommendation['generatedBy']): string[] {
  const sources: string[] = [];
  if (flights.kind === 'live') {
    sources.push('Amadeus Flight API');
  } else if (flights.kind === 'fallback') {
    sources.push('Sample flight data');
  }
  if (hotels.kind === 'live' || hotels.kind === 'no_results' || hotels.kind === 'no_filtered_results') {
    sources.push('Booking.com Hotel API');
  } else if (hotels.kind === 'fallback') {
    sources.push('Sample hotel data');
  }
  if (generatedBy === 'llm') {
    sources.push('Anthropic Claude AI');
  }
  return sources;
}

function cheapestFlight(stage: FlightStage): FlightOffer | undefined {
  if (stage.kind !== 'live' && stage.kind !== 'fallback') {
    return undefined;
  }
  let best: FlightOffer | undefined;
  for (const offer of stage.flights) {
    if (offer.price.total !== null && (best === undefined || best.price.total === null || offer.price.total < best.price.total)) {
      best = offer;
    }
  }
  return best;
}

function cheapestHotel(result: HotelSearchResult): HotelOffer | undefined {
  if (result.kind !== 'live' && result.kind !== 'fallback') {
    return undefined;
  }
  let best: HotelOffer | undefined;
  for (const hotel of result.hotels) {
    if (!best || hotel.totalPrice < best.totalPrice) {
      best = hotel;
    }
  }
  return best;
}

function budgetAnalysis(request: TripSearchRequest, flights: FlightStage, hotels: HotelSearchResult): string {
  const flight = cheapestFlight(flights);
  const hotel = cheapestHotel(hotels);
  const lines: string[] = [`- **Total budget**: ${formatBudget(request.budget)}`];
  if (flight && flight.price.total !== null) {
    lines.push(`- **Lowest flight fare**: ${flight.price.total.toFixed(2)} ${flight.price.currency}`);
  }
  if (hotel) {
    lines.push(`- **Lowest hotel stay**: ${hotel.totalPrice.toFixed(2)} ${hotel.currency}`);
  }
  const costs = [
    flight && flight.price.total !== null ? { amount: flight.price.total, currency: flight.price.currency } : undefined,
    hotel ? { amount: hotel.totalPrice, currency: hotel.currency } : undefined
  ].filter((cost): cost is { amount: number; currency: string } => cost !== undefined);
  if (costs.length > 0 && costs.every((cost) => cost.currency === 'USD')) {
    const spent = costs.reduce((sum, cost) => sum + cost.amount, 0);
    lines.push(`- **Left for activities and meals**: ${formatBudget(Math.max(request.budget - spent, 0))}`);
  }
  if (lines.length === 1) {
    lines.push('- No live pricing was available; plan with a margin for flights and lodging.');
  }
  return lines.join('\n');
}

/**
 * Deterministic Markdown itinerary built only from the search results.
 */
export function renderTemplate(request: TripSearchRequest, flights: FlightStage, hotels: HotelSearchResult): string {
  const sections = [
    `# Trip Recommendation for ${request.destination}`,
    [
      '## 🎯 Trip Overview',
      `- **Destination**: ${request.destination}`,
      `- **Dates**: ${tripDates(request)}`,
      `- **Budget**: ${formatBudget(request.budget)}`,
      `- **Travel Style**: ${titleCase(request.travelStyle)}`,
      `- **Interests**: ${interestsLine(request, 'General sightseeing')}`
    ].join('\n'),
    `## ✈️ Flight Options\n${describeFlights(flights)}`,
    `## 🏨 Hotel Options\n${describeHotels(hotels)}`,
    `## 💰 Budget Analysis\n${budgetAnalysis(request, flights, hotels)}`,
    `## 🎨 Activity Recommendations\nPersonalized suggestions based on your interests: ${interestsLine(request, 'general exploration')}`,
    [
      '## 📋 Travel Tips',
      '- Prices above are a snapshot; book soon for the best availability',
      '- Check for last-minute deals before you pay',
      ...(request.notes ? [`- Your notes: ${request.notes}`] : [])
    ].join('\n'),
    '## 🌟 Why This Plan Works\nEvery option above comes from the flight and hotel searches run for these exact dates, so the plan matches what is actually bookable.'
  ];
  return sections.join('\n\n');
}

export function buildPrompt(request: TripSearchRequest, flights: FlightStage, hotels: HotelSearchResult): string {
  return [
    'You are a professional travel agent creating a comprehensive trip recommendation.',
    '',
    'Trip Details:',
    `- Destination: ${request.destination}`,
    `- Dates: ${tripDates(request)}`,
    `- Budget: ${formatBudget(request.budget)}`,
    `- Travel Style: ${request.travelStyle}`,
    `- Interests: ${interestsLine(request, 'General sightseeing')}`,
    ...(request.notes ? [`- Traveler notes: ${request.notes}`] : []),
    '',
    `Flight Data:\n${describeFlights(flights)}`,
    '',
    `Hotel Data:\n${describeHotels(hotels)}`,
    '',
    'Create a comprehensive travel recommendation that includes:',
    '1. Trip overview with personalized insights',
    '2. Analysis of the flight options with specific recommendations',
    '3. Analysis of the hotel options with specific recommendations',
    '4. Detailed budget breakdown',
    '5. Personalized activity recommendations based on interests',
    '6. Practical travel tips',
    '7. Why this itinerary works well for the traveler',
    '',
    'Format with clear sections using emojis and markdown formatting.',
    'Be specific about prices, amenities, and practical details.'
  ].join('\n');
}

/**
 * Turns flight and hotel results into a Recommendation, through the Anthropic
 * Messages API when a key is configured and the fixed template otherwise.
 */
export class RecommendationComposer {
  private client: Anthropic | null;
  private model: string;
  private clock: () => Date;

  constructor(options: ComposerOptions = {}) {
    this.model = options.model ?? 'claude-3-haiku-20240307';
    this.clock = options.clock ?? (() => new Date());
    this.client = options.apiKey
      ? new Anthropic({
          apiKey: options.apiKey,
          baseURL: options.baseUrl ?? 'https://api.anthropic.com',
          timeout: options.timeoutMs ?? 60000,
          maxRetries: 0
        })
      : null;
  }

  get usesLlm(): boolean {
    return this.client !== null;
  }

  async compose(flights: FlightStage, hotels: HotelSearchResult, request: TripSearchRequest): Promise<Recommendation> {
    let body: string | null = null;
    if (this.client) {
      body = await this.askModel(this.client, buildPrompt(request, flights, hotels));
    }
    const generatedBy: Recommendation['generatedBy'] = body === null ? 'template' : 'llm';

    return {
      title: `🤖 AI-Powered Travel Plan for ${request.destination}`,
      destination: request.destination,
      dates: tripDates(request),
      budget: request.budget,
      interests: request.preferences,
      travelStyle: request.travelStyle,
      body: body ?? renderTemplate(request, flights, hotels),
      steps: [
        flightStep(flights),
        hotelStep(hotels),
        generatedBy === 'llm'
          ? 'Itinerary composed by Anthropic Claude AI'
          : 'Itinerary composed from the structured template'
      ],
      sources: sourcesFor(flights, hotels, generatedBy),
      generatedBy,
      generatedAt: this.clock().toISOString()
    };
  }

  /** The model's text, or null when the call fails or returns nothing usable. */
  private async askModel(client: Anthropic, prompt: string): Promise<string | null> {
    try {
      const message = await client.messages.create({
        model: this.model,
        max_tokens: MAX_TOKENS,
        messages: [{ role: 'user', content: prompt }]
      });
      const text = message.content.flatMap((block) => (block.type === 'text' ? [block.text] : [])).join('');
      if (text.trim() === '') {
        console.warn('⚠️ LLM returned no text, using template recommendation');
        return null;
      }
      return text;
    } catch (error) {
      console.warn(`⚠️ LLM recommendation failed, using template: ${errorMessage(error)}`);
      return null;
    }
  }
}
