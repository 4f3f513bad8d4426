import { describe, it, expect, beforeAll, afterAll, beforeEach } from '@jest/globals';
import express from 'express';
import { FlightOffer, HotelOffer, HotelSearchResult, TripSearchRequest } from '@tripplanner/shared';
import { FlightStage, RecommendationComposer, describeFlights, renderTemplate } from '../services/recommendationComposer';
import { startStub, StubServer } from '../../../../tests/support/stub-server';

const GENERATED_AT = new Date('2030-06-15T12:00:00Z');

const request: TripSearchRequest = {
  destination: 'Lisbon',
  departureDate: '2030-07-01',
  adults: 1,
  children: 0,
  infants: 0,
  travelStyle: 'comfort',
  flightCurrency: 'USD',
  hotelNights: 3,
  hotelAdults: 2,
  hotelRooms: 1,
  hotelChildren: 0,
  hotelCurrency: 'USD',
  hotelPriceMin: 0,
  hotelPriceMax: 500,
  hotelSort: 'price',
  hotelLocale: 'en-gb',
  budget: 3000,
  preferences: ['museums', 'food'],
  notes: ''
};

const harbourView: HotelOffer = {
  hotelId: 'h-1',
  name: 'Harbour View',
  pricePerNight: 120,
  totalPrice: 360,
  originalPricePerNight: 150,
  discountPercentage: 20,
  longStayBonus: 0,
  dealScore: 20,
  currency: 'USD',
  rating: 8.7,
  address: 'Rua Augusta 1',
  amenities: [],
  promotion: { hasDiscount: true, discountAmount: 30, isLongStayDeal: false }
};

const hotels: HotelSearchResult = {
  kind: 'live',
  stay: { destination: 'Lisbon', checkIn: '2030-07-01', checkOut: '2030-07-04', nights: 3, priceRange: '$0-$500' },
  hotels: [harbourView],
  filtersApplied: []
};

const skipped = { kind: 'skipped', reason: 'no origin airport was given' } as const;

describe('RecommendationComposer', () => {
  describe('template', () => {
    it('should render every section from the search results', () => {
      const body = renderTemplate(request, skipped, hotels);

      expect(body.startsWith('# Trip Recommendation for Lisbon\n\n## 🎯 Trip Overview\n')).toBe(true);
      expect(body).toContain('- **Dates**: 2030-07-01 (one-way)');
      expect(body).toContain('- **Travel Style**: Comfort');
      expect(body).toContain('- **Interests**: museums, food');
      expect(body).toContain('## ✈️ Flight Options\nFlight search skipped: no origin airport was given');
      expect(body).toContain(
        '## 🏨 Hotel Options\n1 deal(s) for 2030-07-01 to 2030-07-04 (3 night(s), $0-$500)\n' +
          '- Harbour View: 120.00 USD/night (20% off, 360.00 total), rated 8.7, Rua Augusta 1'
      );
      expect(body).toContain(
        '## 💰 Budget Analysis\n- **Total budget**: $3,000\n- **Lowest hotel stay**: 360.00 USD\n- **Left for activities and meals**: $2,640'
      );
      expect(body).toContain('## 🌟 Why This Plan Works');
    });

    it('should budget with the cheapest priced flight and skip unpriced ones', () => {
      const offer = (id: string, total: number | null): FlightOffer => ({
        id,
        price: { total, base: total, currency: 'USD', fees: [] },
        itineraries: []
      });
      const flights: FlightStage = {
        kind: 'live',
        message: 'Found 3 flight(s)',
        flights: [offer('f-1', null), offer('f-2', 450), offer('f-3', 300)]
      };

      expect(renderTemplate(request, flights, hotels)).toContain(
        '## 💰 Budget Analysis\n- **Total budget**: $3,000\n- **Lowest flight fare**: 300.00 USD\n' +
          '- **Lowest hotel stay**: 360.00 USD\n- **Left for activities and meals**: $2,340'
      );
    });

    it('should add traveler notes to the tips', () => {
      expect(renderTemplate({ ...request, notes: 'Vegetarian' }, skipped, hotels)).toContain('- Your notes: Vegetarian');
    });

    it('should compose without a key', async () => {
      const composer = new RecommendationComposer({ clock: () => GENERATED_AT });
      const recommendation = await composer.compose(skipped, hotels, request);

      expect(composer.usesLlm).toBe(false);
      expect(recommendation).toEqual({
        title: '🤖 AI-Powered Travel Plan for Lisbon',
        destination: 'Lisbon',
        dates: '2030-07-01 (one-way)',
        budget: 3000,
        interests: ['museums', 'food'],
        travelStyle: 'comfort',
        body: renderTemplate(request, skipped, hotels),
        steps: [
          'Flight search skipped: no origin airport was given',
          'Hotel search completed via Booking.com API (1 deal(s))',
          'Itinerary composed from the structured template'
        ],
        sources: ['Booking.com Hotel API'],
        generatedBy: 'template',
        generatedAt: '2030-06-15T12:00:00.000Z'
      });
    });
  });

  describe('describeFlights', () => {
    it('should pass provider messages through', () => {
      expect(describeFlights({ kind: 'rate_limited', message: 'Rate limit exceeded. Please try again later.' })).toBe(
        'Rate limit exceeded. Please try again later.'
      );
    });

    it('should label sample offers', () => {
      const text = describeFlights({ kind: 'fallback', message: 'Using sample flights', flights: [], note: 'Sample data' });
      expect(text).toBe('Using sample flights\n_Sample data_');
    });
  });

  describe('LLM', () => {
    const anthropic: { status: number; headers: Record<string, string | undefined>; body?: unknown; reply: unknown } = {
      status: 200,
      headers: {},
      reply: {}
    };
    let provider: StubServer;

    beforeAll(async () => {
      const app = express();
      app.use(express.json());
      app.post('/v1/messages', (req, res) => {
        anthropic.headers = {
          apiKey: req.header('x-api-key'),
          version: req.header('anthropic-version')
        };
        anthropic.body = req.body;
        res.status(anthropic.status).json(anthropic.reply);
      });
      provider = await startStub(app);
    });

    afterAll(async () => {
      await provider.close();
    });

    beforeEach(() => {
      anthropic.status = 200;
      anthropic.reply = { content: [{ type: 'text', text: '## 🎯 Lisbon in three days' }] };
    });

    function composer(): RecommendationComposer {
      return new RecommendationComposer({ apiKey: 'test-key', baseUrl: provider.baseUrl, clock: () => GENERATED_AT });
    }

    it('should send one Messages API request and keep the text verbatim', async () => {
      const recommendation = await composer().compose(skipped, hotels, request);

      expect(anthropic.headers).toEqual({ apiKey: 'test-key', version: '2023-06-01' });
      expect(anthropic.body).toMatchObject({
        model: 'claude-3-haiku-20240307',
        max_tokens: 2000,
        messages: [{ role: 'user', content: expect.stringContaining('- Destination: Lisbon') }]
      });
      expect(recommendation.body).toBe('## 🎯 Lisbon in three days');
      expect(recommendation.generatedBy).toBe('llm');
      expect(recommendation.sources).toEqual(['Booking.com Hotel API', 'Anthropic Claude AI']);
      expect(recommendation.steps[2]).toBe('Itinerary composed by Anthropic Claude AI');
    });

    it('should fall back to the template when the call fails', async () => {
      anthropic.status = 500;
      anthropic.reply = { error: { type: 'api_error' } };
      const recommendation = await composer().compose(skipped, hotels, request);

      expect(recommendation.generatedBy).toBe('template');
      expect(recommendation.body).toBe(renderTemplate(request, skipped, hotels));
    });

    it('should fall back to the template when no text comes back', async () => {
      anthropic.reply = { content: [] };
      const recommendation = await composer().compose(skipped, hotels, request);
      expect(recommendation.generatedBy).toBe('template');
    });
  });
});
