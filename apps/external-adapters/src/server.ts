/**
 * External API Service - exposes the flight and hotel adapters over HTTP
 */

import express, { NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import {
  ApiResponse,
  AppError,
  ErrorCodes,
  FieldErrors,
  FlightSearchParams,
  HOTEL_LOCALES,
  HOTEL_SORT_KEYS,
  HotelSearchParams,
  SUPPORTED_CURRENCIES,
  generateTraceId,
  isFormInput,
  readChoice,
  readInteger,
  readList,
  readNumber,
  readString
} from '@tripplanner/shared';
import { AmadeusAdapter } from './amadeus';
import { BookingComAdapter } from './bookingCom';

function traceIdOf(res: Response): string {
  const traceId: unknown = res.locals.traceId;
  return typeof traceId === 'string' ? traceId : '';
}

function parseFlightBody(body: unknown): FlightSearchParams {
  const input = isFormInput(body) ? body : {};
  const errors = new FieldErrors();
  const origin = readString(input, 'origin') ?? '';
  const destination = readString(input, 'destination') ?? '';
  const departureDate = readString(input, 'departureDate', 'departure_date') ?? '';
  if (origin === '') errors.add('origin', 'Origin airport code is required');
  if (destination === '') errors.add('destination', 'Destination airport code is required');
  if (departureDate === '') errors.add('departureDate', 'Departure date is required');

  const params: FlightSearchParams = {
    origin,
    destination,
    departureDate,
    returnDate: readString(input, 'returnDate', 'return_date'),
    adults: readInteger(input, errors, 'adults', { min: 1, max: 9 }, 1),
    children: readInteger(input, errors, 'children', { min: 0, max: 9 }, 0),
    infants: readInteger(input, errors, 'infants', { min: 0, max: 9 }, 0),
    maxStops: readInteger(input, errors, 'maxStops', { min: 0, max: 3 }, undefined, 'max_stops'),
    excludedAirlineCodes: readList(input, 'excludedAirlineCodes'),
    currency: readChoice(input, errors, 'currency', SUPPORTED_CURRENCIES, 'USD', (raw) => raw.toUpperCase())
  };
  errors.throwIfAny();
  return params;
}

function parseHotelBody(body: unknown): HotelSearchParams {
  const input = isFormInput(body) ? body : {};
  const errors = new FieldErrors();
  const destination = readString(input, 'destination') ?? '';
  const checkIn = readString(input, 'checkIn', 'check_in_date') ?? '';
  const checkOut = readString(input, 'checkOut', 'check_out_date') ?? '';
  if (destination === '') errors.add('destination', 'Destination is required');
  if (checkIn === '') errors.add('checkIn', 'Check-in date is required');
  if (checkOut === '') errors.add('checkOut', 'Check-out date is required');

  const params: HotelSearchParams = {
    destination,
    checkIn,
    checkOut,
    adults: readInteger(input, errors, 'adults', { min: 1, max: 8 }, 2),
    children: readInteger(input, errors, 'children', { min: 0, max: 4 }, 0),
    rooms: readInteger(input, errors, 'rooms', { min: 1, max: 5 }, 1),
    currency: readChoice(input, errors, 'currency', SUPPORTED_CURRENCIES, 'USD', (raw) => raw.toUpperCase()),
    priceMin: readNumber(input, errors, 'priceMin', { min: 0, max: 1000 }, 0),
    priceMax: readNumber(input, errors, 'priceMax', { min: 0, max: 2000 }, 500),
    sortBy: readChoice(input, errors, 'sortBy', HOTEL_SORT_KEYS, 'price', (raw) => raw.toLowerCase()),
    locale: readChoice(input, errors, 'locale', HOTEL_LOCALES, 'en-gb', (raw) => raw.toLowerCase())
  };
  errors.throwIfAny();
  return params;
}

export class ExternalAPIService {
  public app: express.Application;
  private amadeus: AmadeusAdapter;
  private booking: BookingComAdapter;
  private port: number;

  constructor(amadeus: AmadeusAdapter = new AmadeusAdapter(), booking: BookingComAdapter = new BookingComAdapter()) {
    this.app = express();
    this.amadeus = amadeus;
    this.booking = booking;
    this.port = Number(process.env.EXTERNAL_ADAPTERS_PORT ?? 8010);
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware() {
    this.app.use(helmet());
    this.app.use(cors());
    this.app.use(express.json());
    this.app.use(express.urlencoded({ extended: true }));

    // Request tracing
    this.app.use((req, res, next) => {
      const traceId = req.header('x-trace-id') || generateTraceId();
      res.locals.traceId = traceId;
      res.setHeader('X-Trace-Id', traceId);
      next();
    });
  }

  private setupRoutes() {
    // Health check
    this.app.get('/health', (req, res) => {
      res.json({
        status: 'healthy',
        timestamp: new Date().toISOString(),
        service: 'external-adapters',
        adapters: {
          amadeus: this.amadeus.isConfigured ? 'configured' : 'sample-data',
          booking: this.booking.isConfigured ? 'configured' : 'sample-data'
        }
      });
    });

    this.app.post('/flights/search', this.searchFlights.bind(this));
    this.app.post('/hotels/search', this.searchHotels.bind(this));

    // 404 handler
    this.app.use((req, res) => {
      const response: ApiResponse = {
        success: false,
        error: { code: ErrorCodes.NOT_FOUND, message: 'Endpoint not found' },
        traceId: traceIdOf(res)
      };
      res.status(404).json(response);
    });

    // Error handling middleware
    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      const traceId = traceIdOf(res);
      if (err instanceof AppError) {
        const response: ApiResponse = {
          success: false,
          error: { code: err.code, message: err.message, details: err.details },
          traceId
        };
        res.status(err.statusCode).json(response);
        return;
      }
      console.error('External API Service error:', err);
      const response: ApiResponse = {
        success: false,
        error: { code: ErrorCodes.INTERNAL_ERROR, message: 'Internal server error in external API service' },
        traceId
      };
      res.status(500).json(response);
    });
  }

  private async searchFlights(req: Request, res: Response, next: NextFunction) {
    try {
      const result = await this.amadeus.search(parseFlightBody(req.body));
      const response: ApiResponse = { success: true, data: result, traceId: traceIdOf(res) };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }

  private async searchHotels(req: Request, res: Response, next: NextFunction) {
    try {
      const result = await this.booking.search(parseHotelBody(req.body));
      const response: ApiResponse = { success: true, data: result, traceId: traceIdOf(res) };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }

  public start() {
    this.app.listen(this.port, () => {
      console.log(`🚀 External API Service listening on port ${this.port}`);
      console.log(`📍 Health check: http://localhost:${this.port}/health`);
      console.log('📡 Amadeus adapter:', this.amadeus.isConfigured ? '✅ Active' : '⚠️ Sample data');
      console.log('🏨 Booking.com adapter:', this.booking.isConfigured ? '✅ Active' : '⚠️ Sample data');
    });
  }
}
