// Contracts
export { ApiResponse, ErrorCodes, HealthCheck, generateTraceId } from './contracts/common';
export {
  User,
  PublicUser,
  CreateUserRequest,
  RegisterRequest,
  TokenType,
  TokenClaims,
  TokenPair,
  UserPayload,
  TokenPayload,
  toUserPayload,
  toTokenPayload
} from './contracts/user';
export {
  CurrencyCode,
  SUPPORTED_CURRENCIES,
  TravelClass,
  FlightSearchParams,
  FlightEndpoint,
  FlightSegment,
  FlightItinerary,
  FlightFee,
  FlightOffer,
  FlightSearchResult,
  HotelSortKey,
  HOTEL_SORT_KEYS,
  HOTEL_LOCALES,
  HotelSearchParams,
  HotelOffer,
  HotelStay,
  HotelSearchResult
} from './contracts/travel';
export {
  SearchStatus,
  TravelStyle,
  TRAVEL_STYLES,
  TripSearchRequest,
  Recommendation,
  SearchRecord,
  SearchAcceptedPayload,
  RecommendationPayload,
  SearchStatusPayload,
  SearchSummaryPayload,
  toRecommendationPayload,
  toSearchStatusPayload,
  toSearchSummaryPayload
} from './contracts/search';

// Errors
export {
  AppError,
  ValidationError,
  BadRequestError,
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  ConflictError,
  UpstreamError,
  UnavailableError,
  errorMessage
} from './errors';

// Validators
export {
  validateEmail,
  validateUsername,
  validatePassword,
  FormInput,
  isFormInput,
  FieldErrors,
  readString,
  readInteger,
  readNumber,
  readChoice,
  readList
} from './validators/common';
export { validateFlightSearch, normalizeAirportCode } from './validators/flight.validator';
export { validateHotelStay } from './validators/hotel.validator';
export { validateTripSearch } from './validators/search.validator';

// Helpers
export { parseIsoDate, formatIsoDate, addDays, nightsBetween, todayIso } from './lib/dates';
export { RawProperty, discountPercentage, longStayBonus, isDeal, toDeal, rankHotelDeals } from './lib/hotel-deals';
export { DESTINATION_IDS, DEFAULT_DESTINATION_ID, resolveDestinationId } from './data/destination-ids';
