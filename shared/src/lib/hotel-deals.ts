import { HotelOffer } from '../contracts/travel';

export const DISCOUNT_THRESHOLD = 10;
export const LONG_STAY_NIGHTS = 3;
export const LONG_STAY_POINTS_PER_NIGHT = 5;
export const LONG_STAY_BONUS_CAP = 20;
export const MAX_DEALS = 10;
export const MAX_AMENITIES = 5;

/**
 * A property as the hotel provider lists it, before any filtering.
 */
export interface RawProperty {
  id?: unknown;
  name?: unknown;
  price?: {
    current?: unknown;
    original?: unknown;
    currency?: unknown;
  };
  rating?: { value?: unknown };
  address?: { full?: unknown };
  amenities?: unknown;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export function discountPercentage(originalPrice: number, currentPrice: number): number {
  if (originalPrice <= 0) {
    return 0;
  }
  return round2(Math.max(0, ((originalPrice - currentPrice) / originalPrice) * 100));
}

export function longStayBonus(nights: number): number {
  if (nights <= LONG_STAY_NIGHTS) {
    return 0;
  }
  return Math.min(LONG_STAY_POINTS_PER_NIGHT * (nights - LONG_STAY_NIGHTS), LONG_STAY_BONUS_CAP);
}

export function isDeal(discount: number, bonus: number, nights: number): boolean {
  return discount > DISCOUNT_THRESHOLD || (nights > LONG_STAY_NIGHTS && bonus > 0);
}

function toPrice(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function toAmenities(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((item): item is string => typeof item === 'string').slice(0, MAX_AMENITIES);
}

/**
 * Turns one provider property into a deal, or null when it is priced out of
 * range, unparseable, or not a deal at all.
 */
export function toDeal(property: RawProperty, nights: number, priceMin: number, priceMax: number): HotelOffer | null {
  const current = toPrice(property.price?.current);
  if (current === null) {
    return null;
  }
  const originalRaw = property.price?.original;
  const original = originalRaw === undefined ? current : toPrice(originalRaw);
  if (original === null) {
    return null;
  }
  if (current < priceMin || current > priceMax) {
    return null;
  }

  const discount = discountPercentage(original, current);
  const bonus = longStayBonus(nights);
  if (!isDeal(discount, bonus, nights)) {
    return null;
  }

  const currency = property.price?.currency;
  const address = property.address?.full;
  return {
    hotelId: property.id === undefined || property.id === null ? '' : String(property.id),
    name: typeof property.name === 'string' ? property.name : 'Unknown Hotel',
    pricePerNight: current,
    totalPrice: round2(current * nights),
    originalPricePerNight: original,
    discountPercentage: discount,
    longStayBonus: bonus,
    dealScore: round2(discount + bonus),
    currency: typeof currency === 'string' ? currency : 'USD',
    rating: toPrice(property.rating?.value),
    address: typeof address === 'string' ? address : 'Address not available',
    amenities: toAmenities(property.amenities),
    promotion: {
      hasDiscount: discount > 0,
      discountAmount: round2(original - current),
      isLongStayDeal: nights > LONG_STAY_NIGHTS && bonus > 0
    }
  };
}

/**
 * Filters provider properties down to the best deals, highest score first.
 * Ties keep provider order.
 */
export function rankHotelDeals(properties: RawProperty[], nights: number, priceMin: number, priceMax: number): HotelOffer[] {
  const deals: HotelOffer[] = [];
  for (const property of properties) {
    const deal = toDeal(property, nights, priceMin, priceMax);
    if (deal) {
      deals.push(deal);
    }
  }
  return deals.sort((a, b) => b.dealScore - a.dealScore).slice(0, MAX_DEALS);
}
