import { describe, it, expect } from '@jest/globals';
import { discountPercentage, isDeal, longStayBonus, rankHotelDeals, toDeal, RawProperty } from './hotel-deals';
import { resolveDestinationId } from '../data/destination-ids';
import { addDays, nightsBetween, parseIsoDate } from './dates';

function property(id: string, current: number, original: number, extra: Partial<RawProperty> = {}): RawProperty {
  return { id, name: `Hotel ${id}`, price: { current, original, currency: 'USD' }, ...extra };
}

describe('hotel deal ranking', () => {
  it('should retain a discounted long stay with its combined score', () => {
    const deal = toDeal(property('a', 120, 150), 5, 0, 500);
    expect(deal).not.toBeNull();
    expect(deal?.discountPercentage).toBe(20);
    expect(deal?.longStayBonus).toBe(10);
    expect(deal?.dealScore).toBe(30);
    expect(deal?.totalPrice).toBe(600);
    expect(deal?.promotion).toEqual({ hasDiscount: true, discountAmount: 30, isLongStayDeal: true });
  });

  it('should reject a small discount on a short stay', () => {
    expect(discountPercentage(100, 95)).toBe(5);
    expect(longStayBonus(2)).toBe(0);
    expect(toDeal(property('b', 95, 100), 2, 0, 500)).toBeNull();
  });

  it('should need strictly more than a 10% discount on stays of three nights or fewer', () => {
    expect(discountPercentage(100, 90)).toBe(10);
    expect(toDeal(property('c', 90, 100), 2, 0, 500)).toBeNull();
    expect(toDeal(property('c', 90, 100), 3, 0, 500)).toBeNull();

    expect(discountPercentage(100, 89.99)).toBe(10.01);
    expect(toDeal(property('d', 89.99, 100), 3, 0, 500)?.dealScore).toBe(10.01);
  });

  it('should decide deals at the discount and stay boundaries', () => {
    expect(isDeal(10, 0, 3)).toBe(false);
    expect(isDeal(10.01, 0, 3)).toBe(true);
    expect(isDeal(0, 0, 4)).toBe(false);
    expect(isDeal(0, 5, 4)).toBe(true);
    expect(isDeal(0, 5, 3)).toBe(false);
  });

  it('should cap the long-stay bonus', () => {
    expect(longStayBonus(3)).toBe(0);
    expect(longStayBonus(4)).toBe(5);
    expect(longStayBonus(7)).toBe(20);
    expect(longStayBonus(30)).toBe(20);
  });

  it('should treat price rises and zero originals as no discount', () => {
    expect(discountPercentage(100, 120)).toBe(0);
    expect(discountPercentage(0, 50)).toBe(0);
    expect(discountPercentage(300, 200)).toBe(33.33);
  });

  it('should skip properties outside the price range or with unusable prices', () => {
    const ranked = rankHotelDeals(
      [
        property('cheap', 40, 80),
        property('pricey', 900, 1200),
        { id: 'broken', price: { current: 'n/a', original: 100 } },
        property('ok', 100, 150)
      ],
      2,
      50,
      500
    );
    expect(ranked.map((deal) => deal.hotelId)).toEqual(['ok']);
  });

  it('should sort by score descending and keep ten', () => {
    const properties = Array.from({ length: 14 }, (_, index) => property(String(index), 100 - index, 150));
    const ranked = rankHotelDeals(properties, 1, 0, 500);
    expect(ranked).toHaveLength(10);
    expect(ranked[0].hotelId).toBe('13');
    expect(ranked[9].hotelId).toBe('4');
  });

  it('should fill defaults for missing descriptive fields', () => {
    const deal = toDeal({ price: { current: 80 }, amenities: ['WiFi', 'Pool', 'Gym', 'Bar', 'Spa', 'Sauna', 7] }, 4, 0, 500);
    expect(deal).toMatchObject({
      hotelId: '',
      name: 'Unknown Hotel',
      originalPricePerNight: 80,
      discountPercentage: 0,
      dealScore: 5,
      currency: 'USD',
      rating: null,
      address: 'Address not available',
      amenities: ['WiFi', 'Pool', 'Gym', 'Bar', 'Spa']
    });
  });
});

describe('destination lookup', () => {
  it('should match codes exactly, case-insensitively', () => {
    expect(resolveDestinationId('cdg')).toBe('-1456928');
    expect(resolveDestinationId('ORD')).toBe('-2604890');
  });

  it('should fall back to a substring match, then Los Angeles', () => {
    expect(resolveDestinationId('NYC Downtown')).toBe('-2601889');
    expect(resolveDestinationId('Reykjavik')).toBe('-553173');
  });
});

describe('calendar dates', () => {
  it('should add days across month ends and count nights', () => {
    expect(addDays('2030-01-31', 1)).toBe('2030-02-01');
    expect(nightsBetween('2030-02-27', '2030-03-02')).toBe(3);
  });

  it('should reject impossible dates', () => {
    expect(parseIsoDate('2030-13-01')).toBeNull();
    expect(parseIsoDate('30-01-2030')).toBeNull();
  });
});
