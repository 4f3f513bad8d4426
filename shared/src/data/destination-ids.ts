/**
 * Airport and city codes mapped to Booking.com destination ids.
 * LHR shares the New York id upstream; kept as-is.
 */
export const DESTINATION_IDS: Readonly<Record<string, string>> = {
  LAX: '-553173', // Los Angeles
  NYC: '-2601889', // New York City
  JFK: '-2601889',
  LGA: '-2601889',
  EWR: '-2601889',
  LHR: '-2601889',
  CDG: '-1456928', // Paris
  NRT: '-246227', // Tokyo
  DXB: '-782831', // Dubai
  SYD: '-1603135', // Sydney
  CHI: '-2604890', // Chicago
  ORD: '-2604890',
  MIA: '-1781081', // Miami
  LAS: '-23768' // Las Vegas
};

export const DEFAULT_DESTINATION_ID = DESTINATION_IDS.LAX;

/**
 * Exact match first, then a substring match in either direction, else Los Angeles.
 */
export function resolveDestinationId(destination: string): string {
  const key = destination.trim().toUpperCase();
  const exact = DESTINATION_IDS[key];
  if (exact !== undefined) {
    return exact;
  }
  for (const [code, id] of Object.entries(DESTINATION_IDS)) {
    if (key !== '' && (key.includes(code) || code.includes(key))) {
      return id;
    }
  }
  return DEFAULT_DESTINATION_ID;
}
