/**
 * Display formatting shared by price checks, notifications and the API.
 */

import type { LocationRow } from '../types/database.js';

const wholeNumber = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** 12_500_000 → "13 M ISK" */
export function formatMillionIsk(isk: number): string {
  return `${wholeNumber.format(isk / 1_000_000)} M ISK`;
}

/** 12_500 → "13 K m3" */
export function formatThousandM3(m3: number): string {
  return `${wholeNumber.format(m3 / 1000)} K m3`;
}

/** Station and structure names start with their solar system. */
export function solarSystemName(location: Pick<LocationRow, 'name'>): string {
  return location.name.split(' ', 1)[0] ?? location.name;
}

export function routeName(
  start: Pick<LocationRow, 'name'> | null | undefined,
  end: Pick<LocationRow, 'name'> | null | undefined
): string {
  const from = start ? solarSystemName(start) : '?';
  const to = end ? solarSystemName(end) : '?';
  return `${from} - ${to}`;
}
