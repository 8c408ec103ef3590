/**
 * Best-effort matching of a free-form street and house number against the
 * building registry.
 */

import type { Building } from '../types';

/** Administrative and street-type words that never identify a street */
const STREET_STOPWORDS = new Set([
  'м',
  'місто',
  'львів',
  'обл',
  'область',
  'львівська',
  'україна',
  'р-н',
  'район',
  'вул',
  'вулиця',
  'просп',
  'проспект',
  'пр',
  'пл',
  'площа',
  'бул',
  'бульвар',
  'пров',
  'провулок',
  'street',
  'st',
  'avenue',
  'ave',
]);

const MAX_STREET_TOKENS = 2;

/**
 * Significant street tokens, lowercased, at most the first two.
 */
export function streetSearchTokens(streetName: string): string[] {
  return streetName
    .toLowerCase()
    .split(/[^\p{L}\p{N}'’ʼ-]+/u)
    .map((token) => token.replace(/^[-'’ʼ]+|[-'’ʼ]+$/g, ''))
    .filter((token) => token.length >= 2 && !STREET_STOPWORDS.has(token))
    .slice(0, MAX_STREET_TOKENS);
}

/** "Буд. 12 А" -> "12а" */
export function normalizeHouseNumber(houseNumber: string): string {
  return houseNumber
    .toLowerCase()
    .replace(/^\s*(?:буд\.?|б\.)\s*/u, '')
    .replace(/\s+/g, '');
}

function leadingDigits(normalized: string): string {
  const match = normalized.match(/^\d+/);
  return match ? match[0] : '';
}

/**
 * Pick the building for a house number among street candidates ordered by id:
 * exact normalized match first, then a match on the numeric part ("12А" ~ "12").
 */
export function matchBuilding(candidates: readonly Building[], houseNumber: string): Building | null {
  const wanted = normalizeHouseNumber(houseNumber);
  if (wanted.length === 0) {
    return null;
  }

  const exact = candidates.find((building) => normalizeHouseNumber(building.house_number) === wanted);
  if (exact) {
    return exact;
  }

  const digits = leadingDigits(wanted);
  if (digits.length === 0) {
    return null;
  }
  return candidates.find((building) => leadingDigits(normalizeHouseNumber(building.house_number)) === digits) ?? null;
}

/**
 * Feminine form used in district administration names: "Залізничний" -> "Залізнична".
 */
export function normalizeDistrictName(district: string): string {
  const trimmed = district.trim();
  return trimmed.endsWith('ий') ? `${trimmed.slice(0, -2)}а` : trimmed;
}
