/**
 * Citizen Address Parsing
 *
 * Splits a free-form Ukrainian (or transliterated) address into street, house
 * number and apartment. Best effort: whatever cannot be recognized stays in
 * the street part.
 */

export interface ParsedAddress {
  street: string;
  building: string;
  apartment: string | null;
}

const STREET_TYPE = /^(?:вул\.?|вулиця|просп\.?|проспект|пр\.?|пр-т|пл\.?|площа|бул\.?|бульвар|пров\.?|провулок|street|st\.?|avenue|ave\.?)$/iu;

/** Words that mark a whole segment as region, district or country */
const REGION_MARKER = /^(?:обл\.?|область|р-н|район|україна|ukraine)$/iu;

const CITY_MARKER = /^(?:м\.|місто)$/iu;
const CITY_NAME = /^(?:львів|lviv)$/iu;

const BUILDING_MARKER = /^(?:буд\.?|будинок|б\.)$/iu;
const APARTMENT_MARKER = /^(?:кв\.?|квартира|apt\.?)$/iu;

/** 45, 12А, 7/2, 7а/2 */
const HOUSE_NUMBER = /^\d+\p{L}?(?:\/\d+\p{L}?)?$/u;

function stripTrailingPunctuation(token: string): string {
  return token.replace(/[.;:]+$/u, '');
}

function normalizeSpacing(address: string): string {
  return address
    .replace(/(\p{L})\.(?=\p{L})/gu, '$1. ')
    .replace(/(?<!\p{L})(кв|буд|б|apt)\.(?=\d)/giu, '$1. ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function parseAddress(address: string | null | undefined): ParsedAddress {
  const result: ParsedAddress = { street: '', building: '', apartment: null };
  const text = normalizeSpacing(address ?? '');
  if (text.length === 0) {
    return result;
  }

  const segments = text
    .split(',')
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);

  for (const segment of segments) {
    const tokens = segment.split(' ');
    if (tokens.some((token) => REGION_MARKER.test(token))) {
      continue;
    }

    const words: string[] = [];
    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      const next = i + 1 < tokens.length ? stripTrailingPunctuation(tokens[i + 1]) : undefined;

      if (CITY_MARKER.test(token)) {
        i++;
        continue;
      }
      if (CITY_NAME.test(token) || STREET_TYPE.test(token)) {
        continue;
      }
      if (APARTMENT_MARKER.test(token)) {
        if (next !== undefined) {
          result.apartment = next;
          i++;
        }
        continue;
      }
      if (BUILDING_MARKER.test(token)) {
        if (next !== undefined && HOUSE_NUMBER.test(next)) {
          result.building = result.building || next;
          i++;
        }
        continue;
      }

      const bare = stripTrailingPunctuation(token);
      // A number counts as the house once a street is known; "1 Листопада" stays a street name
      if (HOUSE_NUMBER.test(bare) && (result.street.length > 0 || words.length > 0)) {
        result.building = result.building || bare;
        continue;
      }

      words.push(token);
    }

    if (words.length > 0 && result.street.length === 0) {
      result.street = words.join(' ');
    }
  }

  return result;
}
