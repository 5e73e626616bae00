import { errorMessage } from '../lib/errors';
import logger from '../lib/logger';
import { RawContactInput } from '../model/contact';
import { PlacesSearchOptions } from '../model/place';
import { FIELD_RULES, readRawField } from '../validation/contactValidator';
import { PlacesClient } from './placesClient';

const MAX_DIRECTION_LENGTH = FIELD_RULES.direction.maxLength;

/**
 * Looks up `query` and returns the formatted address of the best match,
 * cut to fit the Direction column. Lookup failures are logged and yield null.
 */
export async function suggestDirection(
  places: PlacesClient,
  query: string,
  options: Omit<PlacesSearchOptions, 'query'> = {}
): Promise<string | null> {
  try {
    const result = await places.search({ ...options, query });
    const address = result.places.find((place) => place.formattedAddress)?.formattedAddress;
    return address ? address.slice(0, MAX_DIRECTION_LENGTH) : null;
  } catch (error) {
    logger.warn('[AddressLookup] Unable to suggest a direction', { query, error: errorMessage(error) });
    return null;
  }
}

export async function prefillDirection(
  input: RawContactInput,
  places: PlacesClient,
  query: string
): Promise<RawContactInput> {
  const current = readRawField(input, 'direction');
  if (typeof current === 'string' && current.trim() !== '') {
    return input;
  }

  const direction = await suggestDirection(places, query);
  if (direction === null) {
    return input;
  }
  return { ...input, Direction: direction };
}
