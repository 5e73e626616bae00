import placeLanguages from '../data/place-languages.json';
import placeTypes from '../data/place-types.json';

export const SUPPORTED_PLACE_TYPES: ReadonlySet<string> = new Set(placeTypes);

export const SUPPORTED_LANGUAGES: ReadonlySet<string> = new Set(placeLanguages);

export function isSupportedPlaceType(type: string | undefined): type is string {
  return type !== undefined && SUPPORTED_PLACE_TYPES.has(type);
}

export function isSupportedLanguage(language: string | undefined): language is string {
  return language !== undefined && SUPPORTED_LANGUAGES.has(language);
}
