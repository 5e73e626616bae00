export { DEFAULT_CONFIG_FILE, loadConfig, parseConfig } from './config/config';
export type { AppConfig, DatabaseConfig, PlacesConfig } from './config/config';
export { ContactStore } from './db/contactStore';
export type { ClientFactory, DbClient } from './db/contactStore';
export { SQL, buildSearchQuery, compile, escapeLike } from './db/queryBuilder';
export type { SqlStatement } from './db/queryBuilder';
export {
  ConfigurationError,
  ContactManagerError,
  ExternalServiceError,
  StorageError,
  ValidationError,
} from './lib/errors';
export type { Contact, ContactInput, ContactSummary, RawContactInput, SearchCriteria } from './model/contact';
export type { Place, PlacesSearchOptions, PlacesSearchResult } from './model/place';
export { prefillDirection, suggestDirection } from './places/addressLookup';
export { MAX_RADIUS, PlacesClient } from './places/placesClient';
export type { PlacesHttpClient } from './places/placesClient';
export { checkField, validateContact } from './validation/contactValidator';
export type { ValidationResult } from './validation/contactValidator';
export { createApp } from './app';
