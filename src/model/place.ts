export interface LatLng {
  lat: number;
  lng: number;
}

export interface Place {
  placeId: string | null;
  name: string | null;
  location: LatLng | null;
  rating: number | null;
  types: string[];
  formattedAddress: string | null;
  icon: string | null;
  reference: string | null;
}

export type PlacesSuccessStatus = 'OK' | 'ZERO_RESULTS';

export type PlacesFailureStatus = 'OVER_QUERY_LIMIT' | 'REQUEST_DENIED' | 'INVALID_REQUEST';

export interface PlacesSearchResult {
  status: PlacesSuccessStatus;
  requestUrl: string;
  places: Place[];
  htmlAttributions: string[];
  nextPageToken: string | null;
}

export interface PlacesSearchOptions {
  query?: string;
  latitude?: number | string;
  longitude?: number | string;
  location?: string;
  radius?: number;
  type?: string;
  language?: string;
  pageToken?: string;
}
