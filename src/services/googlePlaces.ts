import axios, { AxiosInstance } from 'axios';

const PLACES_BASE = 'https://places.googleapis.com/v1';

export interface PlacesReview {
  name?: string;
  relativePublishTimeDescription?: string;
  text?: { text?: string; languageCode?: string };
  rating?: number;
  originalText?: { text?: string; languageCode?: string };
  authorAttribution?: { displayName?: string; uri?: string; photoUri?: string };
  publishTime?: string;
}

export interface PlacesPlaceDetails {
  id?: string;
  displayName?: { text?: string; languageCode?: string };
  formattedAddress?: string;
  rating?: number;
  userRatingCount?: number;
  reviews?: PlacesReview[];
}

interface SearchTextResponse {
  places?: PlacesPlaceDetails[];
}

export class PlacesClient {
  constructor(
    private readonly apiKey: string,
    private readonly http: AxiosInstance = axios.create({ baseURL: PLACES_BASE, timeout: 20_000 })
  ) {}

  isConfigured(): boolean {
    return !!this.apiKey.trim();
  }

  private headers(fieldMask: string) {
    if (!this.isConfigured()) {
      throw new Error('GOOGLE_PLACES_API_KEY is not configured');
    }
    return {
      'X-Goog-Api-Key': this.apiKey.trim(),
      'X-Goog-FieldMask': fieldMask,
      'Content-Type': 'application/json',
    };
  }

  /**
   * Text Search, used to resolve a restaurant name to a place.
   * See: Places API v1: /places:searchText
   */
  async searchText(textQuery: string, maxResultCount = 1): Promise<PlacesPlaceDetails[]> {
    const query = textQuery.trim();
    if (!query) throw new Error('textQuery is required');
    const res = await this.http.post<SearchTextResponse>(
      '/places:searchText',
      { textQuery: query, maxResultCount: Math.max(1, Math.min(20, maxResultCount)), includedType: 'restaurant' },
      { headers: this.headers('places.id,places.displayName,places.formattedAddress') }
    );
    return res.data.places || [];
  }

  /** Place details with reviews. Field masks keep the call cheap. */
  async getPlaceDetails(placeId: string): Promise<PlacesPlaceDetails> {
    const id = placeId.trim();
    if (!id) throw new Error('placeId is required');
    const res = await this.http.get<PlacesPlaceDetails>(`/places/${encodeURIComponent(id)}`, {
      headers: this.headers('id,displayName,rating,userRatingCount,reviews'),
    });
    return res.data;
  }
}
