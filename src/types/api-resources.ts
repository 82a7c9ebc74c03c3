// Request payloads for the Feature.fm marketing endpoints (camelCase on the wire)

export interface StoreLink {
  storeId: string;
  url: string;
}

export interface ArtistPayload {
  artistName: string;
  type: "artist" | "band";
  countryCode: string;
  shortBio?: string;
  artistImage?: string;
  websiteUrl?: string;
  spotifyArtistUrl?: string;
  tags?: string[];
}

export interface SmartLinkPayload {
  artistId: string;
  shortId: string;
  domain: string;
  title: string;
  image?: string;
  description?: string;
  stores: StoreLink[];
}

export interface PreSaveFollow {
  storeId: string;
  entities: Array<{ url: string }>;
}

export interface PreSavePayload {
  artistId: string;
  releaseDate: string;
  timezone: string;
  shortId: string;
  domain: string;
  title: string;
  image?: string;
  stores: StoreLink[];
  preSaveFollow?: PreSaveFollow[];
}

export interface ActionPageAction {
  type: string;
  points: number;
  label: string;
  url?: string;
}

export interface ActionPagePayload {
  title: string;
  artistName: string;
  artistId?: string;
  description: string;
  actions: ActionPageAction[];
  rewards: Array<{ pointsRequired: number; title: string; description: string }>;
  theme: { primaryColor: string; backgroundColor: string };
}

export interface ReleasePayload {
  title: string;
  artistName: string;
  artistId?: string;
  type: "single" | "ep" | "album";
  releaseDate: string;
  label: string;
  upc: string;
  tracks: Array<{ title: string; duration: number; isrc: string }>;
  platforms: Record<string, string>;
  artworkUrl: string;
}

export interface WebhookPayload {
  url: string;
  events: string[];
  active: boolean;
  description: string;
}
