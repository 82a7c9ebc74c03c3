import type {
  ActionPagePayload,
  ArtistPayload,
  PreSavePayload,
  ReleasePayload,
  SmartLinkPayload,
  WebhookPayload,
} from "../types";
import { formatFileTimestamp } from "../recorder/result-recorder";

const PLACEHOLDER_IMAGE = "https://via.placeholder.com/500";
const SHORT_LINK_DOMAIN = "https://ffm.to";

const DAY_MS = 24 * 60 * 60 * 1000;

function unixSeconds(now: Date): number {
  return Math.floor(now.getTime() / 1000);
}

/** YYYY-MM-DD, local time */
export function isoDay(date: Date): string {
  const pad = (value: number) => value.toString().padStart(2, "0");
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

export function buildArtistPayload(now: Date, label: string = "Sandbox Test Artist"): ArtistPayload {
  return {
    artistName: `${label} ${formatFileTimestamp(now)}`,
    type: "artist",
    countryCode: "US",
    shortBio: "Created by automated sandbox test suite",
    artistImage: PLACEHOLDER_IMAGE,
    tags: ["test", "sandbox", "automated"],
  };
}

export function buildSmartLinkPayload(artistId: string, now: Date): SmartLinkPayload {
  const stamp = unixSeconds(now);
  return {
    artistId,
    shortId: `test-${stamp}`,
    domain: SHORT_LINK_DOMAIN,
    title: `Sandbox Test Link ${stamp}`,
    image: PLACEHOLDER_IMAGE,
    description: "Test smartlink created by automated sandbox tests",
    stores: [
      { storeId: "spotify", url: "https://open.spotify.com/track/sandbox-test" },
      { storeId: "apple", url: "https://music.apple.com/us/album/sandbox-test/1" },
    ],
  };
}

export function buildPreSavePayload(artistId: string, now: Date): PreSavePayload {
  return {
    artistId,
    releaseDate: isoDay(addDays(now, 30)),
    timezone: "America/New_York",
    shortId: `presave-${unixSeconds(now)}`,
    domain: SHORT_LINK_DOMAIN,
    title: `Sandbox Pre-Save ${isoDay(now).replace(/-/g, "")}`,
    image: PLACEHOLDER_IMAGE,
    stores: [
      { storeId: "spotify", url: "https://open.spotify.com/album/sandbox-test" },
    ],
    preSaveFollow: [
      {
        storeId: "spotify",
        entities: [{ url: "https://open.spotify.com/artist/sandbox-test" }],
      },
    ],
  };
}

export function buildActionPagePayload(
  artistName: string,
  artistId?: string
): ActionPagePayload {
  return {
    title: "Fan Engagement Hub",
    artistName,
    ...(artistId ? { artistId } : {}),
    description: "Complete actions to earn rewards!",
    actions: [
      {
        type: "spotify_follow",
        points: 10,
        label: "Follow on Spotify",
        url: "https://open.spotify.com/artist/sandbox-test",
      },
      {
        type: "youtube_subscribe",
        points: 15,
        label: "Subscribe on YouTube",
        url: "https://youtube.com/c/sandbox-test",
      },
      { type: "email_signup", points: 20, label: "Join mailing list" },
    ],
    rewards: [
      {
        pointsRequired: 30,
        title: "Exclusive Track Download",
        description: "Get an unreleased track",
      },
    ],
    theme: { primaryColor: "#FF6B6B", backgroundColor: "#1A1A2E" },
  };
}

export function buildReleasePayload(
  artistName: string,
  now: Date,
  artistId?: string
): ReleasePayload {
  const stamp = unixSeconds(now);
  return {
    title: `Test Album ${isoDay(now).replace(/-/g, "")}`,
    artistName,
    ...(artistId ? { artistId } : {}),
    type: "album",
    releaseDate: isoDay(addDays(now, 14)),
    label: "Test Records",
    upc: `TEST${stamp}`,
    tracks: [
      { title: "Track 1", duration: 180, isrc: `TEST${stamp}01` },
      { title: "Track 2", duration: 210, isrc: `TEST${stamp}02` },
    ],
    platforms: {
      spotify: "https://open.spotify.com/album/sandbox-test",
      appleMusic: "https://music.apple.com/album/sandbox-test",
    },
    artworkUrl: PLACEHOLDER_IMAGE,
  };
}

export function buildWebhookPayload(): WebhookPayload {
  return {
    url: "https://example.com/hooks/featurefm-sandbox",
    events: [
      "smartlink.created",
      "smartlink.clicked",
      "campaign.conversion",
      "presave.completed",
    ],
    active: true,
    description: "Sandbox webhook created by the API test suite",
  };
}
