import SpotifyWebApi from "spotify-web-api-node";
import { parseReleaseDate } from "./dates";
import { CatalogError } from "./errors";
import type {
  AlbumType,
  Artist,
  CatalogClient,
  CatalogPage,
  EarliestAppearance,
  EntryTrack,
  TrackDetail,
} from "./discovery/types";

export interface SpotifyCatalogOptions {
  clientId: string;
  clientSecret: string;
  market?: string;
  pageSize?: number;
  now?: () => number;
}

const PLAYLIST_PAGE_SIZE = 100;
const ALBUM_TRACKS_PAGE_SIZE = 50;

/**
 * Catalog client over the Spotify Web API (client-credentials flow).
 * Every failure leaves this class as a CatalogError.
 */
export class SpotifyCatalogClient implements CatalogClient {
  private readonly api: SpotifyWebApi;
  private readonly market: string | undefined;
  private readonly pageSize: number;
  private readonly now: () => number;
  private tokenExpiresAt = 0;
  private pendingToken: Promise<void> | null = null;

  constructor(options: SpotifyCatalogOptions) {
    this.api = new SpotifyWebApi({
      clientId: options.clientId,
      clientSecret: options.clientSecret,
    });
    this.market = options.market;
    this.pageSize = options.pageSize ?? 50;
    this.now = options.now ?? Date.now;
  }

  async listCatalogEntries(
    artistId: string,
    type: AlbumType,
    cursor: string | null,
  ): Promise<CatalogPage> {
    const offset = cursor ? Number(cursor) : 0;
    const body = await this.request(() =>
      this.api.getArtistAlbums(artistId, {
        include_groups: type,
        limit: this.pageSize,
        offset,
        ...(this.market ? { market: this.market } : {}),
      }),
    );

    return {
      entries: body.items.map((album) => ({
        id: album.id,
        name: album.name,
        type,
        releaseDate: album.release_date,
        artistId,
      })),
      nextCursor:
        body.next && body.items.length > 0
          ? String(offset + body.items.length)
          : null,
    };
  }

  async getEntryTracks(entryId: string): Promise<EntryTrack[]> {
    const tracks: EntryTrack[] = [];
    let offset = 0;
    for (;;) {
      const body = await this.request(() =>
        this.api.getAlbumTracks(entryId, {
          limit: ALBUM_TRACKS_PAGE_SIZE,
          offset,
        }),
      );
      for (const track of body.items) {
        tracks.push({ id: track.id, name: track.name });
      }
      if (!body.next || body.items.length === 0) break;
      offset += body.items.length;
    }
    return tracks;
  }

  async getTrackDetail(trackId: string): Promise<TrackDetail> {
    const body = await this.request(() =>
      this.api.getTrack(trackId, this.market ? { market: this.market } : {}),
    );
    return {
      isrc: body.external_ids?.isrc ?? null,
      popularity: body.popularity ?? 0,
      url: body.external_urls?.spotify ?? `https://open.spotify.com/track/${trackId}`,
    };
  }

  async findEarliestByIsrc(isrc: string): Promise<EarliestAppearance | null> {
    const body = await this.request(() =>
      this.api.searchTracks(`isrc:${isrc}`, { limit: 50 }),
    );
    const appearances = (body.tracks?.items ?? []).map((track) => ({
      date: track.album.release_date,
      albumName: track.album.name,
    }));
    return pickEarliest(appearances);
  }

  async searchArtist(name: string): Promise<Artist | null> {
    const body = await this.request(() =>
      this.api.searchArtists(name, { limit: 1 }),
    );
    const artist = body.artists?.items[0];
    if (!artist) {
      console.warn(`[SPOTIFY] No results found for artist '${name}'`);
      return null;
    }
    console.log(`[SPOTIFY] Found artist '${artist.name}' (ID: ${artist.id})`);
    return { id: artist.id, name: artist.name };
  }

  async getArtist(artistId: string): Promise<Artist> {
    const body = await this.request(() => this.api.getArtist(artistId));
    return { id: body.id, name: body.name };
  }

  /**
   * Unique artists credited on any track of the playlist, in first-seen order.
   */
  async listPlaylistArtists(playlistId: string): Promise<Artist[]> {
    const artists = new Map<string, Artist>();
    let offset = 0;
    for (;;) {
      const body = await this.request(() =>
        this.api.getPlaylistTracks(playlistId, {
          limit: PLAYLIST_PAGE_SIZE,
          offset,
        }),
      );
      for (const item of body.items) {
        const track = item.track;
        // Podcast episodes have no artists
        if (!track || !("artists" in track)) continue;
        for (const artist of track.artists) {
          if (artist.id && !artists.has(artist.id)) {
            artists.set(artist.id, { id: artist.id, name: artist.name });
          }
        }
      }
      if (!body.next || body.items.length === 0) break;
      offset += body.items.length;
    }
    return [...artists.values()];
  }

  private async request<T>(call: () => Promise<{ body: T }>): Promise<T> {
    await this.ensureAccess();
    try {
      const { body } = await call();
      return body;
    } catch (error) {
      const failure = toCatalogError(error);
      if (failure.status === 401) {
        // Token revoked or expired early; fetch a new one on the next attempt
        this.tokenExpiresAt = 0;
      }
      throw failure;
    }
  }

  private ensureAccess(): Promise<void> {
    if (this.now() < this.tokenExpiresAt) return Promise.resolve();
    if (!this.pendingToken) {
      this.pendingToken = this.refreshToken().finally(() => {
        this.pendingToken = null;
      });
    }
    return this.pendingToken;
  }

  private async refreshToken(): Promise<void> {
    try {
      const { body } = await this.api.clientCredentialsGrant();
      this.api.setAccessToken(body.access_token);
      // Refresh 60s before expiry
      this.tokenExpiresAt = this.now() + (body.expires_in - 60) * 1000;
      console.log("[SPOTIFY] Access token refreshed");
    } catch (error) {
      throw toCatalogError(error);
    }
  }
}

/**
 * Translate a spotify-web-api-node failure into a CatalogError.
 * 429 → rate_limited (Retry-After honoured), 401/5xx/no status → transient,
 * other statuses → permanent.
 */
export function toCatalogError(error: unknown): CatalogError {
  if (error instanceof CatalogError) return error;

  const status = readStatus(error);
  const message = describe(error, status);

  if (status === 429) {
    return new CatalogError("rate_limited", message, {
      status,
      retryAfterSeconds: readRetryAfter(error),
      cause: error,
    });
  }
  if (status === null || status === 401 || status >= 500) {
    return new CatalogError("transient", message, { status, cause: error });
  }
  return new CatalogError("permanent", message, { status, cause: error });
}

function readStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null) return null;
  const status = "statusCode" in error ? error.statusCode : undefined;
  return typeof status === "number" ? status : null;
}

function readRetryAfter(error: unknown): number | null {
  if (typeof error !== "object" || error === null || !("headers" in error)) {
    return null;
  }
  const { headers } = error;
  if (typeof headers !== "object" || headers === null) return null;
  const raw = "retry-after" in headers ? headers["retry-after"] : undefined;
  if (typeof raw !== "string" && typeof raw !== "number") return null;
  const seconds = Number.parseInt(String(raw), 10);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : null;
}

function describe(error: unknown, status: number | null): string {
  const text = error instanceof Error ? error.message : String(error);
  return status === null ? text : `Spotify API ${status}: ${text}`;
}

/**
 * Earliest appearance by normalized release date; unparseable dates are
 * ignored. Ties keep the first one seen.
 */
export function pickEarliest(
  appearances: EarliestAppearance[],
): EarliestAppearance | null {
  let best: EarliestAppearance | null = null;
  for (const appearance of appearances) {
    const date = parseReleaseDate(appearance.date);
    if (!date) continue;
    if (!best || date < best.date) {
      best = { date, albumName: appearance.albumName };
    }
  }
  return best;
}

/**
 * Accepts a bare id, `spotify:playlist:<id>` or an open.spotify.com URL.
 */
export function parsePlaylistId(input: string): string {
  const value = input.trim();
  const fromUrl = /playlist\/([A-Za-z0-9]+)/.exec(value);
  if (fromUrl) return fromUrl[1];
  if (value.includes(":")) return value.split(":").pop() ?? value;
  return value;
}
