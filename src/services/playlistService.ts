import { Playlist, Track } from '../models/spotifyTypes';
import { InvalidArgumentError } from '../utils/errors';
import { assertTimeFrame } from '../utils/timeFrames';
import { SpotifyApi } from './spotifyService';

/** Spotify returns at most 50 items per page for top tracks and playlists */
export const MAX_PAGE_SIZE = 50;

export interface SyncOutcome {
  playlistId: string;
  playlistName: string;
  action: 'created' | 'replaced';
  trackCount: number;
}

/**
 * Extracts track IDs, skipping tracks without one (local files, unavailable tracks).
 */
export const getTrackIds = (tracks: readonly Pick<Track, 'id'>[]): string[] =>
  tracks
    .map(track => track.id)
    .filter((id): id is string => typeof id === 'string' && id.length > 0);

/**
 * ID of the first playlist whose name equals `name` exactly, if any.
 */
export const findByName = (
  playlists: readonly Pick<Playlist, 'id' | 'name'>[],
  name: string
): string | undefined => playlists.find(playlist => playlist.name === name)?.id;

const assertPageSize = (label: string, value: number): void => {
  if (!Number.isInteger(value) || value < 1 || value > MAX_PAGE_SIZE) {
    throw new InvalidArgumentError(
      `Invalid ${label} ${value}. Expected an integer between 1 and ${MAX_PAGE_SIZE}`
    );
  }
};

class PlaylistService {
  /**
   * @param spotify Authenticated API client
   * @param userId Spotify user that owns created playlists
   */
  constructor(
    private readonly spotify: SpotifyApi,
    private readonly userId: string
  ) {}

  /**
   * Get the user's top tracks for a time frame, in Spotify's ranking order
   * @param timeFrame One of short_term, medium_term, long_term
   * @param limit Maximum number of tracks (1-50)
   */
  async fetchTopTracks(timeFrame: string, limit: number = MAX_PAGE_SIZE): Promise<Track[]> {
    assertTimeFrame(timeFrame);
    assertPageSize('limit', limit);

    console.log(`Fetching top ${limit} tracks for ${timeFrame}...`);
    const page = await this.spotify.getUserTopTracks(timeFrame, limit);
    return page.items ?? [];
  }

  /**
   * Get every playlist of the current user, following pagination until Spotify reports no next page
   */
  async listUserPlaylists(pageSize: number = MAX_PAGE_SIZE): Promise<Playlist[]> {
    assertPageSize('page size', pageSize);

    const playlists: Playlist[] = [];
    let offset = 0;

    while (true) {
      const page = await this.spotify.getCurrentUserPlaylists(offset, pageSize);
      playlists.push(...(page.items ?? []));

      if (!page.next) break;
      offset += pageSize;
    }

    console.log(`Found ${playlists.length} playlists for the current user`);
    return playlists;
  }

  /**
   * Replace the tracks of the playlist called `name`, or create it when it doesn't exist.
   * A created playlist is appended to `playlists` so later lookups in the same run find it.
   */
  async syncPlaylist(
    playlists: Playlist[],
    name: string,
    trackIds: readonly string[],
    description: string
  ): Promise<SyncOutcome> {
    const existingPlaylistId = findByName(playlists, name);

    if (existingPlaylistId) {
      await this.spotify.replacePlaylistTracks(existingPlaylistId, trackIds);
      await this.spotify.changePlaylistDetails(existingPlaylistId, { description });

      console.log(`Replaced ${trackIds.length} tracks in "${name}"`);
      return { playlistId: existingPlaylistId, playlistName: name, action: 'replaced', trackCount: trackIds.length };
    }

    const playlist = await this.spotify.createPlaylist(this.userId, name, description);
    playlists.push(playlist);

    if (trackIds.length > 0) {
      await this.spotify.addTracksToPlaylist(playlist.id, trackIds);
    } else {
      console.warn(`No tracks to add to "${name}"`);
    }

    console.log(`Created "${name}" with ${trackIds.length} tracks`);
    return { playlistId: playlist.id, playlistName: name, action: 'created', trackCount: trackIds.length };
  }
}

export default PlaylistService;
