import axios, { AxiosInstance, AxiosResponse, CreateAxiosDefaults } from 'axios';
import {
  Paging,
  Playlist,
  PlaylistDetailsUpdate,
  Track
} from '../models/spotifyTypes';
import { RemoteOperationError, describeError } from '../utils/errors';
import { TimeFrame } from '../utils/timeFrames';

export const SPOTIFY_API_BASE_URL = 'https://api.spotify.com/v1';

/**
 * The slice of the Spotify Web API the playlist generator relies on.
 */
export interface SpotifyApi {
  getUserTopTracks(timeRange: TimeFrame, limit: number): Promise<Paging<Track>>;
  getCurrentUserPlaylists(offset: number, limit: number): Promise<Paging<Playlist>>;
  createPlaylist(userId: string, name: string, description: string): Promise<Playlist>;
  replacePlaylistTracks(playlistId: string, trackIds: readonly string[]): Promise<void>;
  addTracksToPlaylist(playlistId: string, trackIds: readonly string[]): Promise<void>;
  changePlaylistDetails(playlistId: string, details: PlaylistDetailsUpdate): Promise<void>;
}

// Convert track IDs to Spotify URIs (spotify:track:ID format)
export const toTrackUris = (trackIds: readonly string[]): string[] =>
  trackIds.map(id => `spotify:track:${id}`);

class SpotifyService implements SpotifyApi {
  private http: AxiosInstance;

  /**
   * @param accessToken Token issued for the current user
   * @param httpConfig Extra axios settings for the underlying client
   */
  constructor(accessToken: string, httpConfig: CreateAxiosDefaults = {}) {
    this.http = axios.create({
      ...httpConfig,
      baseURL: SPOTIFY_API_BASE_URL,
      headers: {
        'Authorization': `Bearer ${accessToken}`,
        'Content-Type': 'application/json'
      }
    });
  }

  private async request<T>(operation: string, send: () => Promise<AxiosResponse<T>>): Promise<T> {
    try {
      const response = await send();
      return response.data;
    } catch (error) {
      console.error(`Error during "${operation}":`, describeError(error));
      throw new RemoteOperationError(operation, error);
    }
  }

  /**
   * Get the current user's top tracks, ranked by Spotify
   * @param timeRange Over what time frame the affinities are computed
   * @param limit Maximum number of tracks to return (max: 50)
   */
  async getUserTopTracks(timeRange: TimeFrame, limit: number): Promise<Paging<Track>> {
    return this.request('fetch top tracks', () =>
      this.http.get<Paging<Track>>('/me/top/tracks', {
        params: { time_range: timeRange, limit }
      })
    );
  }

  /**
   * Get one page of the playlists owned or followed by the current user
   */
  async getCurrentUserPlaylists(offset: number, limit: number): Promise<Paging<Playlist>> {
    return this.request('fetch user playlists', () =>
      this.http.get<Paging<Playlist>>('/me/playlists', {
        params: { offset, limit }
      })
    );
  }

  /**
   * Create a public playlist for a user
   * @returns The created playlist
   */
  async createPlaylist(userId: string, name: string, description: string): Promise<Playlist> {
    const playlist = await this.request('create playlist', () =>
      this.http.post<Playlist>(`/users/${encodeURIComponent(userId)}/playlists`, {
        name,
        description,
        public: true
      })
    );

    if (!playlist || !playlist.id) {
      throw new RemoteOperationError(
        'create playlist',
        new Error('Spotify response did not include a playlist ID')
      );
    }
    return playlist;
  }

  /**
   * Replace every track of a playlist, keeping the given order
   */
  async replacePlaylistTracks(playlistId: string, trackIds: readonly string[]): Promise<void> {
    await this.request('replace playlist tracks', () =>
      this.http.put<unknown>(`/playlists/${encodeURIComponent(playlistId)}/tracks`, { uris: toTrackUris(trackIds) })
    );
  }

  /**
   * Append tracks to the end of a playlist
   */
  async addTracksToPlaylist(playlistId: string, trackIds: readonly string[]): Promise<void> {
    await this.request('add tracks to playlist', () =>
      this.http.post<unknown>(`/playlists/${encodeURIComponent(playlistId)}/tracks`, { uris: toTrackUris(trackIds) })
    );
  }

  async changePlaylistDetails(playlistId: string, details: PlaylistDetailsUpdate): Promise<void> {
    await this.request('update playlist details', () =>
      this.http.put<unknown>(`/playlists/${encodeURIComponent(playlistId)}`, details)
    );
  }
}

export default SpotifyService;
