import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createFakeSpotifyApi, page, playlist, track } from '../testing/fakeSpotifyApi';
import { InvalidArgumentError, RemoteOperationError } from '../utils/errors';
import PlaylistService, { findByName, getTrackIds } from './playlistService';

const DESCRIPTION = 'Generated: 2026-03-07 09:05';

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('getTrackIds', () => {
  it('should drop tracks without an ID and keep the order of the rest', () => {
    const tracks = [track('a'), track(null), track('b'), track('c')];
    expect(getTrackIds(tracks)).toEqual(['a', 'b', 'c']);
  });

  it('should return every ID when all tracks have one', () => {
    const tracks = ['t1', 't2', 't3', 't4', 't5'].map(id => track(id));
    expect(getTrackIds(tracks)).toEqual(['t1', 't2', 't3', 't4', 't5']);
  });

  it('should return an empty list for no tracks', () => {
    expect(getTrackIds([])).toEqual([]);
  });
});

describe('findByName', () => {
  const playlists = [
    playlist('p1', 'Road Trip'),
    playlist('p2', 'Top Songs - Last Month'),
    playlist('p3', 'Top Songs - Last Month')
  ];

  it('should return the ID of the first exact match', () => {
    expect(findByName(playlists, 'Top Songs - Last Month')).toBe('p2');
  });

  it('should be case-sensitive', () => {
    expect(findByName(playlists, 'top songs - last month')).toBeUndefined();
  });

  it('should not trim the query', () => {
    expect(findByName(playlists, ' Road Trip')).toBeUndefined();
  });

  it('should return undefined for an empty list', () => {
    expect(findByName([], 'Road Trip')).toBeUndefined();
  });
});

describe('PlaylistService.fetchTopTracks', () => {
  it('should request up to 50 tracks for the time frame by default', async () => {
    const { api } = createFakeSpotifyApi({ topTracks: [track('a'), track('b')] });
    const service = new PlaylistService(api, 'test-user');

    const tracks = await service.fetchTopTracks('long_term');

    expect(api.getUserTopTracks).toHaveBeenCalledTimes(1);
    expect(api.getUserTopTracks).toHaveBeenCalledWith('long_term', 50);
    expect(tracks.map(t => t.id)).toEqual(['a', 'b']);
  });

  it('should pass a custom limit through', async () => {
    const { api } = createFakeSpotifyApi();
    const service = new PlaylistService(api, 'test-user');

    await service.fetchTopTracks('medium_term', 10);

    expect(api.getUserTopTracks).toHaveBeenCalledWith('medium_term', 10);
  });

  it.each(['weekly', 'SHORT_TERM', '', 'short_term '])(
    'should reject time frame %j without calling the API',
    async timeFrame => {
      const { api } = createFakeSpotifyApi();
      const service = new PlaylistService(api, 'test-user');

      await expect(service.fetchTopTracks(timeFrame)).rejects.toThrow(InvalidArgumentError);
      expect(api.getUserTopTracks).not.toHaveBeenCalled();
    }
  );

  it('should list the valid time frames in the error', async () => {
    const { api } = createFakeSpotifyApi();
    const service = new PlaylistService(api, 'test-user');

    await expect(service.fetchTopTracks('weekly')).rejects.toThrow(
      'Invalid time frame "weekly". Please choose from short_term, medium_term, long_term'
    );
  });

  it.each([0, 51, 2.5])('should reject limit %d without calling the API', async limit => {
    const { api } = createFakeSpotifyApi();
    const service = new PlaylistService(api, 'test-user');

    await expect(service.fetchTopTracks('short_term', limit)).rejects.toThrow(InvalidArgumentError);
    expect(api.getUserTopTracks).not.toHaveBeenCalled();
  });
});

describe('PlaylistService.listUserPlaylists', () => {
  it('should follow pages until next is unset and keep every item in order', async () => {
    const { api } = createFakeSpotifyApi();
    const firstPage = Array.from({ length: 50 }, (_, i) => playlist(`p${i}`, `Playlist ${i}`));
    const secondPage = Array.from({ length: 13 }, (_, i) => playlist(`p${50 + i}`, `Playlist ${50 + i}`));
    api.getCurrentUserPlaylists
      .mockResolvedValueOnce(page(firstPage, 'https://api.spotify.com/v1/me/playlists?offset=50&limit=50'))
      .mockResolvedValueOnce(page(secondPage, null, 50));
    const service = new PlaylistService(api, 'test-user');

    const playlists = await service.listUserPlaylists();

    expect(playlists).toHaveLength(63);
    expect(playlists.map(p => p.id)).toEqual(Array.from({ length: 63 }, (_, i) => `p${i}`));
    expect(api.getCurrentUserPlaylists.mock.calls).toEqual([[0, 50], [50, 50]]);
  });

  it('should make a single request when the first page has no next page', async () => {
    const { api } = createFakeSpotifyApi({ playlists: [playlist('p1', 'Road Trip')] });
    const service = new PlaylistService(api, 'test-user');

    const playlists = await service.listUserPlaylists();

    expect(playlists.map(p => p.id)).toEqual(['p1']);
    expect(api.getCurrentUserPlaylists).toHaveBeenCalledTimes(1);
  });

  it('should advance the offset by the page size', async () => {
    const { api } = createFakeSpotifyApi();
    api.getCurrentUserPlaylists
      .mockResolvedValueOnce(page([playlist('p1', 'One'), playlist('p2', 'Two')], 'next-page'))
      .mockResolvedValueOnce(page([playlist('p3', 'Three'), playlist('p4', 'Four')], 'next-page', 2))
      .mockResolvedValueOnce(page([], null, 4));
    const service = new PlaylistService(api, 'test-user');

    const playlists = await service.listUserPlaylists(2);

    expect(playlists.map(p => p.id)).toEqual(['p1', 'p2', 'p3', 'p4']);
    expect(api.getCurrentUserPlaylists.mock.calls).toEqual([[0, 2], [2, 2], [4, 2]]);
  });
});

describe('PlaylistService.syncPlaylist', () => {
  it('should create the playlist and then add the tracks when no playlist has the name', async () => {
    const { api, calls } = createFakeSpotifyApi();
    const service = new PlaylistService(api, 'test-user');
    const playlists = [playlist('p1', 'Road Trip')];

    const outcome = await service.syncPlaylist(playlists, 'Top Songs - Last Month', ['a', 'b', 'c'], DESCRIPTION);

    expect(calls).toEqual(['createPlaylist', 'addTracksToPlaylist']);
    expect(api.createPlaylist).toHaveBeenCalledWith('test-user', 'Top Songs - Last Month', DESCRIPTION);
    expect(api.addTracksToPlaylist).toHaveBeenCalledWith('new-playlist', ['a', 'b', 'c']);
    expect(api.replacePlaylistTracks).not.toHaveBeenCalled();
    expect(api.changePlaylistDetails).not.toHaveBeenCalled();
    expect(outcome).toEqual({
      playlistId: 'new-playlist',
      playlistName: 'Top Songs - Last Month',
      action: 'created',
      trackCount: 3
    });
  });

  it('should remember the created playlist for later lookups', async () => {
    const { api } = createFakeSpotifyApi();
    const service = new PlaylistService(api, 'test-user');
    const playlists = [playlist('p1', 'Road Trip')];

    await service.syncPlaylist(playlists, 'Top Songs - Last Month', ['a'], DESCRIPTION);

    expect(findByName(playlists, 'Top Songs - Last Month')).toBe('new-playlist');
  });

  it('should replace the tracks and then the description of an existing playlist', async () => {
    const { api, calls } = createFakeSpotifyApi();
    const service = new PlaylistService(api, 'test-user');
    const playlists = [playlist('P1', 'Top Songs - Last Month')];

    const outcome = await service.syncPlaylist(playlists, 'Top Songs - Last Month', ['c', 'a', 'b'], DESCRIPTION);

    expect(calls).toEqual(['replacePlaylistTracks', 'changePlaylistDetails']);
    expect(api.replacePlaylistTracks).toHaveBeenCalledWith('P1', ['c', 'a', 'b']);
    expect(api.changePlaylistDetails).toHaveBeenCalledWith('P1', { description: DESCRIPTION });
    expect(api.createPlaylist).not.toHaveBeenCalled();
    expect(api.addTracksToPlaylist).not.toHaveBeenCalled();
    expect(outcome).toEqual({
      playlistId: 'P1',
      playlistName: 'Top Songs - Last Month',
      action: 'replaced',
      trackCount: 3
    });
  });

  it('should skip adding tracks to a new playlist when there are none', async () => {
    const { api, calls } = createFakeSpotifyApi();
    const service = new PlaylistService(api, 'test-user');

    const outcome = await service.syncPlaylist([], 'Top Songs - All Time', [], DESCRIPTION);

    expect(calls).toEqual(['createPlaylist']);
    expect(outcome.trackCount).toBe(0);
  });

  it('should propagate a failed create without adding tracks', async () => {
    const { api } = createFakeSpotifyApi();
    api.createPlaylist.mockRejectedValueOnce(
      new RemoteOperationError('create playlist', new Error('Insufficient client scope'))
    );
    const service = new PlaylistService(api, 'test-user');

    await expect(
      service.syncPlaylist([], 'Top Songs - Last Month', ['a'], DESCRIPTION)
    ).rejects.toThrow('Failed to create playlist: Insufficient client scope');
    expect(api.addTracksToPlaylist).not.toHaveBeenCalled();
  });
});
