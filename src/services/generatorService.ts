import { formatGeneratedDescription } from '../utils/dateFormat';
import { DEFAULT_TIME_FRAMES, TimeFrame, nameForTimeFrame } from '../utils/timeFrames';
import PlaylistService, { SyncOutcome, getTrackIds } from './playlistService';

export interface TimeFrameOutcome extends SyncOutcome {
  timeFrame: TimeFrame;
}

/**
 * Creates or refreshes one top-tracks playlist per time frame, in the given order.
 * The first failure stops the run; time frames after it are left untouched.
 * @param clock Source of the generation timestamp written to each description
 */
export async function generateTopTrackPlaylists(
  playlistService: PlaylistService,
  timeFrames: readonly TimeFrame[] = DEFAULT_TIME_FRAMES,
  clock: () => Date = () => new Date()
): Promise<TimeFrameOutcome[]> {
  const userPlaylists = await playlistService.listUserPlaylists();
  const outcomes: TimeFrameOutcome[] = [];

  for (const timeFrame of timeFrames) {
    const topTracks = await playlistService.fetchTopTracks(timeFrame);
    const trackIds = getTrackIds(topTracks);

    if (trackIds.length < topTracks.length) {
      console.log(`Skipped ${topTracks.length - trackIds.length} tracks without an ID (${timeFrame})`);
    }

    const outcome = await playlistService.syncPlaylist(
      userPlaylists,
      nameForTimeFrame(timeFrame),
      trackIds,
      formatGeneratedDescription(clock())
    );
    outcomes.push({ ...outcome, timeFrame });
  }

  return outcomes;
}
