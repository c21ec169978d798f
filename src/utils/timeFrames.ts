import { InvalidArgumentError } from './errors';

export const TIME_FRAMES = ['short_term', 'medium_term', 'long_term'] as const;

export type TimeFrame = (typeof TIME_FRAMES)[number];

export const DEFAULT_TIME_FRAMES: readonly TimeFrame[] = ['short_term', 'medium_term'];

const playlistNames: Record<TimeFrame, string> = {
  short_term: 'Top Songs - Last Month',
  medium_term: 'Top Songs - Last 6 Months',
  long_term: 'Top Songs - All Time'
};

export const isTimeFrame = (value: string): value is TimeFrame =>
  (TIME_FRAMES as readonly string[]).includes(value);

export function assertTimeFrame(value: string): asserts value is TimeFrame {
  if (!isTimeFrame(value)) {
    throw new InvalidArgumentError(
      `Invalid time frame "${value}". Please choose from ${TIME_FRAMES.join(', ')}`,
      TIME_FRAMES
    );
  }
}

/**
 * Name of the playlist that holds the top tracks for a time frame.
 */
export const nameForTimeFrame = (timeFrame: string): string => {
  assertTimeFrame(timeFrame);
  return playlistNames[timeFrame];
};

/**
 * Parses a comma-separated list such as "short_term, long_term".
 * Blank items are ignored and repeats keep their first position.
 * Falls back to the defaults when nothing is given.
 */
export const parseTimeFrames = (input: string | undefined): TimeFrame[] => {
  const requested = (input ?? '')
    .split(',')
    .map(item => item.trim())
    .filter(item => item.length > 0);

  if (requested.length === 0) return [...DEFAULT_TIME_FRAMES];

  const timeFrames: TimeFrame[] = [];
  for (const item of requested) {
    assertTimeFrame(item);
    if (!timeFrames.includes(item)) timeFrames.push(item);
  }
  return timeFrames;
};
