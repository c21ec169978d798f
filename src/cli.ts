import { parseArgs } from 'util';
import * as readline from 'readline/promises';
import { AppConfig, loadConfig } from './config';
import AuthService from './services/authService';
import { generateTopTrackPlaylists } from './services/generatorService';
import PlaylistService from './services/playlistService';
import SpotifyService from './services/spotifyService';
import { AuthenticationError, InvalidArgumentError } from './utils/errors';
import { DEFAULT_TIME_FRAMES, TIME_FRAMES, TimeFrame, parseTimeFrames } from './utils/timeFrames';

export const USAGE = `Usage: top-tracks-playlists [options]

Creates or refreshes playlists of your Spotify top tracks.

Options:
  -t, --time-frames <list>  Comma-separated time frames to generate
                            (${TIME_FRAMES.join(', ')}; default: ${DEFAULT_TIME_FRAMES.join(',')})
  -h, --help                Show this help`;

export interface CliOptions {
  timeFrames: TimeFrame[];
  help: boolean;
}

export function parseCliArgs(argv: string[]): CliOptions {
  let values: { 'time-frames'?: string; help?: boolean };
  try {
    ({ values } = parseArgs({
      args: argv,
      options: {
        'time-frames': { type: 'string', short: 't' },
        help: { type: 'boolean', short: 'h' }
      },
      strict: true,
      allowPositionals: false
    }));
  } catch (error) {
    throw new InvalidArgumentError(`${error instanceof Error ? error.message : String(error)}\n\n${USAGE}`);
  }

  return {
    timeFrames: parseTimeFrames(values['time-frames']),
    help: values.help ?? false
  };
}

/**
 * Asks for the username on the terminal. Fails when the input ends before an answer.
 */
export async function promptForUsername(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Promise<string> {
  const rl = readline.createInterface({ input, output });
  const inputClosed = new AbortController();
  rl.once('close', () => inputClosed.abort());

  try {
    return await rl.question('Please input your Spotify username: ', { signal: inputClosed.signal });
  } catch (error) {
    if (inputClosed.signal.aborted) {
      throw new InvalidArgumentError('A Spotify username is required, but the input ended before one was entered');
    }
    throw error;
  } finally {
    rl.close();
  }
}

/**
 * The configured username, or the one typed at the prompt when none is configured.
 */
export async function resolveUsername(
  config: AppConfig,
  prompt: () => Promise<string> = promptForUsername
): Promise<string> {
  if (config.username) return config.username;

  const username = (await prompt()).trim();
  if (!username) {
    throw new InvalidArgumentError('A Spotify username is required');
  }
  return username;
}

export async function main(
  argv: string[] = process.argv.slice(2),
  env: Record<string, string | undefined> = process.env
): Promise<void> {
  const options = parseCliArgs(argv);
  if (options.help) {
    console.log(USAGE);
    return;
  }

  const config = loadConfig(env);
  const username = await resolveUsername(config);

  const token = await new AuthService(config).getSpotifyToken();
  if (!token) {
    throw new AuthenticationError('Could not obtain a Spotify access token');
  }

  const playlistService = new PlaylistService(new SpotifyService(token), username);

  console.log(`Generating playlists for: ${options.timeFrames.join(', ')}`);
  const outcomes = await generateTopTrackPlaylists(playlistService, options.timeFrames);

  for (const outcome of outcomes) {
    console.log(`${outcome.timeFrame}: ${outcome.action} "${outcome.playlistName}" (${outcome.trackCount} tracks)`);
  }
}
