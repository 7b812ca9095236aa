/**
 * spotdl Output Parser
 *
 * Turns one status line of the resolver tool into a structured event.
 *
 * Examples:
 *   Found 12 songs in Road Trip (Playlist)
 *   Downloading 3 of 12: Artist - Title
 *   Downloaded "Artist - Title": https://music.youtube.com/watch?v=...
 *   LookupError: No results found for song: Artist - Title
 */

export type SpotdlErrorCategory = 'content-unavailable' | 'lookup-miss' | 'other';

export type SpotdlEvent =
  | { type: 'collection-found'; count: number; name: string }
  | { type: 'item-started'; index: number; total: number; label: string }
  | { type: 'item-completed'; label: string }
  | { type: 'fatal-error'; category: SpotdlErrorCategory; message: string; titleHint?: string };

const COLLECTION_PATTERN = /Found (\d+) (?:songs?|items?|tracks?) in (.+?) \((?:Playlist|Album|Artist|Collection)\)/i;
const ITEM_STARTED_PATTERN = /Downloading (\d+) of (\d+): (.+)/;
const ITEM_COMPLETED_PATTERN = /Downloaded "(.*?)":/;
const NO_RESULTS_PATTERN = /No results found for song: (.+)/;

const ERROR_MARKERS: ReadonlyArray<[string, SpotdlErrorCategory]> = [
  ['AudioProviderError', 'content-unavailable'],
  ['YT-DLP download error', 'content-unavailable'],
  ['LookupError', 'lookup-miss'],
  ['KeyError', 'lookup-miss'],
  ['DownloaderError', 'other'],
];

export function parseSpotdlLine(line: string): SpotdlEvent | null {
  const collection = line.match(COLLECTION_PATTERN);
  if (collection?.[1] && collection[2]) {
    return {
      type: 'collection-found',
      count: parseInt(collection[1], 10),
      name: toAsciiLabel(collection[2]),
    };
  }

  const started = line.match(ITEM_STARTED_PATTERN);
  if (started?.[1] && started[2] && started[3]) {
    return {
      type: 'item-started',
      index: parseInt(started[1], 10),
      total: parseInt(started[2], 10),
      label: started[3].trim(),
    };
  }

  const completed = line.match(ITEM_COMPLETED_PATTERN);
  if (completed?.[1] !== undefined) {
    return { type: 'item-completed', label: completed[1] };
  }

  const marker = ERROR_MARKERS.find(([needle]) => line.includes(needle));
  if (marker) {
    const titleHint = line.match(NO_RESULTS_PATTERN)?.[1]?.trim();
    return {
      type: 'fatal-error',
      category: marker[1],
      message: line,
      ...(titleHint ? { titleHint } : {}),
    };
  }

  return null;
}

function toAsciiLabel(value: string): string {
  return value.normalize('NFKD').replace(/[^\x00-\x7f]/g, '').trim();
}
