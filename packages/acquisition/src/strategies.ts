/**
 * Acquisition Strategies
 *
 * The fallback chain is data: an ordered list of strategies, each with
 * its own timeout, client identity and query transform. Adding a step
 * means adding an entry.
 */

import type { ClientIdentity } from './clients/ytdlp.js';

export interface SearchContext {
  /** Best title known for the item ("Artist - Title" where available) */
  knownTitle: string;
}

export interface AcquisitionStrategy {
  id: string;
  timeoutSeconds: number;
  identity: ClientIdentity;
  /** Null or empty means the step has nothing to search for */
  buildQuery(context: SearchContext): string | null;
}

export const DESKTOP_IDENTITY: ClientIdentity = {
  userAgent:
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36 Edg/120.0.0.0',
  playerClient: 'web,mweb',
  sleepRequestsSeconds: 3,
};

export const ANDROID_IDENTITY: ClientIdentity = {
  userAgent: 'Mozilla/5.0 (Android 13; Mobile; rv:120.0) Gecko/120.0 Firefox/120.0',
  playerClient: 'android',
  sleepRequestsSeconds: 5,
  sleepIntervalSeconds: 2,
};

export const SEARCH_IDENTITY: ClientIdentity = {
  userAgent: 'Mozilla/5.0 (Linux; Android 13) AppleWebKit/537.36',
  playerClient: 'android,web',
};

/**
 * Remove trailing bracketed groups and "feat." credits:
 *   "Song (Remastered 2011) [Live]" -> "Song"
 */
export function stripTrailingSuffix(title: string): string {
  let result = title.trim();
  let previous = '';
  while (result !== previous) {
    previous = result;
    result = result
      .replace(/\s*[([][^()[\]]*[)\]]\s*$/, '')
      .replace(/\s+(?:feat\.?|ft\.)\s+.*$/i, '')
      .trim();
  }
  return result.length > 0 ? result : title.trim();
}

/**
 * The song part of "Artist - Song (extra)", searched as "<song> song"
 */
export function corePhrase(title: string): string {
  const dash = title.indexOf(' - ');
  const songPart = dash >= 0 ? title.slice(dash + 3) : title;
  const core = songPart.split(/[([]/)[0]?.trim() ?? '';
  return core.length > 0 ? `${core} song` : '';
}

/**
 * Started at most once per job when the resolver reports it could not
 * match an item, alongside the still-running primary.
 */
export const LOOKUP_MISS_STRATEGY: AcquisitionStrategy = {
  id: 'lookup-miss-search',
  timeoutSeconds: 300,
  identity: SEARCH_IDENTITY,
  buildQuery: context => context.knownTitle,
};

/**
 * Run in order after the primary produced no files
 */
export const FALLBACK_CHAIN: readonly AcquisitionStrategy[] = [
  {
    id: 'search-full-title',
    timeoutSeconds: 300,
    identity: SEARCH_IDENTITY,
    buildQuery: context => context.knownTitle,
  },
  {
    id: 'search-stripped-title',
    timeoutSeconds: 180,
    identity: DESKTOP_IDENTITY,
    buildQuery: context => stripTrailingSuffix(context.knownTitle),
  },
  {
    id: 'search-core-phrase',
    timeoutSeconds: 120,
    identity: ANDROID_IDENTITY,
    buildQuery: context => corePhrase(context.knownTitle),
  },
];

const PLACEHOLDER_LABELS: ReadonlySet<string> = new Set([
  '',
  'Initializing...',
  'Extracting track info...',
  'Starting download...',
  'Searching...',
]);

/**
 * Labels the pipeline sets itself rather than reading from tool output
 */
export function isPlaceholderLabel(label: string): boolean {
  return PLACEHOLDER_LABELS.has(label.trim()) || /^(Found|Error|Searching|Trying):/.test(label);
}

export interface SearchPhraseInputs {
  explicitTitle?: string | null;
  errorTitle?: string;
  /** Only set for single items; a collection link is not a search phrase */
  itemLocator?: string;
  currentLabel?: string;
  fallbackLocator: string;
}

/**
 * Pick the phrase a lookup-miss search uses. Priority: extracted title,
 * title named in the error, item link, current non-placeholder label.
 */
export function synthesizeSearchPhrase(inputs: SearchPhraseInputs): string {
  const candidates = [
    inputs.explicitTitle ?? undefined,
    inputs.errorTitle,
    inputs.itemLocator,
    inputs.currentLabel !== undefined && !isPlaceholderLabel(inputs.currentLabel) ? inputs.currentLabel : undefined,
  ];
  const phrase = candidates.find(candidate => candidate !== undefined && candidate.trim().length > 0);
  return (phrase ?? inputs.fallbackLocator).trim();
}
