import { describe, it, expect } from 'vitest';
import {
  FALLBACK_CHAIN,
  corePhrase,
  isPlaceholderLabel,
  stripTrailingSuffix,
  synthesizeSearchPhrase,
} from './strategies.js';

describe('stripTrailingSuffix', () => {
  it('removes trailing bracketed groups', () => {
    expect(stripTrailingSuffix('Artist - Song (Remastered 2011)')).toBe('Artist - Song');
    expect(stripTrailingSuffix('Song (Live) [Official Video]')).toBe('Song');
  });

  it('removes a featured-artist credit', () => {
    expect(stripTrailingSuffix('Song feat. Someone')).toBe('Song');
  });

  it('keeps titles without a suffix', () => {
    expect(stripTrailingSuffix('Plain Title')).toBe('Plain Title');
  });

  it('never strips a title down to nothing', () => {
    expect(stripTrailingSuffix('(Intro)')).toBe('(Intro)');
  });
});

describe('corePhrase', () => {
  it('uses the song part of an artist-title pair', () => {
    expect(corePhrase('Artist - Song Name (Radio Edit)')).toBe('Song Name song');
  });

  it('uses the whole title when there is no artist', () => {
    expect(corePhrase('Song Name')).toBe('Song Name song');
  });

  it('yields an empty phrase when nothing is left', () => {
    expect(corePhrase('(Intro)')).toBe('');
  });
});

describe('FALLBACK_CHAIN', () => {
  it('runs three steps with decreasing timeouts', () => {
    expect(FALLBACK_CHAIN.map(step => [step.id, step.timeoutSeconds])).toEqual([
      ['search-full-title', 300],
      ['search-stripped-title', 180],
      ['search-core-phrase', 120],
    ]);
  });

  it('uses a different client identity for each step', () => {
    const clients = FALLBACK_CHAIN.map(step => step.identity.playerClient);
    expect(clients).toEqual(['android,web', 'web,mweb', 'android']);
  });

  it('derives each query from the known title', () => {
    const context = { knownTitle: 'Artist - Song (Remastered)' };
    expect(FALLBACK_CHAIN.map(step => step.buildQuery(context))).toEqual([
      'Artist - Song (Remastered)',
      'Artist - Song',
      'Song song',
    ]);
  });
});

describe('synthesizeSearchPhrase', () => {
  const base = { fallbackLocator: 'https://open.spotify.com/album/A1' };

  it('prefers the extracted title', () => {
    expect(synthesizeSearchPhrase({
      ...base,
      explicitTitle: 'Artist - Title',
      errorTitle: 'Other',
    })).toBe('Artist - Title');
  });

  it('falls back to the title in the error text', () => {
    expect(synthesizeSearchPhrase({ ...base, explicitTitle: null, errorTitle: 'Err Title' })).toBe('Err Title');
  });

  it('uses the item link before the label', () => {
    expect(synthesizeSearchPhrase({
      ...base,
      itemLocator: 'https://open.spotify.com/track/T1',
      currentLabel: 'SongA',
    })).toBe('https://open.spotify.com/track/T1');
  });

  it('uses a real label but not a placeholder', () => {
    expect(synthesizeSearchPhrase({ ...base, currentLabel: 'SongA' })).toBe('SongA');
    expect(synthesizeSearchPhrase({ ...base, currentLabel: 'Initializing...' })).toBe(base.fallbackLocator);
  });
});

describe('isPlaceholderLabel', () => {
  it('recognizes labels the pipeline sets itself', () => {
    expect(isPlaceholderLabel('Extracting track info...')).toBe(true);
    expect(isPlaceholderLabel('Found: Artist - Title')).toBe(true);
    expect(isPlaceholderLabel('Artist - Title')).toBe(false);
  });
});
