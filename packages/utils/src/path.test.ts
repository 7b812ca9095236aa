import { describe, it, expect } from 'vitest';
import { sanitizeFilename, getExtension, getBasename } from './path.js';

describe('sanitizeFilename', () => {
  it('reduces accented titles to a path-safe ASCII name with the extension intact', () => {
    expect(sanitizeFilename('Café: Déjà Vu / Live?.mp3')).toBe('Cafe_Deja_Vu_Live_.mp3');
  });

  it('collapses runs of whitespace and reserved characters into one placeholder', () => {
    expect(sanitizeFilename('a  <b>|"c".flac')).toBe('a_b_c_.flac');
  });

  it('bounds the length while preserving the extension', () => {
    const result = sanitizeFilename(`${'x'.repeat(300)}.mp3`, 20);
    expect(result).toBe(`${'x'.repeat(16)}.mp3`);
    expect(result).toHaveLength(20);
  });

  it('drops characters with no ASCII decomposition', () => {
    expect(sanitizeFilename('日本語 Mix.zip')).toBe('_Mix.zip');
  });

  it('never returns an empty base name', () => {
    expect(sanitizeFilename('日本.zip')).toBe('_.zip');
  });

  it('truncates overlong extensions to ten characters', () => {
    expect(sanitizeFilename('clip.abcdefghijklmno')).toBe('clip.abcdefghi');
  });
});

describe('getExtension / getBasename', () => {
  it('splits a filename into lowercase extension and stem', () => {
    expect(getExtension('Song.MP3')).toBe('mp3');
    expect(getBasename('Song.MP3')).toBe('Song');
  });
});
