import { describe, it, expect } from 'vitest';
import { Chunker, splitText } from '../../../src/speech/chunker.js';

const sentence = `${'word '.repeat(79)}end.`; // 399 chars, period last

function longText(): string {
  // Six sentences joined by spaces (2399 chars) plus a 101-char tail
  return `${Array.from({ length: 6 }, () => sentence).join(' ')} ${'x'.repeat(100)}`;
}

describe('splitText', () => {
  it('should return no segments for empty text', () => {
    expect(splitText('')).toEqual([]);
  });

  it('should keep short text as one segment', () => {
    expect(splitText('Hello there.')).toEqual([{ index: 0, content: 'Hello there.' }]);
  });

  it('should cut 2500 chars into three segments at periods', () => {
    const text = longText();
    expect(text).toHaveLength(2500);

    const segments = splitText(text);

    expect(segments.map((s) => s.content.length)).toEqual([1199, 1200, 101]);
    expect(segments.map((s) => s.index)).toEqual([0, 1, 2]);
    expect(segments[0]?.content.endsWith('end.')).toBe(true);
    expect(segments[1]?.content.endsWith('end.')).toBe(true);
  });

  it('should reproduce the input when segments are joined', () => {
    const text = `${longText()}, trailing clause; and more!  ${'y'.repeat(1500)}`;
    const segments = splitText(text);

    expect(segments.map((s) => s.content).join('')).toBe(text);
    for (const segment of segments) {
      expect(segment.content.length).toBeLessThanOrEqual(1200);
    }
  });

  it('should prefer the sentence terminal over a later clause separator', () => {
    const text = `${'x'.repeat(40)}. ${'y'.repeat(40)}, ${'z'.repeat(40)}`;
    const segments = splitText(text, { maxChunkSize: 100, minChunkSize: 10 });

    expect(segments.map((s) => s.content.length)).toEqual([41, 83]);
    expect(segments[0]?.content).toBe(`${'x'.repeat(40)}.`);
  });

  it('should fall back to a clause separator', () => {
    const text = `${'x'.repeat(70)}, ${'y'.repeat(70)}`;
    const segments = splitText(text, { maxChunkSize: 100, minChunkSize: 10 });

    expect(segments[0]?.content).toBe(`${'x'.repeat(70)},`);
    expect(segments[1]?.content).toBe(` ${'y'.repeat(70)}`);
  });

  it('should recognize full-width terminals', () => {
    const text = `${'字'.repeat(60)}。${'字'.repeat(60)}`;
    const segments = splitText(text, { maxChunkSize: 100, minChunkSize: 10 });

    expect(segments.map((s) => s.content.length)).toEqual([61, 60]);
  });

  it('should hard cut when the only boundary would leave a segment under the minimum', () => {
    const text = `x.${'y'.repeat(150)}`;
    const segments = splitText(text, { maxChunkSize: 100, minChunkSize: 10 });

    expect(segments.map((s) => s.content.length)).toEqual([100, 52]);
  });

  it('should not split a surrogate pair on a hard cut', () => {
    const text = `${'a'.repeat(99)}😀${'b'.repeat(50)}`;
    const segments = splitText(text, { maxChunkSize: 100, minChunkSize: 10 });

    expect(segments[0]?.content).toBe('a'.repeat(99));
    expect(segments[1]?.content).toBe(`😀${'b'.repeat(50)}`);
  });
});

describe('Chunker', () => {
  it('should apply its configured bounds', () => {
    const chunker = new Chunker({ maxChunkSize: 10, minChunkSize: 2 });
    const segments = chunker.split('aaaa. bbbb. cccc.');

    expect(segments.map((s) => s.content)).toEqual(['aaaa.', ' bbbb.', ' cccc.']);
  });
});
