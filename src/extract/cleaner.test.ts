import { describe, expect, it } from 'vitest';
import { cleanContent, dropDuplicateHalf, stripBoilerplate, wordOverlap } from './cleaner.js';

// 300 characters, no leading or trailing whitespace
const PARAGRAPH = 'Il consiglio comunale ha approvato il nuovo piano per la mobilità urbana. '.repeat(5).slice(0, 300);
const ENGLISH = 'The weather forecast predicts heavy rain across northern regions tomorrow. '.repeat(4).trim();

describe('stripBoilerplate', () => {
  it('removes agency tag and dateline', () => {
    expect(stripBoilerplate('(ANSA) - ROMA, 12 MAR - Il governo ha approvato il decreto.')).toBe(
      'Il governo ha approvato il decreto.',
    );
  });

  it('removes a dateline with a year', () => {
    expect(stripBoilerplate('MILANO, 3 gennaio 2024 - La borsa apre in rialzo.')).toBe('La borsa apre in rialzo.');
  });

  it('removes a byline', () => {
    expect(stripBoilerplate('di Mario Rossi - La partita è finita in parità.')).toBe('La partita è finita in parità.');
  });

  it('removes the reserved-rights suffix', () => {
    expect(stripBoilerplate('Testo finale. © RIPRODUZIONE RISERVATA')).toBe('Testo finale.');
  });

  it('leaves ordinary text alone', () => {
    expect(stripBoilerplate('Nothing to strip here.')).toBe('Nothing to strip here.');
  });
});

describe('duplicate detection', () => {
  it('measures overlap against the larger word set', () => {
    expect(wordOverlap('a b c d', 'a b c e')).toBe(0.75);
    expect(wordOverlap('', '')).toBe(0);
  });

  it('keeps one copy of a paragraph emitted twice', () => {
    expect(PARAGRAPH).toHaveLength(300);
    expect(dropDuplicateHalf(`${PARAGRAPH} ${PARAGRAPH}`, 0.8)).toBe(PARAGRAPH);
  });

  it('keeps text whose halves differ', () => {
    const text = `${PARAGRAPH} ${ENGLISH}`;
    expect(dropDuplicateHalf(text, 0.8)).toBe(text);
  });

  it('skips short text', () => {
    expect(dropDuplicateHalf('echo echo', 0.8)).toBe('echo echo');
  });
});

describe('cleanContent', () => {
  it('collapses whitespace and deduplicates', () => {
    expect(cleanContent(`${PARAGRAPH}\n\n${PARAGRAPH}`, { duplicateOverlap: 0.8 })).toBe(PARAGRAPH);
  });

  it('applies the length cap at a word boundary', () => {
    expect(cleanContent('one  two three four five', { duplicateOverlap: 0.8, maxLength: 12 })).toBe('one two...');
  });
});
