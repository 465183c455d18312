/**
 * Heading-aware semantic chunking
 *
 * Splits extracted study material into segments bounded by headings and by a
 * character budget. Every chunk produced under a heading is prefixed with that
 * heading so the extractor always sees which section a passage belongs to.
 *
 * A chunk may exceed `maxChars` by at most the 200 characters the sentence
 * boundary search is allowed to look past its target.
 */

import type { Chunk } from '../core/types.js';

export const DEFAULT_MAX_CHARS = 6000;

/** Headings longer than this are treated as body text */
const MAX_HEADING_LENGTH = 80;
/** How far either side of the cut point a sentence terminator may be */
const SENTENCE_SEARCH_WINDOW = 200;
/** How far back from the cut point a space may be */
const WORD_SEARCH_WINDOW = 100;
/** Space left for the heading prefix when a long line is cut */
const LONG_LINE_MARGIN = 100;
/** Once a chunk is this close to the budget it is flushed at the next sentence end */
const SOFT_BUFFER = 500;
/** Tail of the chunk searched for that sentence end */
const SOFT_BREAK_WINDOW = 100;

const NUMBERED_HEADING = /^\d+(\.\d+)*\s+/;
const SENTENCE_TERMINATORS = new Set(['.', '!', '?']);

function isCasedChar(char: string): boolean {
  return char.toLowerCase() !== char.toUpperCase();
}

function isUpperChar(char: string): boolean {
  return isCasedChar(char) && char === char.toUpperCase();
}

/**
 * At least one cased character and no lower-case ones
 */
function isAllUpperCase(line: string): boolean {
  let hasCased = false;
  for (const char of line) {
    if (!isCasedChar(char)) continue;
    if (!isUpperChar(char)) return false;
    hasCased = true;
  }
  return hasCased;
}

/**
 * Every word starts with an upper-case letter followed only by lower-case
 * letters; uncased characters (spaces, digits, punctuation) separate words.
 */
function isTitleCase(line: string): boolean {
  let hasCased = false;
  let previousIsCased = false;

  for (const char of line) {
    if (!isCasedChar(char)) {
      previousIsCased = false;
      continue;
    }

    const upper = isUpperChar(char);
    if (upper === previousIsCased) {
      return false;
    }
    previousIsCased = true;
    hasCased = true;
  }

  return hasCased;
}

/**
 * Classify a line as a section heading
 */
export function isHeading(rawLine: string): boolean {
  const line = rawLine.trim();
  if (!line || line.length > MAX_HEADING_LENGTH) {
    return false;
  }

  if (isAllUpperCase(line)) {
    return true;
  }

  if (NUMBERED_HEADING.test(line)) {
    return true;
  }

  return isTitleCase(line) && !line.endsWith('.');
}

/**
 * Split text at the sentence boundary closest to `maxLen`.
 *
 * Scans backward from `maxLen + 200` to `maxLen - 200` for a terminator, then
 * backward from `maxLen` over 100 characters for a space, then hard-cuts.
 * Returns the head and the remainder, both trimmed.
 */
export function breakAtSentenceBoundary(text: string, maxLen: number): [string, string] {
  if (text.length <= maxLen) {
    return [text, ''];
  }

  const searchFrom = Math.min(maxLen + SENTENCE_SEARCH_WINDOW, text.length - 1);
  const searchTo = Math.max(maxLen - SENTENCE_SEARCH_WINDOW, 0);
  for (let i = searchFrom; i > searchTo; i--) {
    if (SENTENCE_TERMINATORS.has(text[i])) {
      return [text.slice(0, i + 1).trim(), text.slice(i + 1).trim()];
    }
  }

  const wordSearchTo = Math.max(0, maxLen - WORD_SEARCH_WINDOW);
  for (let i = maxLen; i > wordSearchTo; i--) {
    if (text[i] === ' ') {
      return [text.slice(0, i).trim(), text.slice(i).trim()];
    }
  }

  return [text.slice(0, maxLen).trim(), text.slice(maxLen).trim()];
}

/**
 * Split text into heading-scoped chunks with their source heading and position
 */
export function semanticChunks(text: string, maxChars: number = DEFAULT_MAX_CHARS): Chunk[] {
  const chunks: Chunk[] = [];

  let currentChunk = '';
  let currentHeading = '';
  let pendingLine = '';
  let sectionEmitted = false;

  const emit = (chunkText: string): void => {
    const trimmed = chunkText.trim();
    if (trimmed) {
      chunks.push({ text: trimmed, sourceHeading: currentHeading, sequenceIndex: chunks.length });
      sectionEmitted = true;
    }
  };

  const reseed = (): string => `${currentHeading}\n`;

  // A chunk holding only its re-seeded heading has no body to flush
  const hasBody = (): boolean => {
    const trimmed = currentChunk.trim();
    return trimmed !== '' && trimmed !== currentHeading;
  };

  const appendBodyLine = (incoming: string): void => {
    let line = incoming;
    if (pendingLine) {
      line = `${pendingLine} ${line}`;
      pendingLine = '';
    }

    if ((currentChunk + line + ' ').length > maxChars && hasBody()) {
      emit(currentChunk);
      currentChunk = reseed();
    }

    if (line.length > maxChars) {
      // The boundary search may run SENTENCE_SEARCH_WINDOW + 1 past the budget
      const breakPoint = maxChars - currentChunk.length - LONG_LINE_MARGIN;
      const budget = breakPoint > 0 ? breakPoint : Math.max(1, maxChars - currentChunk.length - 1);
      const [firstPart, remainingPart] = breakAtSentenceBoundary(line, budget);
      currentChunk += `${firstPart} `;
      emit(currentChunk);
      currentChunk = reseed();
      pendingLine = remainingPart;
      return;
    }

    currentChunk += `${line} `;

    if (currentChunk.length >= maxChars - SOFT_BUFFER) {
      let breakPoint = currentChunk.length;
      for (let i = Math.max(0, currentChunk.length - SOFT_BREAK_WINDOW); i < currentChunk.length; i++) {
        if (SENTENCE_TERMINATORS.has(currentChunk[i])) {
          breakPoint = i + 1;
          break;
        }
      }

      if (breakPoint < currentChunk.length) {
        emit(currentChunk.slice(0, breakPoint));
        currentChunk = `${reseed()}${currentChunk.slice(breakPoint).trim()}`;
        if (currentChunk.trim() !== currentHeading) {
          currentChunk += ' ';
        }
      }
    }
  };

  // Overflow left from a long line is fed back through the body path until consumed
  const drainPending = (): void => {
    while (pendingLine) {
      const overflow = pendingLine;
      pendingLine = '';
      appendBodyLine(overflow);
    }
  };

  // A heading with no body of its own is still kept as a chunk
  const flushSection = (): void => {
    drainPending();
    if (hasBody() || !sectionEmitted) {
      emit(currentChunk);
    }
  };

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!line) continue;

    if (isHeading(line)) {
      flushSection();

      currentHeading = line;
      currentChunk = `${line}\n`;
      sectionEmitted = false;
    } else {
      appendBodyLine(line);
    }
  }

  flushSection();

  return chunks;
}

/**
 * Split text into heading-scoped chunk strings; blank input yields no chunks
 */
export function semanticChunk(text: string, maxChars: number = DEFAULT_MAX_CHARS): string[] {
  return semanticChunks(text, maxChars).map(chunk => chunk.text);
}
