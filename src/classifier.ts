import { Classification, HeaderLevel, LineKind, ParseState } from './types.js';

/**
 * Regex patterns for classifying markdown lines
 */

// Front matter delimiter, compared against the trimmed line
const FRONT_MATTER_DELIMITER = '---';

// Fence line: three backticks at the start, optional language token
// Group 1: language (may be empty)
const FENCE_PATTERN = /^```(\w*)\s*$/;

const BLANK_PATTERN = /^\s*$/;

// ATX heading. The lookahead stops "#tag" from reading as a heading while
// letting "####### x" through as level 6 with "# x" as its text.
// Group 1: #{1,6} (heading level)
// Group 2: the rest
const HEADER_PATTERN = /^(#{1,6})(?=\s|#|$)\s*(.*)$/;

// Obsidian image embed filling the whole line: ![[name.ext]] or ![[name.ext|option]]
// Group 1: the file name
const IMAGE_PATTERN = /^\s*!\[\[([^|\]]+)(?:\|[^\]]*)?\]\]\s*$/;

/**
 * State at the start of every document
 */
export function initialParseState(): ParseState {
  return {
    frontMatter: 'pending',
    fence: 'outside',
    fenceLanguage: null
  };
}

/**
 * Parse a fence line - returns its language token (null when empty)
 */
function parseFence(line: string): { language: string | null } | null {
  const match = line.match(FENCE_PATTERN);
  if (!match) return null;
  return { language: match[1] || null };
}

function parseHeader(line: string): { level: HeaderLevel; text: string } | null {
  const match = line.match(HEADER_PATTERN);
  if (!match) return null;
  return {
    level: toHeaderLevel(match[1].length),
    text: match[2].trim()
  };
}

function toHeaderLevel(hashes: number): HeaderLevel {
  switch (hashes) {
    case 1: return 1;
    case 2: return 2;
    case 3: return 3;
    case 4: return 4;
    case 5: return 5;
    default: return 6;
  }
}

function parseImage(line: string): { filename: string } | null {
  const match = line.match(IMAGE_PATTERN);
  if (!match) return null;
  return { filename: match[1].trim() };
}

/**
 * Classify the body of the document, once front matter is out of the way.
 */
function classifyBody(line: string, state: ParseState): Classification {
  if (state.fence === 'inside') {
    if (parseFence(line)) {
      return {
        kind: { kind: 'fenceBoundary', opening: false, language: state.fenceLanguage },
        state: { ...state, fence: 'outside', fenceLanguage: null }
      };
    }
    // Everything inside a fence is code, blank lines included
    return { kind: { kind: 'code', text: line }, state };
  }

  if (BLANK_PATTERN.test(line)) {
    return { kind: { kind: 'blank' }, state };
  }

  const fence = parseFence(line);
  if (fence) {
    return {
      kind: { kind: 'fenceBoundary', opening: true, language: fence.language },
      state: { ...state, fence: 'inside', fenceLanguage: fence.language }
    };
  }

  let kind: LineKind;
  const header = parseHeader(line);
  const image = header ? null : parseImage(line);
  if (header) {
    kind = { kind: 'header', level: header.level, text: header.text };
  } else if (image) {
    kind = { kind: 'imageDirective', filename: image.filename };
  } else {
    kind = { kind: 'plainText', text: line };
  }
  return { kind, state };
}

/**
 * Classify one line given the state left by the previous one.
 * Returns the line's kind and the state for the next line; the input
 * state is never modified.
 */
export function classify(line: string, state: ParseState): Classification {
  const isDelimiter = line.trim() === FRONT_MATTER_DELIMITER;

  switch (state.frontMatter) {
    case 'pending':
      // Front matter can only open on the first line
      if (isDelimiter) {
        return {
          kind: { kind: 'frontMatterDelimiter' },
          state: { ...state, frontMatter: 'open' }
        };
      }
      return classifyBody(line, { ...state, frontMatter: 'closed' });

    case 'open':
      if (isDelimiter) {
        return {
          kind: { kind: 'frontMatterDelimiter' },
          state: { ...state, frontMatter: 'closed' }
        };
      }
      return { kind: { kind: 'metadata', text: line }, state };

    case 'closed':
      return classifyBody(line, state);
  }
}
