import { TextDecoder } from 'util';

const strictDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Text read from a fixed-width name buffer
 */
export interface DecodedText {
  text: string;
  /** False when the used bytes were not valid UTF-8 and `text` is only the valid prefix */
  valid: boolean;
}

function tryDecode(bytes: Uint8Array): string | null {
  try {
    return strictDecoder.decode(bytes);
  } catch (error) {
    // fatal decoder throws TypeError on malformed input
    if (error instanceof TypeError) {
      return null;
    }
    throw error;
  }
}

/**
 * Decode UTF-8, falling back to the longest valid prefix
 */
export function decodeUtf8Prefix(bytes: Uint8Array): DecodedText {
  const full = tryDecode(bytes);
  if (full !== null) {
    return { text: full, valid: true };
  }

  for (let end = bytes.length - 1; end > 0; end--) {
    const prefix = tryDecode(bytes.subarray(0, end));
    if (prefix !== null) {
      return { text: prefix, valid: false };
    }
  }
  return { text: '', valid: false };
}

/**
 * Decode the text before the first NUL; bytes after it are never looked at
 */
export function decodeNulTerminated(bytes: Uint8Array): DecodedText {
  const nul = bytes.indexOf(0);
  return decodeUtf8Prefix(nul === -1 ? bytes : bytes.subarray(0, nul));
}

/**
 * Split a buffer into at most `maxSegments` NUL-separated texts.
 * Players pack character name, account name and subgroup this way.
 */
export function decodeNameSegments(bytes: Uint8Array, maxSegments: number): DecodedText[] {
  const segments: DecodedText[] = [];
  let start = 0;

  while (segments.length < maxSegments && start <= bytes.length) {
    const nul = bytes.indexOf(0, start);
    const end = nul === -1 ? bytes.length : nul;
    segments.push(decodeUtf8Prefix(bytes.subarray(start, end)));
    if (nul === -1) {
      break;
    }
    start = nul + 1;
  }

  return segments;
}
