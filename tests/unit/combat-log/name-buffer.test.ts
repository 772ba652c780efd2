import { describe, it, expect } from 'vitest';
import {
  decodeNameSegments,
  decodeNulTerminated,
  decodeUtf8Prefix,
} from '../../../src/combat-log/decoding/NameBuffer';

describe('NameBuffer', () => {
  describe('decodeUtf8Prefix', () => {
    it('decodes valid multi-byte text', () => {
      expect(decodeUtf8Prefix(Buffer.from('Zoë', 'utf-8'))).toEqual({ text: 'Zoë', valid: true });
    });

    it('keeps the longest valid prefix when a character is cut', () => {
      const bytes = Buffer.from('Zoë', 'utf-8').subarray(0, 3);

      expect(decodeUtf8Prefix(bytes)).toEqual({ text: 'Zo', valid: false });
    });

    it('returns empty text when no prefix is valid', () => {
      expect(decodeUtf8Prefix(Uint8Array.from([0xff]))).toEqual({ text: '', valid: false });
    });
  });

  describe('decodeNulTerminated', () => {
    it('ignores bytes after the first NUL', () => {
      expect(decodeNulTerminated(Uint8Array.from([0x41, 0x00, 0xff]))).toEqual({ text: 'A', valid: true });
    });

    it('uses the whole buffer when there is no NUL', () => {
      expect(decodeNulTerminated(Uint8Array.from([0x41, 0x42]))).toEqual({ text: 'AB', valid: true });
    });
  });

  describe('decodeNameSegments', () => {
    it('splits character, account and subgroup', () => {
      const bytes = new Uint8Array(64);
      bytes.set(Buffer.from('Char\0:Acc.1234\x003\0', 'utf-8'));

      expect(decodeNameSegments(bytes, 3).map((segment) => segment.text)).toEqual(['Char', ':Acc.1234', '3']);
    });

    it('returns a single segment when there is no separator', () => {
      expect(decodeNameSegments(Uint8Array.from([0x41, 0x42]), 3)).toEqual([{ text: 'AB', valid: true }]);
    });

    it('returns empty segments for a zeroed buffer', () => {
      expect(decodeNameSegments(new Uint8Array(64), 3).map((segment) => segment.text)).toEqual(['', '', '']);
    });

    it('flags an invalid segment without affecting the others', () => {
      const bytes = Uint8Array.from([0x41, 0x00, 0xff, 0x00, 0x32, 0x00]);

      expect(decodeNameSegments(bytes, 3)).toEqual([
        { text: 'A', valid: true },
        { text: '', valid: false },
        { text: '2', valid: true },
      ]);
    });
  });
});
