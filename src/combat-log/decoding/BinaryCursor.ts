import { TruncatedError } from '../types/DecodeErrors';

/**
 * Little-endian reader over a fully materialized buffer.
 * Every read is bounds-checked and fails with TruncatedError instead of reading past the end.
 */
export class BinaryCursor {
  private position: number;

  constructor(
    private readonly data: Buffer,
    offset: number = 0
  ) {
    this.position = offset;
  }

  public get offset(): number {
    return this.position;
  }

  public get remaining(): number {
    return Math.max(0, this.data.length - this.position);
  }

  /**
   * Fail unless `length` more bytes are available for `section`
   */
  public require(length: number, section: string): void {
    if (this.remaining < length) {
      throw new TruncatedError(section, this.position, length, this.remaining);
    }
  }

  public u8(section: string): number {
    this.require(1, section);
    const value = this.data.readUInt8(this.position);
    this.position += 1;
    return value;
  }

  public u16(section: string): number {
    this.require(2, section);
    const value = this.data.readUInt16LE(this.position);
    this.position += 2;
    return value;
  }

  public i16(section: string): number {
    this.require(2, section);
    const value = this.data.readInt16LE(this.position);
    this.position += 2;
    return value;
  }

  public u32(section: string): number {
    this.require(4, section);
    const value = this.data.readUInt32LE(this.position);
    this.position += 4;
    return value;
  }

  public i32(section: string): number {
    this.require(4, section);
    const value = this.data.readInt32LE(this.position);
    this.position += 4;
    return value;
  }

  public u64(section: string): bigint {
    this.require(8, section);
    const value = this.data.readBigUInt64LE(this.position);
    this.position += 8;
    return value;
  }

  /**
   * Copy of the next `length` bytes
   */
  public bytes(length: number, section: string): Uint8Array {
    this.require(length, section);
    const slice = new Uint8Array(this.data.subarray(this.position, this.position + length));
    this.position += length;
    return slice;
  }

  public skip(length: number, section: string): void {
    this.require(length, section);
    this.position += length;
  }
}
