import { readFile } from 'fs/promises';
import { UnsupportedContainerError } from '../combat-log/types/DecodeErrors';

/**
 * Supplies the complete bytes of one log; the decoder never reads partially
 */
export interface ByteSource {
  read(): Promise<Buffer>;
}

const ZIP_SIGNATURE = Buffer.from([0x50, 0x4b, 0x03, 0x04]);

export function isZipContainer(bytes: Buffer): boolean {
  return bytes.length >= ZIP_SIGNATURE.length && bytes.subarray(0, ZIP_SIGNATURE.length).equals(ZIP_SIGNATURE);
}

/**
 * Reads an uncompressed log file from disk
 */
export class FileByteSource implements ByteSource {
  constructor(public readonly path: string) {}

  public async read(): Promise<Buffer> {
    const bytes = await readFile(this.path);
    if (isZipContainer(bytes)) {
      throw new UnsupportedContainerError(this.path);
    }
    return bytes;
  }
}

/**
 * Wraps bytes already in memory
 */
export class BufferByteSource implements ByteSource {
  constructor(private readonly bytes: Buffer) {}

  public async read(): Promise<Buffer> {
    return this.bytes;
  }
}
