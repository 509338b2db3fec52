/**
 * Byte stream writer for fingerprints
 *
 * Every field is terminated by FIELD_SEPARATOR so adjacent values cannot
 * run together ("1","0" vs "10"). Records (splines, rows, modifiers) are
 * closed with RECORD_SEPARATOR. Floats are written as 8-byte little-endian
 * IEEE-754 so the stream is bit-exact regardless of locale or formatting.
 */

import { createHash, type Hash } from 'node:crypto';

export const FIELD_SEPARATOR = 0x1f;
export const RECORD_SEPARATOR = 0x1e;

/** Parameter listed in the schema but absent from the modifier */
export const MISSING_TOKEN = '\u0000missing';
/** Reference parameter that points at nothing */
export const NONE_TOKEN = '\u0000none';
/** Value whose shape does not match its schema kind */
export const MISMATCH_TOKEN = '\u0000mismatch';

/** blake2b-512, truncated to 128 bits of hex */
const DIGEST_HEX_LENGTH = 32;

const textEncoder = new TextEncoder();

export class FingerprintWriter {
  private hash: Hash;
  private scratch = new DataView(new ArrayBuffer(8));

  constructor() {
    this.hash = createHash('blake2b512');
  }

  /**
   * Write a text field
   */
  text(value: string): this {
    this.hash.update(textEncoder.encode(value));
    return this.separator(FIELD_SEPARATOR);
  }

  /**
   * Write an integer field (textual)
   */
  int(value: number): this {
    return this.text(String(Math.trunc(value)));
  }

  /**
   * Write a boolean field as "1"/"0"
   */
  bool(value: boolean): this {
    return this.text(value ? '1' : '0');
  }

  /**
   * Write a float field as 8 raw bytes
   */
  float(value: number): this {
    this.scratch.setFloat64(0, value, true);
    this.hash.update(new Uint8Array(this.scratch.buffer, 0, 8));
    return this.separator(FIELD_SEPARATOR);
  }

  /**
   * Write every component of a vector as a float field
   */
  floats(values: readonly number[]): this {
    for (const value of values) {
      this.float(value);
    }
    return this;
  }

  /**
   * Close a record
   */
  endRecord(): this {
    return this.separator(RECORD_SEPARATOR);
  }

  /**
   * Finish the stream. The writer must not be used afterwards.
   */
  digest(): string {
    return this.hash.digest('hex').slice(0, DIGEST_HEX_LENGTH);
  }

  private separator(byte: number): this {
    this.hash.update(Uint8Array.of(byte));
    return this;
  }
}
