/**
 * @chronovault/runtime — Little-endian binary codec.
 *
 * Programs persist state and receive instructions as raw bytes. These
 * helpers write and read the fixed-width primitives every layout in the
 * stack is built from.
 *
 * Rules:
 * - Integers are little-endian
 * - Booleans are one byte, exactly 0 or 1
 * - Fixed-size byte arrays carry no length prefix
 * - Sequences carry a u32 length prefix
 * - A reader must be finished; trailing bytes are an error
 */

import { isI64, isU64 } from "@chronovault/types";
import type { Address } from "@chronovault/types";
import { addressFromBytes, addressToBytes } from "./address.js";
import { RuntimeError } from "./errors.js";

/** Builds the error a reader throws on malformed input. */
export type DecodeErrorFactory = (message: string) => Error;

const U32_MAX = 0xffff_ffff;

const defaultDecodeError: DecodeErrorFactory = (message) =>
  new RuntimeError("INVALID_ACCOUNT_DATA", message);

// =============================================================================
// Writer
// =============================================================================

export class BinaryWriter {
  private readonly _chunks: Uint8Array[] = [];

  u8(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new RuntimeError("INVALID_ARGUMENT", `u8 out of range: ${String(value)}`);
    }
    this._chunks.push(Uint8Array.of(value));
    return this;
  }

  bool(value: boolean): this {
    return this.u8(value ? 1 : 0);
  }

  u32(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > U32_MAX) {
      throw new RuntimeError("INVALID_ARGUMENT", `u32 out of range: ${String(value)}`);
    }
    const chunk = new Uint8Array(4);
    new DataView(chunk.buffer).setUint32(0, value, true);
    this._chunks.push(chunk);
    return this;
  }

  u64(value: bigint): this {
    if (!isU64(value)) {
      throw new RuntimeError("INVALID_ARGUMENT", `u64 out of range: ${String(value)}`);
    }
    const chunk = new Uint8Array(8);
    new DataView(chunk.buffer).setBigUint64(0, value, true);
    this._chunks.push(chunk);
    return this;
  }

  i64(value: bigint): this {
    if (!isI64(value)) {
      throw new RuntimeError("INVALID_ARGUMENT", `i64 out of range: ${String(value)}`);
    }
    const chunk = new Uint8Array(8);
    new DataView(chunk.buffer).setBigInt64(0, value, true);
    this._chunks.push(chunk);
    return this;
  }

  /** Fixed-size byte array; `value` must be exactly `length` bytes. */
  fixedBytes(value: Uint8Array, length: number): this {
    if (value.length !== length) {
      throw new RuntimeError(
        "INVALID_ARGUMENT",
        `Expected ${String(length)} bytes, got ${String(value.length)}`,
      );
    }
    this._chunks.push(Uint8Array.from(value));
    return this;
  }

  address(value: Address): this {
    this._chunks.push(addressToBytes(value));
    return this;
  }

  toBytes(): Uint8Array {
    const total = this._chunks.reduce((sum, c) => sum + c.length, 0);
    const out = new Uint8Array(total);
    let offset = 0;
    for (const chunk of this._chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return out;
  }
}

// =============================================================================
// Reader
// =============================================================================

export class BinaryReader {
  private readonly _bytes: Uint8Array;
  private readonly _view: DataView;
  private readonly _onError: DecodeErrorFactory;
  private _offset = 0;

  constructor(bytes: Uint8Array, onError: DecodeErrorFactory = defaultDecodeError) {
    this._bytes = bytes;
    this._view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this._onError = onError;
  }

  get remaining(): number {
    return this._bytes.length - this._offset;
  }

  u8(): number {
    this._need(1);
    const value = this._view.getUint8(this._offset);
    this._offset += 1;
    return value;
  }

  bool(): boolean {
    const value = this.u8();
    if (value > 1) {
      throw this._onError(`Invalid boolean byte ${String(value)} at offset ${String(this._offset - 1)}`);
    }
    return value === 1;
  }

  u32(): number {
    this._need(4);
    const value = this._view.getUint32(this._offset, true);
    this._offset += 4;
    return value;
  }

  u64(): bigint {
    this._need(8);
    const value = this._view.getBigUint64(this._offset, true);
    this._offset += 8;
    return value;
  }

  i64(): bigint {
    this._need(8);
    const value = this._view.getBigInt64(this._offset, true);
    this._offset += 8;
    return value;
  }

  fixedBytes(length: number): Uint8Array {
    this._need(length);
    const value = this._bytes.slice(this._offset, this._offset + length);
    this._offset += length;
    return value;
  }

  address(): Address {
    return addressFromBytes(this.fixedBytes(32));
  }

  /** Assert every byte was consumed. */
  finish(): void {
    if (this.remaining !== 0) {
      throw this._onError(`${String(this.remaining)} trailing bytes`);
    }
  }

  private _need(length: number): void {
    if (this.remaining < length) {
      throw this._onError(
        `Unexpected end of data: need ${String(length)} bytes at offset ${String(this._offset)}, have ${String(this.remaining)}`,
      );
    }
  }
}
