/**
 * FNV-1a 64-bit hash over BigInt arithmetic.
 */

const FNV64_OFFSET_BASIS = 14695981039346656037n;
const FNV64_PRIME = 1099511628211n;
const MASK_64 = (1n << 64n) - 1n;

/**
 * Incremental FNV-1a 64-bit hasher
 */
export class FNV64Hasher {
  private hash: bigint = FNV64_OFFSET_BASIS;

  updateByte(byte: number): this {
    this.hash ^= BigInt(byte & 0xff);
    this.hash = (this.hash * FNV64_PRIME) & MASK_64;
    return this;
  }

  updateBytes(data: Uint8Array): this {
    for (let i = 0; i < data.length; i++) {
      this.updateByte(data[i] ?? 0);
    }
    return this;
  }

  /**
   * Add a 32-bit integer, little-endian
   */
  updateInt32(value: number): this {
    const v = value >>> 0;
    this.updateByte(v & 0xff);
    this.updateByte((v >>> 8) & 0xff);
    this.updateByte((v >>> 16) & 0xff);
    this.updateByte((v >>> 24) & 0xff);
    return this;
  }

  /**
   * Add each value of a list, prefixed by its length so that
   * [1, 2] + [3] and [1] + [2, 3] hash differently.
   */
  updateInt32List(values: readonly number[]): this {
    this.updateInt32(values.length);
    for (const value of values) {
      this.updateInt32(value);
    }
    return this;
  }

  /**
   * 16-character lowercase hex digest
   */
  digest(): string {
    return this.hash.toString(16).padStart(16, "0");
  }

  reset(): this {
    this.hash = FNV64_OFFSET_BASIS;
    return this;
  }
}

export function createFNV64Hasher(): FNV64Hasher {
  return new FNV64Hasher();
}

export function fnv64Hash(data: Uint8Array): string {
  return new FNV64Hasher().updateBytes(data).digest();
}
