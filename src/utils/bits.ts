// src/utils/bits.ts

import type { Endianness } from "../types/catalog";

/**
 * Number of payload bits a field needs. Both byte orders count bits from
 * the start of byte 0, so the field ends at startBit + bitLength.
 */
export function requiredBits(startBit: number, bitLength: number): number {
  return startBit + bitLength;
}

/** Flatten bytes into single bits in the order the byte order numbers them */
function toBits(bytes: ArrayLike<number>, endianness: Endianness): number[] {
  const bits: number[] = [];
  for (let i = 0; i < bytes.length; i++) {
    const b = bytes[i];
    if (endianness === "little") {
      for (let bit = 0; bit < 8; bit++) bits.push((b >> bit) & 1);
    } else {
      for (let bit = 7; bit >= 0; bit--) bits.push((b >> bit) & 1);
    }
  }
  return bits;
}

/**
 * Extract a bitfield from a byte array.
 * Little endian reads the field LSB first, big endian MSB first.
 * Uses BigInt for fields wider than 32 bits so the sign bit and
 * high bits survive.
 */
export function extractBits(
  bytes: ArrayLike<number>,
  startBit: number,
  bitLength: number,
  endianness: Endianness,
  signed?: boolean
): number {
  if (bitLength <= 0) return 0;

  if (bitLength > 32) {
    return extractBitsBigInt(bytes, startBit, bitLength, endianness, signed);
  }

  const slice = toBits(bytes, endianness).slice(startBit, startBit + bitLength);
  let value = 0;
  if (endianness === "little") {
    for (let i = slice.length - 1; i >= 0; i--) {
      value = value * 2 + slice[i];
    }
  } else {
    for (let i = 0; i < slice.length; i++) {
      value = value * 2 + slice[i];
    }
  }
  if (signed && value >= 2 ** (bitLength - 1)) {
    value -= 2 ** bitLength;
  }
  return value;
}

function extractBitsBigInt(
  bytes: ArrayLike<number>,
  startBit: number,
  bitLength: number,
  endianness: Endianness,
  signed?: boolean
): number {
  const slice = toBits(bytes, endianness).slice(startBit, startBit + bitLength);
  let value = 0n;
  if (endianness === "little") {
    for (let i = slice.length - 1; i >= 0; i--) {
      value = (value << 1n) | BigInt(slice[i]);
    }
  } else {
    for (let i = 0; i < slice.length; i++) {
      value = (value << 1n) | BigInt(slice[i]);
    }
  }

  if (signed) {
    const signBit = 1n << BigInt(bitLength - 1);
    if (value & signBit) {
      value = value - (1n << BigInt(bitLength));
    }
  }

  // Physical values end up as doubles anyway
  return Number(value);
}
