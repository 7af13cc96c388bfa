// src/utils/signalDecode.ts

import Decimal from "decimal.js-light";
import type { MuxCondition, SignalDefinition } from "../types/signal";
import { extractBits, requiredBits } from "./bits";
import { DecodeError } from "./errors";
import { muxCaseMatches } from "./muxCaseMatch";

function checkLength(bytes: ArrayLike<number>, frameId: number, startBit: number, bitLength: number): void {
  const needed = requiredBits(startBit, bitLength);
  if (bytes.length * 8 < needed) {
    throw new DecodeError(frameId, bytes.length, needed);
  }
}

/**
 * Whether every multiplexer gate of a signal is open for this payload.
 * Signals without gates are always present.
 * @throws DecodeError if the payload cannot hold a selector
 */
export function muxSelects(
  bytes: ArrayLike<number>,
  conditions: readonly MuxCondition[] | undefined,
  frameId: number
): boolean {
  if (!conditions) return true;
  for (const cond of conditions) {
    checkLength(bytes, frameId, cond.startBit, cond.bitLength);
    const selector = extractBits(bytes, cond.startBit, cond.bitLength, cond.byteOrder, false);
    if (!muxCaseMatches(cond.caseKey, selector)) return false;
  }
  return true;
}

/** Raw integer of a signal, before scaling */
export function decodeRaw(bytes: ArrayLike<number>, def: SignalDefinition, frameId: number): number {
  checkLength(bytes, frameId, def.startBit, def.bitLength);
  return extractBits(bytes, def.startBit, def.bitLength, def.byteOrder, def.signed);
}

/**
 * Physical value of a signal: raw * scale + offset.
 * Scaled in Decimal, so 3 * 0.1 decodes to 0.3. Values outside min/max
 * are returned as decoded.
 * @throws DecodeError if the payload is shorter than the signal's bit range
 */
export function decodeSignalValue(bytes: ArrayLike<number>, def: SignalDefinition, frameId: number): number {
  const raw = decodeRaw(bytes, def, frameId);
  return new Decimal(raw).mul(def.scale).add(def.offset).toNumber();
}
