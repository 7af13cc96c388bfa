// src/utils/signalKey.ts

import type { SignalKey } from "../types/signal";

/** "Message.Signal", used in workspace files and log lines */
export function formatSignalKey(key: SignalKey): string {
  return `${key.messageName}.${key.signalName}`;
}

/**
 * Parse "Message.Signal". Splits at the first dot; message names
 * never contain one.
 */
export function parseSignalKey(text: string): SignalKey | null {
  const dot = text.indexOf(".");
  if (dot <= 0 || dot === text.length - 1) return null;
  return {
    messageName: text.slice(0, dot),
    signalName: text.slice(dot + 1),
  };
}

export function sameSignalKey(a: SignalKey, b: SignalKey): boolean {
  return a.messageName === b.messageName && a.signalName === b.signalName;
}
