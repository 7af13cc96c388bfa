// src/types/catalog.ts

export type Endianness = "little" | "big";
export type SignalFormat = "enum" | "ascii" | "utf8" | "hex" | "unix_time";

/** Formats that decode to text rather than a plottable number */
export const TEXT_SIGNAL_FORMATS: readonly SignalFormat[] = ["ascii", "utf8"];

export interface CatalogMetadata {
  name: string;
  version: number;
}
