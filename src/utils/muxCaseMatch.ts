// src/utils/muxCaseMatch.ts
//
// Mux case keys: single values ("0"), inclusive ranges ("0-3") or
// comma-separated lists ("1,2,5"). Lists may contain ranges ("1,4-6").

const CASE_PART = /^\s*\d+\s*(-\s*\d+\s*)?$/;

/** True if a table key inside a mux section names a case */
export function isMuxCaseKey(key: string): boolean {
  if (key.length === 0) return false;
  return key.split(",").every((part) => CASE_PART.test(part));
}

/** Does the selector value fall in this case key? */
export function muxCaseMatches(caseKey: string, value: number): boolean {
  if (!isMuxCaseKey(caseKey)) return false;
  for (const part of caseKey.split(",")) {
    const [lo, hi] = part.split("-").map((s) => parseInt(s.trim(), 10));
    if (hi === undefined ? value === lo : value >= lo && value <= hi) {
      return true;
    }
  }
  return false;
}
