/**
 * Month name tokens used by absolute-date records.
 * Case-sensitive. Accepts the aliases MAI, JLY, OKT and DES alongside the English tokens.
 */

import { UnknownMonthNameError } from "./errors.js";

export const MONTH_INDICES: ReadonlyMap<string, number> = new Map([
  ["JAN", 1],
  ["FEB", 2],
  ["MAR", 3],
  ["APR", 4],
  ["MAI", 5],
  ["MAY", 5],
  ["JUN", 6],
  ["JUL", 7],
  ["JLY", 7],
  ["AUG", 8],
  ["SEP", 9],
  ["OCT", 10],
  ["OKT", 10],
  ["NOV", 11],
  ["DEC", 12],
  ["DES", 12],
]);

/** 1-based month number for a month token. */
export function monthIndex(name: string): number {
  const month = MONTH_INDICES.get(name);
  if (month === undefined) {
    throw new UnknownMonthNameError(`Unknown month name "${name}"`, { name });
  }
  return month;
}
