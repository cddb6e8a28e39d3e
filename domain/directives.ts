/**
 * Directive adapter — turns parsed DATES / TSTEP input into time map appends.
 * Tokenizing and record extraction happen upstream; this module only trusts
 * the keyword classification below.
 */

import { SECONDS_PER_DAY, type Instant } from "./core.js";
import { makeInstant } from "./calendar.js";
import { WrongDirectiveKindError } from "./errors.js";
import { monthIndex } from "./monthNames.js";
import type { TimeMap } from "./timeMap.js";

export type DirectiveKind = "absolute" | "advance";

export const DATES_KEYWORD = "DATES";
export const TSTEP_KEYWORD = "TSTEP";

const KEYWORD_KINDS: ReadonlyMap<string, DirectiveKind> = new Map([
  [DATES_KEYWORD, "absolute"],
  [TSTEP_KEYWORD, "advance"],
]);

/** Which directive kind a keyword produces, or undefined for any other keyword. */
export function classifyKeyword(name: string): DirectiveKind | undefined {
  return KEYWORD_KINDS.get(name);
}

/** One DATES record: day, month token, year and an optional "HH:MM:SS". */
export interface DateRecord {
  readonly day: number;
  readonly month: string;
  readonly year: number;
  readonly time?: string;
}

export interface AbsoluteDateDirective extends DateRecord {
  readonly kind: "absolute";
  readonly keyword: string;
}

export interface RelativeAdvanceDirective {
  readonly kind: "advance";
  readonly keyword: string;
  /** May carry a fractional day. */
  readonly days: number;
}

export type Directive = AbsoluteDateDirective | RelativeAdvanceDirective;

/** Keyword as handed over by the deck layer. Only DATES and TSTEP are read. */
export interface ScheduleKeyword {
  readonly name: string;
  readonly records?: readonly DateRecord[];
  readonly steps?: readonly number[];
}

export interface TimeOfDay {
  readonly hour: number;
  readonly minute: number;
  readonly second: number;
}

const MIDNIGHT: TimeOfDay = { hour: 0, minute: 0, second: 0 };

// Three integers separated by ':'; each may have leading blanks and a sign.
const TIME_OF_DAY = /^\s*([+-]?\d+):\s*([+-]?\d+):\s*([+-]?\d+)/;

/**
 * Lenient "HH:MM:SS" reader. Text without three numeric fields yields
 * midnight. Values are not range-checked here.
 */
export function parseTimeOfDay(text: string | undefined): TimeOfDay {
  if (text === undefined) return MIDNIGHT;
  const match = TIME_OF_DAY.exec(text);
  if (!match) return MIDNIGHT;
  const [, h, m, s] = match;
  return { hour: Number(h), minute: Number(m), second: Number(s) };
}

export function instantFromDateRecord(record: DateRecord): Instant {
  const { hour, minute, second } = parseTimeOfDay(record.time);
  return makeInstant(record.year, monthIndex(record.month), record.day, hour, minute, second);
}

/** Whole seconds in days, truncated toward zero. */
export function daysToSeconds(days: number): number {
  return Math.trunc(days * SECONDS_PER_DAY);
}

function requireKind(keyword: string, expected: DirectiveKind): void {
  const actual = classifyKeyword(keyword);
  if (actual !== expected) {
    throw new WrongDirectiveKindError(`Keyword ${keyword} does not produce ${expected} directives`, {
      keyword,
      expected,
      actual: actual ?? null,
    });
  }
}

export function applyDirective(map: TimeMap, directive: Directive): void {
  requireKind(directive.keyword, directive.kind);
  switch (directive.kind) {
    case "absolute":
      map.addTime(instantFromDateRecord(directive));
      return;
    case "advance":
      map.addStep(daysToSeconds(directive.days));
      return;
  }
}

/** Applies directives in order. Stops at the first failure. */
export function applyDirectives(map: TimeMap, directives: readonly Directive[]): void {
  for (const d of directives) applyDirective(map, d);
}

/* -------------------------
 * Keyword level
 * ------------------------- */

export function addFromDatesKeyword(map: TimeMap, keyword: ScheduleKeyword): void {
  requireKind(keyword.name, "absolute");
  for (const record of keyword.records ?? []) {
    map.addTime(instantFromDateRecord(record));
  }
}

export function addFromTstepKeyword(map: TimeMap, keyword: ScheduleKeyword): void {
  requireKind(keyword.name, "advance");
  for (const days of keyword.steps ?? []) {
    map.addStep(daysToSeconds(days));
  }
}

/**
 * Expands DATES records and TSTEP steps into directives, in document order.
 * Every other keyword is skipped.
 */
export function directivesFromKeywords(keywords: readonly ScheduleKeyword[]): Directive[] {
  const out: Directive[] = [];
  for (const kw of keywords) {
    const kind = classifyKeyword(kw.name);
    if (kind === "absolute") {
      for (const record of kw.records ?? []) {
        out.push({ ...record, kind, keyword: kw.name });
      }
    } else if (kind === "advance") {
      for (const days of kw.steps ?? []) {
        out.push({ kind, keyword: kw.name, days });
      }
    }
  }
  return out;
}

/** Instant of an explicit start record, or the given default. */
export function startInstant(record: DateRecord | undefined, fallback: Instant): Instant {
  return record === undefined ? fallback : instantFromDateRecord(record);
}
