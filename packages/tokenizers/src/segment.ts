/**
 * Segmentation pipeline.
 *
 * Splits text into permitted special-token literals and ordinary pieces.
 * Ordinary spans between literals are cut by the segmentation pattern into
 * pieces the merge engine handles one at a time; a merge never crosses a
 * piece boundary.
 */
import { Effect } from "effect";
import {
  ConfigError,
  specialTokenViolation,
  type Rank,
  type SpecialPolicy,
  type SpecialTokenViolation,
} from "@ranktok/core";

export type Segment =
  | { readonly _tag: "Ordinary"; readonly piece: string }
  | { readonly _tag: "Special"; readonly literal: string; readonly rank: Rank };

export function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** Compile a segmentation pattern with the global and unicode flags. */
export function compilePattern(patStr: string): Effect.Effect<RegExp, ConfigError> {
  return Effect.try({
    try: () => new RegExp(patStr, "gu"),
    catch: (cause) =>
      new ConfigError({ message: `Invalid segmentation pattern: ${String(cause)}`, cause }),
  });
}

/**
 * Alternation over `literals`, longest first so a longer literal wins over a
 * shorter one starting at the same position. `null` for an empty set.
 */
export function literalPattern(literals: Iterable<string>): RegExp | null {
  const sorted = [...literals].sort((a, b) => b.length - a.length || (a < b ? -1 : a > b ? 1 : 0));
  if (sorted.length === 0) return null;
  return new RegExp(sorted.map(escapeRegex).join("|"), "g");
}

/** Call `onPiece` for every match of `pattern` in `text`, skipping empty matches. */
export function forEachPiece(text: string, pattern: RegExp, onPiece: (piece: string) => void): void {
  // A private copy keeps lastIndex state off the shared pattern.
  const re = new RegExp(pattern.source, pattern.flags);
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    if (m[0].length === 0) {
      re.lastIndex++;
      continue;
    }
    onPiece(m[0]);
  }
}

export function splitOrdinary(text: string, pattern: RegExp): string[] {
  const pieces: string[] = [];
  forEachPiece(text, pattern, (piece) => pieces.push(piece));
  return pieces;
}

/**
 * Knows the special-token table and the literal patterns each policy needs.
 * Patterns for explicit allow-sets are compiled on first use and memoized;
 * the memo only ever gains entries equal to what a recompile would produce.
 */
export class SpecialMatcher {
  private readonly _special: ReadonlyMap<string, Rank>;
  private readonly _all: RegExp | null;
  private readonly _memo = new Map<string, RegExp | null>();

  constructor(special: ReadonlyMap<string, Rank>) {
    this._special = special;
    this._all = literalPattern(special.keys());
  }

  get hasSpecialTokens(): boolean {
    return this._all !== null;
  }

  /** Pattern over the literals `policy` forbids, or `null` if none are. */
  forbidden(policy: SpecialPolicy): RegExp | null {
    switch (policy._tag) {
      case "AllowAll":
        return null;
      case "AllowNone":
        return this._all;
      case "AllowSet":
        return this._memoized("forbid", [...this._special.keys()].filter((l) => !policy.allowed.has(l)));
    }
  }

  /** Pattern over the literals `policy` permits, or `null` if none are. */
  permitted(policy: SpecialPolicy): RegExp | null {
    switch (policy._tag) {
      case "AllowAll":
        return this._all;
      case "AllowNone":
        return null;
      case "AllowSet":
        return this._memoized("permit", [...this._special.keys()].filter((l) => policy.allowed.has(l)));
    }
  }

  /**
   * Fails when `text` contains a literal the policy forbids, naming every
   * distinct offender in order of first occurrence.
   */
  check(text: string, policy: SpecialPolicy): Effect.Effect<void, SpecialTokenViolation> {
    return Effect.suspend(() => {
      const forbidden = this.forbidden(policy);
      if (forbidden === null) return Effect.void;
      const found = new Set<string>();
      for (const m of text.matchAll(new RegExp(forbidden.source, forbidden.flags))) {
        found.add(m[0]);
      }
      if (found.size === 0) return Effect.void;
      return Effect.fail(specialTokenViolation([...found]));
    });
  }

  /**
   * Walk `text`, calling `onOrdinary` for each span between permitted
   * literals and `onSpecial` for each literal, in text order.
   */
  partition(
    text: string,
    policy: SpecialPolicy,
    onOrdinary: (span: string) => void,
    onSpecial: (literal: string, rank: Rank) => void,
  ): void {
    const permitted = this.permitted(policy);
    if (permitted === null) {
      if (text.length > 0) onOrdinary(text);
      return;
    }
    const re = new RegExp(permitted.source, permitted.flags);
    let start = 0;
    let m: RegExpExecArray | null;
    while ((m = re.exec(text)) !== null) {
      if (m.index > start) onOrdinary(text.slice(start, m.index));
      const rank = this._special.get(m[0]);
      if (rank !== undefined) onSpecial(m[0], rank);
      start = m.index + m[0].length;
    }
    if (start < text.length) onOrdinary(text.slice(start));
  }

  private _memoized(kind: string, literals: string[]): RegExp | null {
    const key = `${kind}\u0000${[...literals].sort().join("\u0000")}`;
    if (this._memo.has(key)) return this._memo.get(key) ?? null;
    const re = literalPattern(literals);
    this._memo.set(key, re);
    return re;
  }
}

/**
 * Full segmentation: policy check, partition on permitted literals, then
 * pattern split of each ordinary span.
 */
export function segment(
  text: string,
  policy: SpecialPolicy,
  matcher: SpecialMatcher,
  pattern: RegExp,
): Effect.Effect<Segment[], SpecialTokenViolation> {
  return matcher.check(text, policy).pipe(
    Effect.map(() => {
      const out: Segment[] = [];
      matcher.partition(
        text,
        policy,
        (span) => forEachPiece(span, pattern, (piece) => out.push({ _tag: "Ordinary", piece })),
        (literal, rank) => out.push({ _tag: "Special", literal, rank }),
      );
      return out;
    }),
  );
}
