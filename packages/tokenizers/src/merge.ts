/**
 * Byte-pair merge engine.
 *
 * A piece starts as one span per byte. At every step the adjacent pair whose
 * concatenation has the lowest rank in the encoder is merged into one span
 * (leftmost pair on ties), until no adjacent pair is in the encoder. The
 * output is the rank of each remaining span, left to right.
 *
 * Two strategies implement this with identical results: a linear rescan for
 * short pieces, and a min-heap over a linked list of spans for long ones.
 */
import type { ByteString, Rank } from "@ranktok/core";

/** Rank lookup; `undefined` means "not mergeable". */
export interface RankLookup {
  get(key: ByteString): Rank | undefined;
}

/** Pieces shorter than this use the linear strategy. */
export const HEAP_MERGE_THRESHOLD = 128;

const NO_RANK = Number.MAX_SAFE_INTEGER;

/**
 * Span boundaries after merging: `[0, b1, b2, ..., piece.length]`.
 * Span `i` covers `piece.slice(out[i], out[i + 1])`.
 */
export function mergeBoundaries(piece: ByteString, ranks: RankLookup): number[] {
  return piece.length < HEAP_MERGE_THRESHOLD
    ? linearMergeBoundaries(piece, ranks)
    : heapMergeBoundaries(piece, ranks);
}

/** Ranks of the merged spans of `piece`. Never longer than the piece. */
export function bytePairMerge(piece: ByteString, ranks: RankLookup): Rank[] {
  if (piece.length === 1) return [rankOrThrow(piece, ranks)];
  const bounds = mergeBoundaries(piece, ranks);
  const out: Rank[] = new Array(bounds.length - 1);
  for (let i = 0; i < bounds.length - 1; i++) {
    out[i] = rankOrThrow(piece.slice(bounds[i], bounds[i + 1]), ranks);
  }
  return out;
}

/** The merged spans themselves, as byte strings. */
export function bytePairSplit(piece: ByteString, ranks: RankLookup): ByteString[] {
  if (piece.length === 1) return [piece];
  const bounds = mergeBoundaries(piece, ranks);
  const out: ByteString[] = new Array(bounds.length - 1);
  for (let i = 0; i < bounds.length - 1; i++) {
    out[i] = piece.slice(bounds[i], bounds[i + 1]);
  }
  return out;
}

// ── Linear strategy ──────────────────────────────────────────────────────

/**
 * O(n²) rescan. `starts[i]` is the first byte of span i, with `piece.length`
 * as a trailing sentinel; `pairRanks[i]` is the rank of spans i and i+1
 * merged.
 */
export function linearMergeBoundaries(piece: ByteString, ranks: RankLookup): number[] {
  const n = piece.length;
  const starts: number[] = new Array(n + 1);
  for (let i = 0; i <= n; i++) starts[i] = i;

  const pairRank = (i: number): number => {
    if (i + 2 >= starts.length) return NO_RANK;
    return ranks.get(piece.slice(starts[i], starts[i + 2])) ?? NO_RANK;
  };

  const pairRanks: number[] = new Array(Math.max(0, n - 1));
  for (let i = 0; i < n - 1; i++) pairRanks[i] = pairRank(i);

  while (pairRanks.length > 0) {
    let minRank = NO_RANK;
    let minIdx = -1;
    for (let i = 0; i < pairRanks.length; i++) {
      if (pairRanks[i] < minRank) {
        minRank = pairRanks[i];
        minIdx = i;
      }
    }
    if (minIdx === -1) break;

    // Span minIdx absorbs span minIdx + 1.
    starts.splice(minIdx + 1, 1);
    pairRanks.splice(minIdx, 1);

    // Only the pairs touching the merged span changed.
    if (minIdx < pairRanks.length) pairRanks[minIdx] = pairRank(minIdx);
    if (minIdx > 0) pairRanks[minIdx - 1] = pairRank(minIdx - 1);
  }

  return starts;
}

// ── Heap strategy ────────────────────────────────────────────────────────

/**
 * Min-heap keyed by (rank, position) over a doubly-linked list of spans.
 *
 * A span is identified by its first byte offset, which never changes: a
 * merge keeps the left span and unlinks the right one. Each heap entry names
 * the left span of a pair. Entries go stale when either span is merged
 * away or grows; stale entries are detected and skipped at pop time by
 * recomputing the pair's rank.
 * Capacity: initial pairs (≤ n-1) + at most 2 new pairs per merge, merges < n → max 3n.
 */
export function heapMergeBoundaries(piece: ByteString, ranks: RankLookup): number[] {
  const n = piece.length;
  if (n <= 1) return n === 0 ? [0] : [0, 1];

  // ── Doubly-linked list of spans ──
  const nodeNext = new Int32Array(n);
  const nodePrev = new Int32Array(n);
  const deleted = new Uint8Array(n);
  for (let i = 0; i < n; i++) {
    nodePrev[i] = i - 1;
    nodeNext[i] = i + 1;
  }
  nodeNext[n - 1] = -1;

  /** Rank of span `pos` merged with its successor, or NO_RANK. */
  const pairRank = (pos: number): number => {
    const nxt = nodeNext[pos];
    if (nxt === -1) return NO_RANK;
    const after = nodeNext[nxt];
    const end = after === -1 ? n : after;
    return ranks.get(piece.slice(pos, end)) ?? NO_RANK;
  };

  // ── Binary min-heap ──
  const heapCap = n * 3;
  const heapRank = new Float64Array(heapCap);
  const heapPos = new Int32Array(heapCap);
  let heapSize = 0;

  const less = (a: number, b: number): boolean =>
    heapRank[a] < heapRank[b] || (heapRank[a] === heapRank[b] && heapPos[a] < heapPos[b]);

  const swap = (a: number, b: number): void => {
    const tr = heapRank[a]; heapRank[a] = heapRank[b]; heapRank[b] = tr;
    const tp = heapPos[a]; heapPos[a] = heapPos[b]; heapPos[b] = tp;
  };

  const heapPush = (rank: number, pos: number): void => {
    let i = heapSize++;
    heapRank[i] = rank;
    heapPos[i] = pos;
    // Bubble up
    while (i > 0) {
      const p = (i - 1) >> 1;
      if (!less(i, p)) break;
      swap(i, p);
      i = p;
    }
  };

  const heapPop = (): void => {
    heapSize--;
    if (heapSize === 0) return;
    heapRank[0] = heapRank[heapSize];
    heapPos[0] = heapPos[heapSize];
    // Sink down
    let i = 0;
    while (true) {
      let s = i;
      const l = 2 * i + 1;
      const r = 2 * i + 2;
      if (l < heapSize && less(l, s)) s = l;
      if (r < heapSize && less(r, s)) s = r;
      if (s === i) break;
      swap(s, i);
      i = s;
    }
  };

  for (let i = 0; i < n - 1; i++) {
    const rank = pairRank(i);
    if (rank !== NO_RANK) heapPush(rank, i);
  }

  // ── Process merges in (rank, position) order ──
  while (heapSize > 0) {
    const rank = heapRank[0];
    const pos = heapPos[0];
    heapPop();

    if (deleted[pos]) continue;
    if (pairRank(pos) !== rank) continue;

    // Merge: pos absorbs its successor.
    const nxt = nodeNext[pos];
    deleted[nxt] = 1;
    nodeNext[pos] = nodeNext[nxt];
    if (nodeNext[nxt] !== -1) nodePrev[nodeNext[nxt]] = pos;

    const prv = nodePrev[pos];
    if (prv !== -1) {
      const left = pairRank(prv);
      if (left !== NO_RANK) heapPush(left, prv);
    }
    const right = pairRank(pos);
    if (right !== NO_RANK) heapPush(right, pos);
  }

  // ── Collect surviving span starts ──
  const bounds: number[] = [];
  for (let cur = 0; cur !== -1; cur = nodeNext[cur]) bounds.push(cur);
  bounds.push(n);
  return bounds;
}

function rankOrThrow(key: ByteString, ranks: RankLookup): Rank {
  const rank = ranks.get(key);
  if (rank === undefined) {
    // Unreachable with a table that covers every single byte.
    throw new Error(`No rank for a span of ${key.length} byte(s)`);
  }
  return rank;
}
