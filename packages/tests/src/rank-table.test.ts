import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { MAX_RANK, RankTable } from "@ranktok/tokenizers";
import { byteRanks } from "./fixtures.js";

function makeError(ranks: Map<string, number>, specials: Record<string, number> = {}) {
  return Effect.runSync(Effect.flip(RankTable.make(ranks, specials)));
}

describe("RankTable", () => {
  it("maps both ways", () => {
    const table = Effect.runSync(RankTable.make(byteRanks(["hi"]), { "<s>": 300 }));
    expect(table.rankOf("hi")).toBe(256);
    expect(Array.from(table.bytesOf(256) ?? [])).toEqual([104, 105]);
    expect(table.specialRankOf("<s>")).toBe(300);
    expect(Array.from(table.bytesOf(300) ?? [])).toEqual([60, 115, 62]);
    expect(table.isSpecial(300)).toBe(true);
    expect(table.isSpecial(256)).toBe(false);
    expect(table.bytesOf(299)).toBeUndefined();
    expect(table.maxTokenValue).toBe(300);
    expect(table.ordinaryCount).toBe(257);
    expect(table.specialCount).toBe(1);
  });

  it("requires every single byte", () => {
    const ranks = byteRanks();
    ranks.delete("A");
    const error = makeError(ranks);
    expect(error._tag).toBe("ConfigError");
    expect(error.message).toBe("Encoder table has no entry for the single byte 0x41");
  });

  it("rejects two sequences with one rank", () => {
    const ranks = byteRanks();
    ranks.set("hi", 5);
    expect(makeError(ranks).message).toBe("Rank 5 is assigned to more than one byte sequence");
  });

  it("rejects negative and fractional ranks", () => {
    expect(makeError(byteRanks().set("hi", -1)).message).toBe("Invalid rank -1 in encoder table");
    expect(makeError(byteRanks().set("hi", 1.5)).message).toBe("Invalid rank 1.5 in encoder table");
  });

  it("rejects ranks that do not fit a signed 32-bit token", () => {
    expect(makeError(byteRanks().set("hi", 2 ** 31)).message).toBe("Invalid rank 2147483648 in encoder table");
    expect(makeError(byteRanks(), { "<s>": 2 ** 31 }).message).toBe(
      'Invalid rank 2147483648 for special token "<s>"',
    );
    const table = Effect.runSync(RankTable.make(byteRanks(), { "<s>": MAX_RANK }));
    expect(table.maxTokenValue).toBe(2147483647);
  });

  it("keeps its own copy of the ranks", () => {
    const ranks = byteRanks(["hi"]);
    const table = Effect.runSync(RankTable.make(ranks, {}));
    ranks.delete("a");
    ranks.set("zz", 999);
    expect(table.rankOf("a")).toBe(97);
    expect(table.rankOf("zz")).toBeUndefined();
    expect(table.ordinaryCount).toBe(257);
  });

  it("rejects keys that are not byte strings", () => {
    expect(makeError(byteRanks().set("Ā", 400)).message).toBe(
      "Encoder key for rank 400 is not a byte string",
    );
  });

  it("rejects a special rank that is also an ordinary rank", () => {
    expect(makeError(byteRanks(), { "<s>": 65 }).message).toBe(
      'Special token "<s>" has rank 65, which is also an ordinary rank',
    );
  });

  it("rejects two special tokens with one rank", () => {
    expect(makeError(byteRanks(), { "<s>": 300, "</s>": 300 }).message).toBe(
      "Rank 300 is assigned to more than one special token",
    );
  });

  it("rejects an empty special literal", () => {
    expect(makeError(byteRanks(), { "": 300 }).message).toBe("Special token literal must not be empty");
  });

  it("sorts token bytes bytewise", () => {
    const table = Effect.runSync(RankTable.make(byteRanks(["hi"]), {}));
    const sorted = table.sortedTokenBytes();
    expect(sorted).toHaveLength(257);
    expect(Array.from(sorted[0])).toEqual([0]);
    expect(Array.from(sorted[104])).toEqual([104]);
    expect(Array.from(sorted[105])).toEqual([104, 105]);
    expect(Array.from(sorted[106])).toEqual([105]);
  });
});
