import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { AllowAll, AllowNone, allowSet } from "@ranktok/core";
import { CL100K_PATTERN, Encoding } from "@ranktok/tokenizers";
import { byteRanks, EOT, FIM, toyEncoding, toyParams } from "./fixtures.js";

const bytesOf = (text: string) => Array.from(new TextEncoder().encode(text));

describe("Encoding construction", () => {
  it("accepts a matching explicit vocabulary size", () => {
    const params = { ...toyParams(["hi"], { [EOT]: 257 }), explicitNVocab: 258 };
    const enc = Effect.runSync(Encoding.make(params));
    expect(enc.nVocab).toBe(258);
  });

  it("rejects a token count that disagrees with the explicit size", () => {
    const params = { ...toyParams(["hi"]), explicitNVocab: 300 };
    const error = Effect.runSync(Effect.flip(Encoding.make(params)));
    expect(error._tag).toBe("ConfigError");
    expect(error.message).toBe("toy: expected 300 tokens, found 257");
  });

  it("rejects a max token value that disagrees with the explicit size", () => {
    const params = { ...toyParams([], { [EOT]: 400 }), explicitNVocab: 257 };
    const error = Effect.runSync(Effect.flip(Encoding.make(params)));
    expect(error.message).toBe("toy: expected max token value 256, found 400");
  });

  it("rejects an invalid pattern", () => {
    const error = Effect.runSync(Effect.flip(Encoding.make(toyParams([], {}, "("))));
    expect(error._tag).toBe("ConfigError");
    expect(error.message.startsWith("Invalid segmentation pattern")).toBe(true);
  });

  it("is unaffected by later changes to the caller's ranks", () => {
    const ranks = byteRanks(["ab"]);
    const enc = Effect.runSync(Encoding.make({ ...toyParams(), mergeableRanks: ranks }));
    ranks.delete("a");
    expect(Array.from(enc.encodeOrdinary("xy ab"))).toEqual([120, 121, 32, 256]);
    expect(enc.params.mergeableRanks.get("a")).toBe(97);
  });

  it("round-trips a special rank at the top of the 32-bit range", () => {
    const enc = toyEncoding([], { "<s>": 2147483647 });
    const tokens = Effect.runSync(enc.encode("<s>", AllowAll));
    expect(Array.from(tokens)).toEqual([2147483647]);
    expect(Effect.runSync(enc.decode(tokens))).toBe("<s>");
  });

  it("reports its vocabulary facts", () => {
    const enc = toyEncoding(["hi"], { [EOT]: 1000, [FIM]: 1001 });
    expect(enc.name).toBe("toy");
    expect(enc.maxTokenValue).toBe(1001);
    expect(enc.nVocab).toBe(1002);
    expect(enc.eotToken).toBe(1000);
    expect(enc.specialTokensSet()).toEqual(new Set([EOT, FIM]));
    expect(enc.tokenByteValues()).toHaveLength(257);
    expect(enc.toString()).toBe("<Encoding 'toy'>");
    expect(toyEncoding().eotToken).toBeUndefined();
  });
});

describe("encodeOrdinary", () => {
  const enc = toyEncoding(["hi", "he", "ll", "hell", " w"]);

  it("merges within pieces", () => {
    expect(Array.from(enc.encodeOrdinary("hi"))).toEqual([256]);
    // "hello" -> hell + o; " world" -> " w" + o r l d
    expect(Array.from(enc.encodeOrdinary("hello world"))).toEqual([259, 111, 260, 111, 114, 108, 100]);
  });

  it("treats special literals as text", () => {
    const special = toyEncoding([], { [EOT]: 1000 });
    expect(Array.from(special.encodeOrdinary(EOT))).toEqual(bytesOf(EOT));
  });

  it("round-trips text", () => {
    for (const text of ["", "hello world", "naïve café", "日本語のテキスト", "emoji 🎉 ok", "  spaces\n\ttabs "]) {
      expect(Effect.runSync(enc.decode(enc.encodeOrdinary(text)))).toBe(text);
    }
  });

  it("never produces more tokens than bytes", () => {
    for (const text of ["hello", "hhhh", "日本", "a b c"]) {
      expect(enc.encodeOrdinary(text).length).toBeLessThanOrEqual(bytesOf(text).length);
    }
  });

  it("returns the same tokens with a warm cache", () => {
    const fresh = toyEncoding(["hi", "he", "ll", "hell", " w"]);
    const cold = Array.from(fresh.encodeOrdinary("hello hello"));
    expect(fresh.cache.stats()).toEqual({ hits: 0, misses: 2, size: 2 });
    const warm = Array.from(fresh.encodeOrdinary("hello hello"));
    expect(warm).toEqual(cold);
    expect(fresh.cache.stats()).toEqual({ hits: 2, misses: 2, size: 2 });
  });

  it("follows the segmentation pattern", () => {
    const cl = toyEncoding(["12"], {}, CL100K_PATTERN);
    // digits are split in groups of three, so "1234" never becomes 12 + 34
    expect(Array.from(cl.encodeOrdinary("1234"))).toEqual([256, 51, 52]);
  });
});

describe("encode", () => {
  const enc = toyEncoding(["hi"], { [EOT]: 1000, [FIM]: 1001 });

  it("emits permitted special tokens", () => {
    expect(Array.from(Effect.runSync(enc.encode(`hi${EOT}`, AllowAll)))).toEqual([256, 1000]);
    expect(Array.from(Effect.runSync(enc.encode(`a${EOT}b`, allowSet([EOT]))))).toEqual([97, 1000, 98]);
  });

  it("forbids every special token by default", () => {
    const error = Effect.runSync(Effect.flip(enc.encode(`hi${EOT}`)));
    expect(error._tag).toBe("SpecialTokenViolation");
    expect(error.literal).toBe(EOT);
    expect(error.message.startsWith(`Encountered text corresponding to disallowed special token "${EOT}".`)).toBe(true);
  });

  it("forbids the literals outside an allow-set", () => {
    const error = Effect.runSync(Effect.flip(enc.encode(`a${FIM}b${EOT}`, allowSet([FIM]))));
    expect(error.literal).toBe(EOT);
    expect(error.literals).toEqual([EOT]);
  });

  it("names every distinct offender in order", () => {
    const error = Effect.runSync(Effect.flip(enc.encode(`${FIM}x${EOT}${FIM}`, AllowNone)));
    expect(error.literals).toEqual([FIM, EOT]);
  });

  it("encodes text without special literals under any policy", () => {
    expect(Array.from(Effect.runSync(enc.encode("hi there", AllowNone)))).toEqual(
      Array.from(enc.encodeOrdinary("hi there")),
    );
    expect(Array.from(Effect.runSync(enc.encode("")))).toEqual([]);
  });

  it("prefers the longest literal at a position", () => {
    const overlap = toyEncoding([], { "<s>": 1000, "<s>x": 1001 });
    expect(Array.from(Effect.runSync(overlap.encode("<s>x<s>", AllowAll)))).toEqual([1001, 1000]);
  });

  it("keeps special tokens atomic through decode", () => {
    const tokens = Effect.runSync(enc.encode(`a${EOT}${EOT}b`, AllowAll));
    expect(Array.from(tokens)).toEqual([97, 1000, 1000, 98]);
    expect(Effect.runSync(enc.decode(tokens))).toBe(`a${EOT}${EOT}b`);
  });
});

describe("decode", () => {
  const enc = toyEncoding(["hi"], { [EOT]: 1000 });

  it("fails on an unknown rank", () => {
    const error = Effect.runSync(Effect.flip(enc.decode([104, 5000])));
    expect(error._tag).toBe("DecodeError");
    expect(error.token).toBe(5000);
    expect(error.message).toBe("Token 5000 not found");
  });

  it("fails on invalid UTF-8 in strict mode", () => {
    const error = Effect.runSync(Effect.flip(enc.decode([0xff])));
    expect(error.message).toBe("Decoded bytes are not valid UTF-8");
  });

  it("substitutes U+FFFD in lossy mode", () => {
    expect(Effect.runSync(enc.decode([104, 0xff, 105], "lossy"))).toBe("h\uFFFDi");
  });

  it("keeps a leading byte order mark", () => {
    const text = "\uFEFFhi";
    expect(Effect.runSync(enc.decode(enc.encodeOrdinary(text)))).toBe(text);
  });

  it("returns raw bytes", () => {
    expect(Array.from(Effect.runSync(enc.decodeBytes([256, 0xff])))).toEqual([104, 105, 255]);
    expect(Array.from(Effect.runSync(enc.decodeSingleTokenBytes(1000)))).toEqual(bytesOf(EOT));
    expect(Effect.runSync(enc.decodeTokensBytes([256, 33])).map((b) => Array.from(b))).toEqual([[104, 105], [33]]);
  });

  it("hands out copies of token bytes", () => {
    const first = Effect.runSync(enc.decodeSingleTokenBytes(256));
    first[0] = 0;
    expect(Array.from(Effect.runSync(enc.decodeSingleTokenBytes(256)))).toEqual([104, 105]);
  });
});

describe("encodeSingleToken", () => {
  const enc = toyEncoding(["hi"], { [EOT]: 1000 });

  it("finds ordinary and special tokens", () => {
    expect(Effect.runSync(enc.encodeSingleToken("hi"))).toBe(256);
    expect(Effect.runSync(enc.encodeSingleToken(new Uint8Array([104, 105])))).toBe(256);
    expect(Effect.runSync(enc.encodeSingleToken(EOT))).toBe(1000);
    expect(Effect.runSync(enc.encodeSingleToken(new TextEncoder().encode(EOT)))).toBe(1000);
  });

  it("prefers the ordinary token when a literal is also ordinary bytes", () => {
    const overlapping = toyEncoding(["hi"], { hi: 1000 });
    expect(Effect.runSync(overlapping.encodeSingleToken("hi"))).toBe(256);
    expect(Effect.runSync(overlapping.encodeSingleToken(new Uint8Array([104, 105])))).toBe(256);
  });

  it("fails on bytes that are not one token", () => {
    const error = Effect.runSync(Effect.flip(enc.encodeSingleToken("xyz")));
    expect(error._tag).toBe("EncodeError");
    expect(error.message).toBe("Could not encode [120,121,122] to a token");
  });
});

describe("encodeWithUnstable", () => {
  const completions = (result: { completions: Int32Array[] }) => result.completions.map((c) => Array.from(c));

  it("offers every token that extends the last piece", () => {
    const enc = toyEncoding(["ab", " a", " ab"]);
    const result = Effect.runSync(enc.encodeWithUnstable("x a"));
    expect(Array.from(result.tokens)).toEqual([120]);
    expect(completions(result)).toEqual([[257], [258]]);
  });

  it("re-encodes the tail with each token that could straddle it", () => {
    const enc = toyEncoding(["ab"]);
    const result = Effect.runSync(enc.encodeWithUnstable("ba"));
    expect(Array.from(result.tokens)).toEqual([]);
    expect(completions(result)).toEqual([
      [98, 97],
      [98, 256],
    ]);
  });

  it("treats a trailing run of whitespace tokens as unstable", () => {
    const enc = toyEncoding([], {}, CL100K_PATTERN);
    const result = Effect.runSync(enc.encodeWithUnstable("a\n "));
    expect(Array.from(result.tokens)).toEqual([97]);
    expect(completions(result)).toEqual([[10, 32]]);
  });

  it("has nothing unstable after a special token", () => {
    const enc = toyEncoding([], { "<s>": 300 });
    const result = Effect.runSync(enc.encodeWithUnstable("x<s>", AllowAll));
    expect(Array.from(result.tokens)).toEqual([120, 300]);
    expect(result.completions).toEqual([]);
    expect(Effect.runSync(enc.encodeWithUnstable("")).tokens).toHaveLength(0);
  });

  it("enforces the special-token policy", () => {
    const enc = toyEncoding([], { "<s>": 300 });
    const error = Effect.runSync(Effect.flip(enc.encodeWithUnstable("x<s>")));
    expect(error._tag).toBe("SpecialTokenViolation");
  });
});
