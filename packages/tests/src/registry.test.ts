import { afterEach, describe, it, expect, vi } from "vitest";
import { Effect } from "effect";
import { AllowAll, defaultConfig, Registry, RegistryError, TokenizerService, type RanktokConfig } from "@ranktok/core";
import {
  dumpTiktokenBpe,
  encodingForModel,
  encodingNameForModel,
  listEncodingNames,
  makeEncodingRegistry,
} from "@ranktok/tokenizers";
import { EncodingLive } from "@ranktok/effect-runtime";
import { byteRanks } from "./fixtures.js";

describe("Registry", () => {
  it("builds each name once", () => {
    let builds = 0;
    const registry = new Registry<{ id: number }>("widget");
    registry.register("a", Effect.sync(() => ({ id: ++builds })));

    const first = Effect.runSync(registry.get("a"));
    const second = Effect.runSync(registry.get("a"));
    expect(second).toBe(first);
    expect(builds).toBe(1);
    expect(registry.has("a")).toBe(true);
    expect(registry.list()).toEqual(["a"]);
  });

  it("names the available entries for an unknown name", () => {
    const registry = new Registry<number>("widget");
    registry.register("a", Effect.succeed(1));
    registry.register("b", Effect.succeed(2));
    const error = Effect.runSync(Effect.flip(registry.get("zzz")));
    expect(error).toBeInstanceOf(RegistryError);
    expect(error.message).toBe('[widget] Unknown widget "zzz". Available: a, b');
  });

  it("retries a failed build", () => {
    let attempts = 0;
    const registry = new Registry<number, string>("widget");
    registry.register(
      "flaky",
      Effect.suspend(() => (attempts++ === 0 ? Effect.fail("boom") : Effect.succeed(7))),
    );
    expect(Effect.runSync(Effect.flip(registry.get("flaky")))).toBe("boom");
    expect(Effect.runSync(registry.get("flaky"))).toBe(7);
  });
});

describe("model lookup", () => {
  it("uses exact entries first", () => {
    expect(Effect.runSync(encodingNameForModel("gpt-4"))).toBe("cl100k_base");
    expect(Effect.runSync(encodingNameForModel("text-davinci-003"))).toBe("p50k_base");
    expect(Effect.runSync(encodingNameForModel("text-davinci-edit-001"))).toBe("p50k_edit");
    expect(Effect.runSync(encodingNameForModel("davinci"))).toBe("r50k_base");
    expect(Effect.runSync(encodingNameForModel("gpt2"))).toBe("gpt2");
  });

  it("falls back to known prefixes", () => {
    expect(Effect.runSync(encodingNameForModel("gpt-4-0613"))).toBe("cl100k_base");
    expect(Effect.runSync(encodingNameForModel("gpt-3.5-turbo-16k"))).toBe("cl100k_base");
  });

  it("fails for an unknown model", () => {
    const error = Effect.runSync(Effect.flip(encodingNameForModel("my-model")));
    expect(error._tag).toBe("RegistryError");
    expect(error.message.startsWith("Could not automatically map my-model to an encoding.")).toBe(true);
  });
});

describe("named encodings", () => {
  const config: RanktokConfig = { ...defaultConfig, cacheDir: null };
  const vocabulary = dumpTiktokenBpe(byteRanks(["hi"]));

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("lists every named encoding", () => {
    expect(listEncodingNames()).toEqual(["gpt2", "r50k_base", "p50k_base", "p50k_edit", "cl100k_base"]);
  });

  it("loads an encoding once per registry", async () => {
    const fetchMock = vi.fn(async () => new Response(vocabulary));
    vi.stubGlobal("fetch", fetchMock);
    const registry = makeEncodingRegistry(config);

    const enc = await Effect.runPromise(registry.get("cl100k_base"));
    expect(enc.name).toBe("cl100k_base");
    expect(enc.eotToken).toBe(100257);
    expect(enc.nVocab).toBe(100277);
    expect(Array.from(Effect.runSync(enc.encode("hi<|endofprompt|>", AllowAll)))).toEqual([256, 100276]);

    expect(await Effect.runPromise(registry.get("cl100k_base"))).toBe(enc);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("checks the explicit vocabulary size", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response(vocabulary)));
    const error = await Effect.runPromise(Effect.flip(makeEncodingRegistry(config).get("p50k_base")));
    expect(error._tag).toBe("ConfigError");
    expect(error.message).toBe("p50k_base: expected 50281 tokens, found 257");
  });

  it("resolves a model to its encoding", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response(vocabulary)));
    const enc = await Effect.runPromise(encodingForModel("text-davinci-edit-001", makeEncodingRegistry(config)));
    expect(enc.name).toBe("p50k_edit");
    expect(enc.specialTokensSet().size).toBe(4);
  });

  it("provides a loaded encoding as the tokenizer service", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response(vocabulary)));
    const program = Effect.gen(function* () {
      const tokenizer = yield* TokenizerService;
      const tokens = yield* tokenizer.encode("hi hi");
      return { name: tokenizer.name, tokens: Array.from(tokens) };
    });
    const result = await Effect.runPromise(program.pipe(Effect.provide(EncodingLive("cl100k_base", config))));
    expect(result).toEqual({ name: "cl100k_base", tokens: [256, 32, 256] });
  });
});
