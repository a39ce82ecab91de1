import { describe, it, expect } from "vitest";
import {
  BUILTIN_CATALOG,
  CatalogValidationError,
  ModelCatalog,
  parseCatalog,
} from "../src/catalog.js";

describe("BUILTIN_CATALOG", () => {
  it("lists providers in file order", () => {
    expect(BUILTIN_CATALOG.providers()).toEqual([
      "openai",
      "anthropic",
      "gemini",
      "deepseek",
      "mistral",
    ]);
  });

  it("keeps model order for a provider", () => {
    expect(BUILTIN_CATALOG.lookup("openai")).toEqual([
      "gpt-4o",
      "gpt-4o-mini",
      "gpt-4-turbo",
      "gpt-4",
      "gpt-3.5-turbo",
      "o1",
      "o1-mini",
      "o3-mini",
    ]);
  });

  it("looks up providers case-insensitively", () => {
    expect(BUILTIN_CATALOG.lookup("Anthropic")).toEqual(BUILTIN_CATALOG.lookup("anthropic"));
    expect(BUILTIN_CATALOG.has(" GEMINI ")).toBe(true);
  });

  it("returns an empty list for unknown providers", () => {
    expect(BUILTIN_CATALOG.lookup("unknownprovider")).toEqual([]);
    expect(BUILTIN_CATALOG.has("unknownprovider")).toBe(false);
  });

  it("hands out frozen model lists", () => {
    expect(Object.isFrozen(BUILTIN_CATALOG.lookup("deepseek"))).toBe(true);
  });
});

describe("ModelCatalog", () => {
  it("lowercases provider keys", () => {
    const catalog = ModelCatalog.fromRecord({ OpenRouter: ["auto"] });
    expect(catalog.providers()).toEqual(["openrouter"]);
    expect(catalog.lookup("openrouter")).toEqual(["auto"]);
  });

  it("withAdditions appends new models after existing ones", () => {
    const base = ModelCatalog.fromRecord({ openai: ["gpt-4o", "gpt-4"] });
    const extended = base.withAdditions({ OpenAI: ["gpt-4.1", "gpt-4o"], groq: ["llama3-70b"] });

    expect(extended.lookup("openai")).toEqual(["gpt-4o", "gpt-4", "gpt-4.1"]);
    expect(extended.providers()).toEqual(["openai", "groq"]);
  });

  it("withAdditions leaves the original catalog untouched", () => {
    const base = ModelCatalog.fromRecord({ openai: ["gpt-4o"] });
    base.withAdditions({ openai: ["gpt-4.1"], groq: ["llama3-70b"] });

    expect(base.lookup("openai")).toEqual(["gpt-4o"]);
    expect(base.has("groq")).toBe(false);
  });
});

describe("parseCatalog", () => {
  it("builds a catalog from a valid object", () => {
    const catalog = parseCatalog({ deepseek: ["deepseek-chat"] });
    expect(catalog.lookup("DeepSeek")).toEqual(["deepseek-chat"]);
  });

  it("rejects an empty model list", () => {
    expect(() => parseCatalog({ openai: [] })).toThrow(CatalogValidationError);
    expect(() => parseCatalog({ openai: [] })).toThrow(
      'Invalid model catalog at "openai": Provider must list at least one model',
    );
  });

  it("rejects an empty model name", () => {
    expect(() => parseCatalog({ openai: ["gpt-4o", ""] })).toThrow(
      'Invalid model catalog at "openai.1": Model name cannot be empty',
    );
  });

  it("rejects non-object input", () => {
    expect(() => parseCatalog(["gpt-4o"])).toThrow(CatalogValidationError);
  });
});
