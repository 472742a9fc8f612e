import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { StorageLayout } from "../../../src/core/paths";
import { SqliteStore } from "../../../src/store";
import {
  CachedValueModel,
  createValueModel,
  OpenAiValueModel,
  ValueModel,
  valueCacheKey,
  ValueModelResult,
} from "../../../src/values/valueModel";
import { makeTempDir } from "../helpers";

const RESULT: ValueModelResult = {
  value: 1234.5,
  year: 2022,
  confidence: 0.9,
  snippet: "spesa corrente 1.234,5",
};

function makeInner(result: ValueModelResult = RESULT) {
  const extract = vi.fn(async (_text: string, _indicator: string, _year: number) => result);
  const model: ValueModel = { modelName: "fake-model", extract };
  return { model, extract };
}

const VALUE_MODEL_CONFIG = {
  enabled: true,
  model: "test-model",
  apiKey: "test-secret",
  confidenceThreshold: 0.7,
  maxDocs: 3,
  requestTimeoutMs: 1000,
};

describe("valueCacheKey", () => {
  it("depends only on the leading text, indicator, year and model", () => {
    const prefix = "a".repeat(1000);
    expect(valueCacheKey(`${prefix}X`, "Spesa", 2022, "m")).toBe(valueCacheKey(`${prefix}Y`, "Spesa", 2022, "m"));
    expect(valueCacheKey("testo", "Spesa", 2022, "m")).not.toBe(valueCacheKey("testo", "Spesa", 2022, "other"));
    expect(valueCacheKey("testo", "Spesa", 2022, "m")).not.toBe(valueCacheKey("testo", "Spesa", 2021, "m"));
    expect(valueCacheKey("testo", "Spesa", 2022, "m")).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe("CachedValueModel", () => {
  let catalog: SqliteStore | undefined;

  afterEach(async () => {
    await catalog?.close();
    catalog = undefined;
  });

  function setup() {
    catalog = new SqliteStore(":memory:");
    const layout = new StorageLayout(makeTempDir(), "Testville");
    const inner = makeInner();
    const model = new CachedValueModel({ inner: inner.model, catalog, layout });
    return { catalog, layout, inner, model };
  }

  it("calls the inner model once per distinct input", async () => {
    const { catalog: store, layout, inner, model } = setup();

    expect(await model.extract("testo del bilancio", "Spesa corrente", 2022)).toEqual(RESULT);
    expect(await model.extract("testo del bilancio", "Spesa corrente", 2022)).toEqual(RESULT);
    expect(inner.extract).toHaveBeenCalledTimes(1);

    const key = valueCacheKey("testo del bilancio", "Spesa corrente", 2022, "fake-model");
    const entry = await store.getValueCache(key);
    expect(entry?.resultPath).toBe(path.join(layout.valueCacheDir(2022), `${key}.json`));
    expect(entry?.model).toBe("fake-model");
  });

  it("treats an unreadable result file as a miss", async () => {
    const { layout, inner, model } = setup();
    await model.extract("testo", "Spesa corrente", 2022);

    const key = valueCacheKey("testo", "Spesa corrente", 2022, "fake-model");
    fs.writeFileSync(path.join(layout.valueCacheDir(2022), `${key}.json`), "not json", "utf-8");

    expect(await model.extract("testo", "Spesa corrente", 2022)).toEqual(RESULT);
    expect(inner.extract).toHaveBeenCalledTimes(2);
  });
});

describe("OpenAiValueModel", () => {
  it("asks for a JSON object and validates the reply", async () => {
    const create = vi.fn(async () => ({
      choices: [{ message: { content: '{"value": 42, "year": 2022, "confidence": 0.8}' } }],
    }));
    const model = new OpenAiValueModel(VALUE_MODEL_CONFIG, { chat: { completions: { create } } });

    expect(await model.extract("Abitanti: 42", "Numero abitanti", 2022)).toEqual({
      value: 42,
      year: 2022,
      confidence: 0.8,
      snippet: "",
    });
    expect(create).toHaveBeenCalledWith(
      expect.objectContaining({ model: "test-model", temperature: 0, response_format: { type: "json_object" } }),
    );
  });

  it("rejects an empty reply", async () => {
    const create = vi.fn(async () => ({ choices: [{ message: { content: null } }] }));
    const model = new OpenAiValueModel(VALUE_MODEL_CONFIG, { chat: { completions: { create } } });
    await expect(model.extract("testo", "Spesa", 2022)).rejects.toThrow("Model test-model returned an empty response");
  });
});

describe("createValueModel", () => {
  it("returns nothing unless enabled with an API key", async () => {
    const catalog = new SqliteStore(":memory:");
    const layout = new StorageLayout(makeTempDir(), "Testville");
    expect(createValueModel({ ...VALUE_MODEL_CONFIG, enabled: false }, { catalog, layout })).toBeUndefined();
    expect(createValueModel({ ...VALUE_MODEL_CONFIG, apiKey: undefined }, { catalog, layout })).toBeUndefined();
    await catalog.close();
  });
});
