import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import OpenAI from "openai";
import { z } from "zod";
import { ValueModelConfig } from "../config";
import { StorageLayout } from "../core/paths";
import { errorMessage, Logger } from "../observability";
import { CatalogStore } from "../store";

const PROMPT_TEXT_CHARS = 8000;
export const CACHE_KEY_TEXT_CHARS = 1000;

export const valueModelResultSchema = z.object({
  value: z.number().nullable(),
  year: z.number().int().nullable(),
  confidence: z.number().min(0).max(1),
  snippet: z.string().default(""),
});

export type ValueModelResult = z.infer<typeof valueModelResultSchema>;

/** Black-box "read this text, give me the indicator value" collaborator. */
export interface ValueModel {
  readonly modelName: string;
  extract(text: string, indicator: string, year: number): Promise<ValueModelResult>;
}

export function valueCacheKey(text: string, indicator: string, year: number, modelName: string): string {
  return crypto
    .createHash("sha256")
    .update(`${text.slice(0, CACHE_KEY_TEXT_CHARS)}|${indicator}|${year}|${modelName}`)
    .digest("hex");
}

interface CachedValueModelDeps {
  inner: ValueModel;
  catalog: CatalogStore;
  layout: StorageLayout;
  logger?: Logger;
}

/**
 * Memoizes another model on disk: result JSON under the year's
 * `value-cache/`, pointer row in `value_cache`. An unreadable result file
 * is a miss.
 */
export class CachedValueModel implements ValueModel {
  readonly modelName: string;

  constructor(private readonly deps: CachedValueModelDeps) {
    this.modelName = deps.inner.modelName;
  }

  async extract(text: string, indicator: string, year: number): Promise<ValueModelResult> {
    const { inner, catalog, layout, logger } = this.deps;
    const key = valueCacheKey(text, indicator, year, this.modelName);

    const entry = await catalog.getValueCache(key);
    if (entry) {
      try {
        const cached = valueModelResultSchema.parse(JSON.parse(await fs.promises.readFile(entry.resultPath, "utf-8")));
        logger?.debug("value_cache_hit", { indicator, year });
        return cached;
      } catch (error) {
        logger?.warn("value_cache_unreadable", { indicator, year, error: errorMessage(error) });
      }
    }

    const result = await inner.extract(text, indicator, year);
    const resultPath = path.join(layout.valueCacheDir(year), `${key}.json`);
    await fs.promises.mkdir(path.dirname(resultPath), { recursive: true });
    await fs.promises.writeFile(resultPath, JSON.stringify(result), "utf-8");
    await catalog.putValueCache({ key, resultPath, createdAt: new Date().toISOString(), model: this.modelName });
    return result;
  }
}

const SYSTEM_PROMPT = [
  "You read excerpts of Italian municipal documents and report one numeric indicator value.",
  'Reply with a JSON object: {"value": number|null, "year": integer|null, "confidence": number between 0 and 1, "snippet": string}.',
  "Use a plain number for value (no thousands separators, percentages as fractions).",
  "The snippet must quote the passage the value comes from. Use null when the text does not state the value.",
].join(" ");

interface ChatClient {
  chat: {
    completions: {
      create(body: {
        model: string;
        temperature: number;
        response_format: { type: "json_object" };
        messages: Array<{ role: "system" | "user"; content: string }>;
      }): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

export class OpenAiValueModel implements ValueModel {
  readonly modelName: string;
  private readonly client: ChatClient;

  constructor(config: ValueModelConfig, client?: ChatClient) {
    this.modelName = config.model;
    this.client = client ?? new OpenAI({ apiKey: config.apiKey, timeout: config.requestTimeoutMs });
  }

  async extract(text: string, indicator: string, year: number): Promise<ValueModelResult> {
    const completion = await this.client.chat.completions.create({
      model: this.modelName,
      temperature: 0,
      response_format: { type: "json_object" },
      messages: [
        { role: "system", content: SYSTEM_PROMPT },
        {
          role: "user",
          content: `Indicator: ${indicator}\nYear: ${year}\n\nText:\n${text.slice(0, PROMPT_TEXT_CHARS)}`,
        },
      ],
    });

    const content = completion.choices[0]?.message.content;
    if (!content) {
      throw new Error(`Model ${this.modelName} returned an empty response`);
    }
    return valueModelResultSchema.parse(JSON.parse(content));
  }
}

export function createValueModel(
  config: ValueModelConfig,
  deps: Omit<CachedValueModelDeps, "inner">,
): ValueModel | undefined {
  if (!config.enabled || !config.apiKey) {
    return undefined;
  }
  return new CachedValueModel({ ...deps, inner: new OpenAiValueModel(config) });
}
