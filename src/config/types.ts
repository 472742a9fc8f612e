export interface ValueModelConfig {
  enabled: boolean;
  model: string;
  apiKey?: string;
  confidenceThreshold: number;
  maxDocs: number;
  requestTimeoutMs: number;
}

export interface AppConfig {
  baseUrl: string;
  municipality: string;
  years: number[];
  userAgent: string;
  ignoreHttpsErrors: boolean;
  respectRobots: boolean;
  crawlDelaySeconds: number;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  maxPages: number;
  maxPdfs: number;
  downloadConcurrency: number;
  extractConcurrency: number;
  maxHttpAttempts: number;
  retryBaseDelayMs: number;
  topK: number;
  minScore: number;
  contextWindow: number;
  heuristicTopK: number;
  dataDir: string;
  outputDir: string;
  indicatorsPath?: string;
  allowExternal: boolean;
  valueModel: ValueModelConfig;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "valueModel">> & {
  valueModel?: Partial<ValueModelConfig>;
};
