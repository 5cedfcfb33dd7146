import { z } from 'zod';

/** Fixed vector width of every stored embedding. */
export const EMBEDDING_DIMENSION = 384;

export const EmbeddingsConfigSchema = z
  .object({
    provider: z.literal('tfidf-hash').default('tfidf-hash'),
    dims: z.literal(EMBEDDING_DIMENSION).default(EMBEDDING_DIMENSION),
    minTokenLength: z.number().int().min(1).default(3),
    version: z.number().int().min(1).default(1),
    queryCacheSize: z.number().int().min(1).default(256),
  })
  .default({});
export type EmbeddingsConfig = z.infer<typeof EmbeddingsConfigSchema>;

export const SearchConfigSchema = z
  .object({
    readBatchSize: z.number().int().min(1).default(50),
    defaultThreshold: z.number().min(0).max(1).default(0.15),
    defaultMaxResults: z.number().int().min(1).max(20).default(5),
    snippetLength: z.number().int().min(1).default(200),
  })
  .default({});
export type SearchConfig = z.infer<typeof SearchConfigSchema>;

export const IndexingConfigSchema = z
  .object({
    writeBatchSize: z.number().int().min(1).default(100),
    progressEvery: z.number().int().min(1).default(10),
  })
  .default({});
export type IndexingConfig = z.infer<typeof IndexingConfigSchema>;

export const StorageConfigSchema = z
  .object({
    path: z.string().min(1).default('.recall/messages.sqlite'),
  })
  .default({});
export type StorageConfig = z.infer<typeof StorageConfigSchema>;

export const LoggingConfigSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    jsonlPath: z.string().optional(),
  })
  .default({});
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export const RecallConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  embeddings: EmbeddingsConfigSchema,
  search: SearchConfigSchema,
  indexing: IndexingConfigSchema,
  storage: StorageConfigSchema,
  logging: LoggingConfigSchema,
});

export type RecallConfig = z.infer<typeof RecallConfigSchema>;
export type RecallConfigInput = z.input<typeof RecallConfigSchema>;

/** Fully defaulted configuration. */
export function defaultConfig(): RecallConfig {
  return RecallConfigSchema.parse({});
}
