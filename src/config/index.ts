/**
 * Configuration loading for the chat backend.
 *
 * Environment variables are validated once at startup and turned into an
 * immutable AppConfig object that the composition root hands to adapters and
 * use cases. Nothing below this module reads process.env.
 *
 * Missing credentials or endpoints raise ConfigurationError so the process
 * never starts serving traffic half-configured.
 */
import { ConfigurationError } from "@middleware/errorHandler";
import { z } from "zod";

export const DEFAULT_SYSTEM_PROMPT = [
  "You are a helpful documentation assistant.",
  "Answer the user's question using the numbered context passages when they are provided.",
  "Cite passages by their number, e.g. [1].",
  "If the context does not contain the answer, say so plainly instead of guessing.",
  "Be concise and clear.",
].join("\n");

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const intWithDefault = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const EnvSchema = z
  .object({
    NODE_ENV: z.string().default("development"),
    PORT: intWithDefault(3000, 1, 65535),
    APP_VERSION: z.string().default("1.0.0"),
    CORS_ORIGIN: z.string().min(1).default("*"),

    OPENAI_API_KEY: z.string().trim().min(1, "OPENAI_API_KEY is required"),
    OPENAI_BASE_URL: optionalString.pipe(z.string().url().optional()),
    OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
    OPENAI_EMBEDDING_MODEL: z.string().min(1).default("text-embedding-3-small"),

    VECTOR_PROVIDER: z.enum(["pgvector", "pinecone"]).default("pgvector"),
    DATABASE_URL: optionalString,
    DB_POOL_MAX: intWithDefault(10, 1, 100),
    DB_IDLE_TIMEOUT_MS: intWithDefault(30000, 0, 600000),
    DB_CONN_TIMEOUT_MS: intWithDefault(10000, 0, 600000),
    PINECONE_API_KEY: optionalString,
    PINECONE_INDEX: optionalString,
    PINECONE_HOST: optionalString,

    RAG_TOP_K: intWithDefault(5, 1, 50),
    UPSTREAM_TIMEOUT_MS: intWithDefault(10000, 1, 120000),
    UPSTREAM_MAX_RETRIES: intWithDefault(0, 0, 5),
    UPSTREAM_RETRY_BASE_DELAY_MS: intWithDefault(200, 0, 10000),
    INGEST_CHUNK_SIZE: intWithDefault(800, 100, 8000),
    SYSTEM_PROMPT: optionalString,

    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
    LOG_FILE: z.string().default("logs/app.log"),
  })
  .superRefine((env, ctx) => {
    if (env.VECTOR_PROVIDER === "pgvector" && !env.DATABASE_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["DATABASE_URL"],
        message: "DATABASE_URL is required when VECTOR_PROVIDER=pgvector",
      });
    }

    if (env.VECTOR_PROVIDER === "pinecone") {
      for (const key of [
        "PINECONE_API_KEY",
        "PINECONE_INDEX",
        "PINECONE_HOST",
      ] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: `${key} is required when VECTOR_PROVIDER=pinecone`,
          });
        }
      }
    }
  });

export interface UpstreamPolicy {
  timeoutMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
}

export type VectorStoreConfig =
  | {
      provider: "pgvector";
      databaseUrl: string;
      poolMax: number;
      idleTimeoutMs: number;
      connectionTimeoutMs: number;
    }
  | {
      provider: "pinecone";
      apiKey: string;
      index: string;
      host: string;
    };

export interface AppConfig {
  env: string;
  port: number;
  version: string;
  corsOrigin: string;
  openai: {
    key: string;
    baseUrl: string | undefined;
    model: string;
    embeddingModel: string;
  };
  vectorStore: VectorStoreConfig;
  rag: {
    topK: number;
    systemPrompt: string;
  };
  ingest: {
    chunkSize: number;
  };
  upstream: UpstreamPolicy;
  observability: {
    logLevel: "debug" | "info" | "warn" | "error";
    logFile: string | undefined;
  };
}

type ParsedEnv = z.infer<typeof EnvSchema>;

function toVectorStoreConfig(env: ParsedEnv): VectorStoreConfig {
  if (env.VECTOR_PROVIDER === "pinecone") {
    return {
      provider: "pinecone",
      apiKey: env.PINECONE_API_KEY ?? "",
      index: env.PINECONE_INDEX ?? "",
      host: env.PINECONE_HOST ?? "",
    };
  }

  return {
    provider: "pgvector",
    databaseUrl: env.DATABASE_URL ?? "",
    poolMax: env.DB_POOL_MAX,
    idleTimeoutMs: env.DB_IDLE_TIMEOUT_MS,
    connectionTimeoutMs: env.DB_CONN_TIMEOUT_MS,
  };
}

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): Readonly<AppConfig> {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const variables = [
      ...new Set(parsed.error.issues.map((issue) => String(issue.path[0]))),
    ];
    const details = parsed.error.issues.map(
      (issue) => `${String(issue.path[0])}: ${issue.message}`
    );
    throw new ConfigurationError(variables, details);
  }

  const data = parsed.data;

  return Object.freeze({
    env: data.NODE_ENV,
    port: data.PORT,
    version: data.APP_VERSION,
    corsOrigin: data.CORS_ORIGIN,
    openai: {
      key: data.OPENAI_API_KEY,
      baseUrl: data.OPENAI_BASE_URL,
      model: data.OPENAI_MODEL,
      embeddingModel: data.OPENAI_EMBEDDING_MODEL,
    },
    vectorStore: toVectorStoreConfig(data),
    rag: {
      topK: data.RAG_TOP_K,
      systemPrompt: data.SYSTEM_PROMPT ?? DEFAULT_SYSTEM_PROMPT,
    },
    ingest: {
      chunkSize: data.INGEST_CHUNK_SIZE,
    },
    upstream: {
      timeoutMs: data.UPSTREAM_TIMEOUT_MS,
      maxRetries: data.UPSTREAM_MAX_RETRIES,
      retryBaseDelayMs: data.UPSTREAM_RETRY_BASE_DELAY_MS,
    },
    observability: {
      logLevel: data.LOG_LEVEL,
      logFile: data.LOG_FILE.trim() ? data.LOG_FILE.trim() : undefined,
    },
  });
}
