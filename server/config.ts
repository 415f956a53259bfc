import { z } from "zod";

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

const envSchema = z
  .object({
    NODE_ENV: z.string().default("development"),
    PORT: z.coerce.number().int().positive().default(5000),
    DATABASE_URL: optionalString,

    OPENAI_API_KEY: optionalString,
    OPENAI_BASE_URL: optionalString,
    LLM_MODEL: z.string().default("gpt-4o-mini"),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(500),
    LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),

    MONITORING_MIN_QUESTIONS: z.coerce.number().int().min(1).default(3),
    MONITORING_MAX_QUESTIONS: z.coerce.number().int().min(1).default(6),
    SESSION_TTL_MINUTES: z.coerce.number().int().min(0).default(240),

    VECTOR_INDEX_ROOT: z.string().default("vector_store"),
    SHARED_INDEX_NAME: z.string().min(1).default("shared"),
    PATIENT_INDEX_PREFIX: z.string().min(1).default("patient_"),
    RETRIEVAL_K: z.coerce.number().int().positive().default(3),
  })
  .refine((env) => env.MONITORING_MIN_QUESTIONS <= env.MONITORING_MAX_QUESTIONS, {
    message: "must not exceed MONITORING_MAX_QUESTIONS",
    path: ["MONITORING_MIN_QUESTIONS"],
  });

export interface AppConfig {
  env: string;
  port: number;
  databaseUrl?: string;
  llm: {
    apiKey?: string;
    baseUrl?: string;
    model: string;
    temperature: number;
    maxTokens: number;
    timeoutMs: number;
    embeddingModel: string;
  };
  monitoring: {
    minQuestions: number;
    maxQuestions: number;
    sessionTtlMinutes: number;
  };
  retrieval: {
    indexRoot: string;
    sharedIndexName: string;
    patientIndexPrefix: string;
    kPerSource: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    throw new Error(`Invalid configuration: ${issue.path.join(".")} ${issue.message}`);
  }
  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    port: e.PORT,
    databaseUrl: e.DATABASE_URL,
    llm: {
      apiKey: e.OPENAI_API_KEY,
      baseUrl: e.OPENAI_BASE_URL,
      model: e.LLM_MODEL,
      temperature: e.LLM_TEMPERATURE,
      maxTokens: e.LLM_MAX_TOKENS,
      timeoutMs: e.LLM_TIMEOUT_MS,
      embeddingModel: e.EMBEDDING_MODEL,
    },
    monitoring: {
      minQuestions: e.MONITORING_MIN_QUESTIONS,
      maxQuestions: e.MONITORING_MAX_QUESTIONS,
      sessionTtlMinutes: e.SESSION_TTL_MINUTES,
    },
    retrieval: {
      indexRoot: e.VECTOR_INDEX_ROOT,
      sharedIndexName: e.SHARED_INDEX_NAME,
      patientIndexPrefix: e.PATIENT_INDEX_PREFIX,
      kPerSource: e.RETRIEVAL_K,
    },
  };
}
