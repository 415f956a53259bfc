import OpenAI from "openai";
import type { AppConfig } from "../config";
import { GenerationServiceUnavailableError } from "./errors";
import { logError } from "./logger";

export interface GenerateOptions {
  systemPrompt?: string;
  jsonMode?: boolean;
  temperature?: number;
  maxTokens?: number;
}

// Prompt in, text out. Every generation call in the engine goes through this.
export interface TextGenerator {
  generate(prompt: string, options?: GenerateOptions): Promise<string>;
}

export interface Embedder {
  embed(text: string): Promise<number[]>;
}

export type LLMConfig = AppConfig["llm"];

function createClient(config: LLMConfig): OpenAI {
  return new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    timeout: config.timeoutMs,
    // Timeouts surface to the caller; nothing is retried automatically.
    maxRetries: 0,
  });
}

// The client is built on first use so a missing API key fails the call, not startup.
abstract class OpenAIService {
  private client?: OpenAI;

  constructor(protected config: LLMConfig, client?: OpenAI) {
    this.client = client;
  }

  protected get openai(): OpenAI {
    if (!this.client) {
      this.client = createClient(this.config);
    }
    return this.client;
  }
}

export class OpenAITextGenerator extends OpenAIService implements TextGenerator {
  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
    if (options.systemPrompt) {
      messages.push({ role: "system", content: options.systemPrompt });
    }
    messages.push({ role: "user", content: prompt });

    try {
      const response = await this.openai.chat.completions.create({
        model: this.config.model,
        messages,
        temperature: options.temperature ?? this.config.temperature,
        max_tokens: options.maxTokens ?? this.config.maxTokens,
        ...(options.jsonMode ? { response_format: { type: "json_object" as const } } : {}),
      });
      return response.choices[0]?.message?.content ?? "";
    } catch (e) {
      logError("Generation call failed", "llm", e);
      throw new GenerationServiceUnavailableError("Text generation service unavailable", e);
    }
  }
}

export class OpenAIEmbedder extends OpenAIService implements Embedder {
  async embed(text: string): Promise<number[]> {
    try {
      const response = await this.openai.embeddings.create({
        model: this.config.embeddingModel,
        input: text,
      });
      const first = response.data[0];
      if (!first) throw new Error("Empty embedding response");
      return first.embedding;
    } catch (e) {
      logError("Embedding call failed", "llm", e);
      throw new GenerationServiceUnavailableError("Embedding service unavailable", e);
    }
  }
}
