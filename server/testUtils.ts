import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import type { AppConfig } from "./config";
import { loadConfig } from "./config";
import type { Embedder, GenerateOptions, TextGenerator } from "./lib/llm";

// In-process stand-ins for the generation and embedding services.

export interface GeneratorCall {
  prompt: string;
  options: GenerateOptions;
}

type Scripted = string | Error;

export class FakeGenerator implements TextGenerator {
  readonly calls: GeneratorCall[] = [];
  private queue: Scripted[];

  constructor(responses: Scripted[] = [], private fallback?: (prompt: string, options: GenerateOptions) => string) {
    this.queue = [...responses];
  }

  push(...responses: Scripted[]): void {
    this.queue.push(...responses);
  }

  async generate(prompt: string, options: GenerateOptions = {}): Promise<string> {
    this.calls.push({ prompt, options });
    const next = this.queue.shift();
    if (next instanceof Error) throw next;
    if (next !== undefined) return next;
    if (this.fallback) return this.fallback(prompt, options);
    throw new Error("FakeGenerator has no scripted response left");
  }
}

export const VOCABULARY = ["headache", "seizure", "dizziness", "sleep", "vision", "medication", "stroke", "memory"];

/**
 * Bag-of-words embedding over a fixed vocabulary plus a constant component,
 * so every text has a non-zero vector.
 */
export class KeywordEmbedder implements Embedder {
  calls = 0;

  async embed(text: string): Promise<number[]> {
    this.calls++;
    const lower = text.toLowerCase();
    return [1, ...VOCABULARY.map((word) => lower.split(word).length - 1)];
  }
}

export async function makeTempDir(prefix = "neuro-monitor-"): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export function testConfig(indexRoot: string, overrides: NodeJS.ProcessEnv = {}): AppConfig {
  return loadConfig({
    NODE_ENV: "test",
    OPENAI_API_KEY: "test-secret",
    VECTOR_INDEX_ROOT: indexRoot,
    SESSION_TTL_MINUTES: "0",
    ...overrides,
  });
}

export function questionJson(question: string, answerType: string, explanation = "Follow-up on recovery"): string {
  return JSON.stringify({ question, answer_type: answerType, explanation });
}
