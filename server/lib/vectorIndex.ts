import { promises as fs } from "fs";
import * as path from "path";
import { randomUUID } from "crypto";
import { z } from "zod";
import { InvalidRequestError } from "./errors";

// File-backed nearest-neighbour indices: <root>/<name>/index.json

const indexEntrySchema = z.object({
  id: z.string(),
  text: z.string(),
  source: z.string(),
  embedding: z.array(z.number()),
  addedAt: z.string(),
});

const indexFileSchema = z.object({
  name: z.string(),
  updatedAt: z.string(),
  entries: z.array(indexEntrySchema),
});

export type IndexEntry = z.infer<typeof indexEntrySchema>;
type IndexFile = z.infer<typeof indexFileSchema>;

export interface NewIndexEntry {
  text: string;
  source: string;
  embedding: number[];
}

export interface ScoredEntry {
  text: string;
  source: string;
  score: number;
}

export interface IndexedSource {
  source: string;
  chunks: number;
  addedAt: string;
}

export interface VectorIndexStore {
  exists(name: string): Promise<boolean>;
  size(name: string): Promise<number>;
  sources(name: string): Promise<IndexedSource[]>;
  add(name: string, entries: NewIndexEntry[]): Promise<number>;
  search(name: string, embedding: number[], k: number): Promise<ScoredEntry[]>;
  remove(name: string): Promise<void>;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dotProduct / (Math.sqrt(normA) * Math.sqrt(normB));
}

const INDEX_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class FileVectorIndexStore implements VectorIndexStore {
  private cache = new Map<string, IndexFile>();
  // Tail of the pending writes per index; each write starts after the previous one settles.
  private writes = new Map<string, Promise<unknown>>();

  constructor(private root: string) {}

  private dirFor(name: string): string {
    if (!INDEX_NAME_PATTERN.test(name)) {
      throw new InvalidRequestError(`Invalid index name: ${name}`);
    }
    return path.join(this.root, name);
  }

  private fileFor(name: string): string {
    return path.join(this.dirFor(name), "index.json");
  }

  private async load(name: string): Promise<IndexFile | null> {
    const cached = this.cache.get(name);
    if (cached) return cached;

    let raw: string;
    try {
      raw = await fs.readFile(this.fileFor(name), "utf-8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      throw err;
    }

    const data: unknown = JSON.parse(raw);
    const parsed = indexFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new Error(`Vector index ${name} is corrupt: ${parsed.error.errors[0].message}`);
    }
    this.cache.set(name, parsed.data);
    return parsed.data;
  }

  async exists(name: string): Promise<boolean> {
    return (await this.load(name)) !== null;
  }

  async size(name: string): Promise<number> {
    const index = await this.load(name);
    return index ? index.entries.length : 0;
  }

  private serialize<T>(name: string, task: () => Promise<T>): Promise<T> {
    const previous = this.writes.get(name) ?? Promise.resolve();
    const run = previous.then(task, task);
    this.writes.set(name, run.catch(() => undefined));
    return run;
  }

  // Sources in the order they were first added.
  async sources(name: string): Promise<IndexedSource[]> {
    const index = await this.load(name);
    if (!index) return [];

    const bySource = new Map<string, IndexedSource>();
    for (const entry of index.entries) {
      const seen = bySource.get(entry.source);
      if (seen) {
        seen.chunks += 1;
      } else {
        bySource.set(entry.source, { source: entry.source, chunks: 1, addedAt: entry.addedAt });
      }
    }
    return Array.from(bySource.values());
  }

  add(name: string, entries: NewIndexEntry[]): Promise<number> {
    return this.serialize(name, async () => {
      const current = (await this.load(name)) ?? { name, updatedAt: "", entries: [] };
      const addedAt = new Date().toISOString();
      const next: IndexFile = {
        name,
        updatedAt: addedAt,
        entries: [...current.entries, ...entries.map((e) => ({ id: randomUUID(), ...e, addedAt }))],
      };

      await fs.mkdir(this.dirFor(name), { recursive: true });
      await fs.writeFile(this.fileFor(name), JSON.stringify(next), "utf-8");
      this.cache.set(name, next);
      return next.entries.length;
    });
  }

  async search(name: string, embedding: number[], k: number): Promise<ScoredEntry[]> {
    const index = await this.load(name);
    if (!index || k <= 0) return [];

    return index.entries
      .map((entry) => ({
        text: entry.text,
        source: entry.source,
        score: cosineSimilarity(embedding, entry.embedding),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);
  }

  remove(name: string): Promise<void> {
    return this.serialize(name, async () => {
      this.cache.delete(name);
      await fs.rm(this.dirFor(name), { recursive: true, force: true });
    });
  }
}
