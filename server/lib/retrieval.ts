import type { KnowledgeSource } from "@shared/schema";
import type { Embedder } from "./llm";
import type { VectorIndexStore } from "./vectorIndex";

export interface RetrievedPassage {
  text: string;
  source: string;
  knowledgeSource: KnowledgeSource;
  score: number;
}

// Resolves a knowledge source to the index that backs it.
export class IndexNames {
  constructor(
    private sharedName: string,
    private patientPrefix: string
  ) {}

  get shared(): string {
    return this.sharedName;
  }

  forPatient(patientId: string): string {
    return `${this.patientPrefix}${patientId}`;
  }
}

export class RetrievalGateway {
  constructor(
    private embedder: Embedder,
    private indices: VectorIndexStore,
    private names: IndexNames,
    private defaultK = 3
  ) {}

  /**
   * Nearest passages from the shared corpus followed by the patient's private
   * corpus, at most `kPerSource` from each. Missing indices contribute nothing;
   * with neither present the result is empty and no embedding call is made.
   */
  async retrieve(patientId: string, query: string, kPerSource = this.defaultK): Promise<RetrievedPassage[]> {
    const sharedName = this.names.shared;
    const privateName = this.names.forPatient(patientId);
    const [hasShared, hasPrivate] = await Promise.all([
      this.indices.exists(sharedName),
      this.indices.exists(privateName),
    ]);
    if (!hasShared && !hasPrivate) return [];

    const embedding = await this.embedder.embed(query);

    const shared = hasShared ? await this.indices.search(sharedName, embedding, kPerSource) : [];
    const own = hasPrivate ? await this.indices.search(privateName, embedding, kPerSource) : [];

    return [
      ...shared.map((p) => ({ ...p, knowledgeSource: "SHARED" as const })),
      ...own.map((p) => ({ ...p, knowledgeSource: "PATIENT_PRIVATE" as const })),
    ];
  }
}

export function formatContext(passages: RetrievedPassage[], maxChars?: number): string {
  const joined = passages.map((p) => p.text).join("\n\n");
  return maxChars === undefined ? joined : joined.slice(0, maxChars);
}

export function sourceNames(passages: RetrievedPassage[]): string[] {
  return Array.from(new Set(passages.map((p) => p.source)));
}
