import type { Embedder } from "./llm";
import type { IndexedSource, NewIndexEntry, VectorIndexStore } from "./vectorIndex";
import type { IndexNames } from "./retrieval";
import { InvalidRequestError } from "./errors";
import { log } from "./logger";

export interface IngestResult {
  index: string;
  chunks: number;
  totalEntries: number;
}

// Paragraph chunks, split on blank lines.
export function splitIntoChunks(text: string): string[] {
  return text
    .split(/\n\s*\n/)
    .map((c) => c.trim())
    .filter((c) => c.length > 0);
}

export class DocumentIngestor {
  constructor(
    private embedder: Embedder,
    private indices: VectorIndexStore,
    private names: IndexNames
  ) {}

  ingestPatientReport(patientId: string, filename: string, text: string): Promise<IngestResult> {
    return this.ingest(this.names.forPatient(patientId), filename, text);
  }

  ingestSharedDocument(filename: string, text: string): Promise<IngestResult> {
    return this.ingest(this.names.shared, filename, text);
  }

  listPatientReports(patientId: string): Promise<IndexedSource[]> {
    return this.indices.sources(this.names.forPatient(patientId));
  }

  private async ingest(index: string, filename: string, text: string): Promise<IngestResult> {
    const chunks = splitIntoChunks(text);
    if (chunks.length === 0) {
      throw new InvalidRequestError(`${filename} contains no text`, "file");
    }

    const entries: NewIndexEntry[] = [];
    for (const chunk of chunks) {
      entries.push({ text: chunk, source: filename, embedding: await this.embedder.embed(chunk) });
    }
    const totalEntries = await this.indices.add(index, entries);
    log(`indexed ${chunks.length} chunk(s) from ${filename} into ${index}`, "documents");
    return { index, chunks: chunks.length, totalEntries };
  }
}
