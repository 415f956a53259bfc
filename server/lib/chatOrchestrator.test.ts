import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { promises as fs } from "fs";
import { MemStorage } from "../storage";
import { FileVectorIndexStore } from "./vectorIndex";
import { IndexNames, RetrievalGateway } from "./retrieval";
import { ReportGate } from "./reportGate";
import { RiskClassifier } from "./riskClassifier";
import { ChatOrchestrator, type ChatOptions } from "./chatOrchestrator";
import { ReportNotUploadedError } from "./errors";
import { FakeGenerator, KeywordEmbedder, makeTempDir } from "../testUtils";

const LOW_JSON = JSON.stringify({ risk_level: "LOW", reason: ["Routine question"], action: "ok" });

describe("ChatOrchestrator", () => {
  let root: string;
  let storage: MemStorage;
  let embedder: KeywordEmbedder;
  let generator: FakeGenerator;
  let names: IndexNames;
  let store: FileVectorIndexStore;

  function orchestrator(options: Partial<ChatOptions> = {}): ChatOrchestrator {
    return new ChatOrchestrator(
      {
        storage,
        reportGate: new ReportGate(storage, store, names),
        retrieval: new RetrievalGateway(embedder, store, names),
        generator,
        classifier: new RiskClassifier(generator),
      },
      options
    );
  }

  beforeEach(async () => {
    root = await makeTempDir();
    storage = new MemStorage();
    embedder = new KeywordEmbedder();
    generator = new FakeGenerator();
    names = new IndexNames("shared", "patient_");
    store = new FileVectorIndexStore(root);

    await storage.createPatient({ patientId: "P1", name: "Test Patient", medicalHistory: "Observed overnight" });
    await storage.createPatient({ patientId: "P2", name: "No Report" });
    await store.add("shared", [{ text: "Gentle walks help recovery.", source: "guide.txt", embedding: [1, 0, 0, 0, 0, 0, 0, 0, 0] }]);
    await store.add("patient_P1", [
      { text: "Discharged home after observation.", source: "report.txt", embedding: [1, 0, 0, 0, 0, 0, 0, 0, 0] },
    ]);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("refuses patients without a report before retrieving anything", async () => {
    await expect(orchestrator().ask("P2", "Can I drive?")).rejects.toThrow(ReportNotUploadedError);
    expect(embedder.calls).toBe(0);
    expect(generator.calls).toHaveLength(0);
  });

  it("answers from both corpora and tags the exchange with a risk level", async () => {
    generator.push(
      "Rest and drink water.",
      JSON.stringify({ risk_level: "medium", reason: ["Headache reported", "Recent discharge"], action: "x" })
    );

    const response = await orchestrator().ask("P1", "Is a mild headache normal?");

    expect(response).toMatchObject({
      answer: "Rest and drink water.",
      risk_level: "MEDIUM",
      risk_reason: "Headache reported; Recent discharge",
      source_documents: ["guide.txt", "report.txt"],
    });
    expect(generator.calls[0].options).toEqual({ systemPrompt: expect.stringContaining("medical assistant") });
    expect(generator.calls[0].prompt).toContain(
      "CONTEXT:\nGentle walks help recovery.\n\nDischarged home after observation."
    );
    expect(generator.calls[1].options.jsonMode).toBe(true);

    const history = await storage.getChatHistory("P1");
    expect(history).toHaveLength(1);
    expect(history[0]).toMatchObject({
      question: "Is a mild headache normal?",
      answer: "Rest and drink water.",
      riskLevel: "MEDIUM",
      riskReason: "Headache reported; Recent discharge",
      sourceDocuments: ["guide.txt", "report.txt"],
    });
    expect(history[0].createdAt.toISOString()).toBe(response.timestamp);
  });

  it("substitutes a placeholder for an empty answer and falls back on bad risk output", async () => {
    generator.push("   ", "not json");

    const response = await orchestrator().ask("P1", "How long should I rest?");

    expect(response).toMatchObject({
      answer: "No response generated.",
      risk_level: "LOW",
      risk_reason: "No warning signs were identified in the responses.",
    });
    expect(generator.calls[1].prompt).toContain("Q1: How long should I rest?\nA1: No response generated.");
  });

  it("includes the two most recent exchanges in the prompt", async () => {
    generator = new FakeGenerator([], (_prompt, options) => (options.jsonMode ? LOW_JSON : "noted"));
    const chat = orchestrator();

    await chat.ask("P1", "first");
    await chat.ask("P1", "second");
    await chat.ask("P1", "third");

    const prompt = generator.calls[4].prompt;
    expect(prompt).toContain("RECENT CONVERSATION:\nPatient: first\nAssistant: noted\n\nPatient: second\nAssistant: noted");

    await chat.ask("P1", "fourth");
    expect(generator.calls[6].prompt).not.toContain("Patient: first");
    expect(generator.calls[6].prompt).toContain("Patient: second\nAssistant: noted\n\nPatient: third");
  });

  it("keeps at most windowSize exchanges in memory", async () => {
    generator = new FakeGenerator([], (_prompt, options) => (options.jsonMode ? LOW_JSON : "noted"));
    const chat = orchestrator({ windowSize: 2, promptExchanges: 10 });

    for (const message of ["m1", "m2", "m3"]) {
      await chat.ask("P1", message);
    }
    await chat.ask("P1", "m4");

    const prompt = generator.calls[6].prompt;
    expect(prompt).toContain("RECENT CONVERSATION:\nPatient: m2\nAssistant: noted\n\nPatient: m3\nAssistant: noted\n\nQUESTION:\nm4");
  });

  it("seeds memory from stored history", async () => {
    for (const n of [1, 2, 3]) {
      await storage.saveChatTurn({ patientId: "P1", question: `q${n}`, answer: `a${n}`, riskLevel: "LOW" });
    }
    generator.push("fine", LOW_JSON);

    await orchestrator().ask("P1", "next");

    expect(generator.calls[0].prompt).toContain("RECENT CONVERSATION:\nPatient: q2\nAssistant: a2\n\nPatient: q3\nAssistant: a3");
  });

  it("clears stored history and memory together", async () => {
    generator = new FakeGenerator([], (_prompt, options) => (options.jsonMode ? LOW_JSON : "noted"));
    const chat = orchestrator();
    await chat.ask("P1", "first");
    await chat.ask("P1", "second");

    expect(await chat.clearHistory("P1")).toBe(2);
    expect(await storage.getChatHistory("P1")).toEqual([]);

    await chat.ask("P1", "third");
    expect(generator.calls[4].prompt).toContain("RECENT CONVERSATION:\nNone");
  });
});
