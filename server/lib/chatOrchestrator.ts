import type { RiskLevel } from "@shared/schema";
import type { IStorage } from "../storage";
import type { TextGenerator } from "./llm";
import type { ReportGate } from "./reportGate";
import type { RiskClassifier } from "./riskClassifier";
import { formatContext, sourceNames, type RetrievalGateway } from "./retrieval";
import { buildChatPrompt, CHAT_SYSTEM_PROMPT } from "./prompts";
import { log } from "./logger";

export interface ChatResponse {
  answer: string;
  risk_level: RiskLevel;
  risk_reason: string;
  source_documents: string[];
  timestamp: string;
}

interface Exchange {
  question: string;
  answer: string;
}

export interface ChatDeps {
  storage: IStorage;
  reportGate: ReportGate;
  retrieval: RetrievalGateway;
  generator: TextGenerator;
  classifier: RiskClassifier;
}

export interface ChatOptions {
  kPerSource: number;
  windowSize: number;
  promptExchanges: number;
}

const DEFAULT_OPTIONS: ChatOptions = { kPerSource: 3, windowSize: 4, promptExchanges: 2 };

// Freeform question answering with a risk tag on every exchange.
export class ChatOrchestrator {
  private windows = new Map<string, Exchange[]>();
  private options: ChatOptions;

  constructor(private deps: ChatDeps, options: Partial<ChatOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async ask(patientId: string, message: string): Promise<ChatResponse> {
    const patient = await this.deps.reportGate.assertCanProceed(patientId);

    const passages = await this.deps.retrieval.retrieve(patientId, message, this.options.kPerSource);
    const context = formatContext(passages);
    const window = await this.windowFor(patientId);

    const prompt = buildChatPrompt({
      patientHistory: patient.medicalHistory,
      context,
      memory: window.slice(-this.options.promptExchanges),
      message,
    });
    const generated = await this.deps.generator.generate(prompt, { systemPrompt: CHAT_SYSTEM_PROMPT });
    const answer = generated.trim() || "No response generated.";

    const assessment = await this.deps.classifier.assess(
      patient.medicalHistory,
      [{ question: message, answer }],
      context
    );

    const timestamp = new Date();
    const response: ChatResponse = {
      answer,
      risk_level: assessment.risk_level,
      risk_reason: assessment.reason.join("; "),
      source_documents: sourceNames(passages),
      timestamp: timestamp.toISOString(),
    };

    await this.deps.storage.saveChatTurn({
      patientId,
      question: message,
      answer,
      riskLevel: response.risk_level,
      riskReason: response.risk_reason,
      sourceDocuments: response.source_documents,
      createdAt: timestamp,
    });
    await this.deps.storage.touchPatient(patientId);

    window.push({ question: message, answer });
    if (window.length > this.options.windowSize) {
      window.splice(0, window.length - this.options.windowSize);
    }
    log(`chat for ${patientId} tagged ${response.risk_level}`, "chat");

    return response;
  }

  // Clears both the in-memory window and the stored history.
  async clearHistory(patientId: string): Promise<number> {
    this.windows.delete(patientId);
    return this.deps.storage.clearChatHistory(patientId);
  }

  forget(patientId: string): void {
    this.windows.delete(patientId);
  }

  private async windowFor(patientId: string): Promise<Exchange[]> {
    const existing = this.windows.get(patientId);
    if (existing) return existing;

    const history = await this.deps.storage.getChatHistory(patientId, this.options.windowSize);
    const seeded = history.map((turn) => ({ question: turn.question, answer: turn.answer }));
    this.windows.set(patientId, seeded);
    return seeded;
  }
}
