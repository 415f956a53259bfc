import type { AppConfig } from "./config";
import { createDb } from "./db";
import { DatabaseStorage, MemStorage, type IStorage } from "./storage";
import { OpenAIEmbedder, OpenAITextGenerator, type Embedder, type TextGenerator } from "./lib/llm";
import { FileVectorIndexStore, type VectorIndexStore } from "./lib/vectorIndex";
import { IndexNames, RetrievalGateway } from "./lib/retrieval";
import { ReportGate } from "./lib/reportGate";
import { DocumentIngestor } from "./lib/documents";
import { RiskClassifier } from "./lib/riskClassifier";
import { InMemorySessionStore, type SessionStore } from "./lib/sessionStore";
import { MonitoringSessionManager, type MonitoringSession } from "./lib/monitoringSession";
import { ChatOrchestrator } from "./lib/chatOrchestrator";
import { DailyQuestionService } from "./lib/dailyQuestions";
import { log } from "./lib/logger";

export interface Services {
  config: AppConfig;
  storage: IStorage;
  indices: VectorIndexStore;
  names: IndexNames;
  reportGate: ReportGate;
  ingestor: DocumentIngestor;
  monitoring: MonitoringSessionManager;
  daily: DailyQuestionService;
  chat: ChatOrchestrator;
  close(): Promise<void>;
}

// Collaborators that tests replace with in-process fakes.
export interface ServiceOverrides {
  storage?: IStorage;
  generator?: TextGenerator;
  embedder?: Embedder;
  indices?: VectorIndexStore;
  sessions?: SessionStore<MonitoringSession>;
}

export function createServices(config: AppConfig, overrides: ServiceOverrides = {}): Services {
  let storage = overrides.storage;
  let close = async () => {};
  if (!storage) {
    if (config.databaseUrl) {
      const handle = createDb(config.databaseUrl);
      storage = new DatabaseStorage(handle.db);
      close = handle.close;
      log("using PostgreSQL storage", "storage");
    } else {
      storage = new MemStorage();
      log("DATABASE_URL not set, using in-memory storage", "storage");
    }
  }

  const generator = overrides.generator ?? new OpenAITextGenerator(config.llm);
  const embedder = overrides.embedder ?? new OpenAIEmbedder(config.llm);
  const indices = overrides.indices ?? new FileVectorIndexStore(config.retrieval.indexRoot);
  const names = new IndexNames(config.retrieval.sharedIndexName, config.retrieval.patientIndexPrefix);

  const retrieval = new RetrievalGateway(embedder, indices, names, config.retrieval.kPerSource);
  const reportGate = new ReportGate(storage, indices, names);
  const classifier = new RiskClassifier(generator);
  const sessions =
    overrides.sessions ??
    new InMemorySessionStore<MonitoringSession>(config.monitoring.sessionTtlMinutes * 60 * 1000);

  const monitoring = new MonitoringSessionManager(
    { storage, reportGate, retrieval, generator, classifier, sessions },
    {
      minQuestions: config.monitoring.minQuestions,
      maxQuestions: config.monitoring.maxQuestions,
      kPerSource: config.retrieval.kPerSource,
    }
  );
  const chat = new ChatOrchestrator(
    { storage, reportGate, retrieval, generator, classifier },
    { kPerSource: config.retrieval.kPerSource }
  );

  return {
    config,
    storage,
    indices,
    names,
    reportGate,
    ingestor: new DocumentIngestor(embedder, indices, names),
    monitoring,
    daily: new DailyQuestionService(
      { storage, retrieval, generator },
      { kPerSource: config.retrieval.kPerSource }
    ),
    chat,
    close,
  };
}
