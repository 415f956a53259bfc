import { z } from "zod";
import type { AnswerType, Patient } from "@shared/schema";
import type { IStorage, RiskSummary } from "../storage";
import type { TextGenerator } from "./llm";
import { formatContext, type RetrievalGateway, type RetrievedPassage } from "./retrieval";
import { stripCodeFences } from "./riskClassifier";
import { toAnswerType, validateAnswer } from "./answers";
import { buildDailyQuestionPrompt } from "./prompts";
import {
  GenerationServiceUnavailableError,
  InvalidAnswerError,
  MalformedStructuredOutputError,
  PatientNotFoundError,
} from "./errors";
import { log, logWarn } from "./logger";

export const DAILY_CATEGORIES = ["headache", "mobility", "cognitive", "pain", "sleep", "mood", "general"] as const;
export type DailyCategory = (typeof DAILY_CATEGORIES)[number];

export interface DailyQuestion {
  success: true;
  patient_id: string;
  question: string;
  answer_type: AnswerType;
  context: string;
  category: DailyCategory;
  fallback: boolean;
  generated_at: string;
}

export interface DailyAnswerInput {
  question: string;
  answer: string;
  answer_type: AnswerType;
  category?: string;
}

export interface DailyAnswerResult {
  success: true;
  patient_id: string;
  normalized_answer: string;
  timestamp: string;
}

export interface DailyHistory {
  patient_id: string;
  days: number;
  total: number;
  history: Array<{ question: string; answer: string; answer_type: string; category: string; timestamp: string }>;
}

export interface DailyDeps {
  storage: IStorage;
  retrieval: RetrievalGateway;
  generator: TextGenerator;
}

export interface DailyOptions {
  kPerSource: number;
  lookbackDays: number;
}

type GeneratedDaily = Pick<DailyQuestion, "question" | "answer_type" | "context" | "category">;

export const FALLBACK_DAILY_QUESTION: GeneratedDaily = {
  question: "How are you feeling today compared to yesterday, from 0 (much worse) to 10 (much better)?",
  answer_type: "SCALE_0_10",
  context: "General daily wellness check",
  category: "general",
};

const dailyQuestionSchema = z.object({
  question: z.string(),
  answer_type: z.string(),
  context: z.string().optional(),
  category: z.string().optional(),
});

function toCategory(value: string | undefined): DailyCategory {
  const normalized = (value ?? "").trim().toLowerCase();
  return DAILY_CATEGORIES.find((c) => c === normalized) ?? "general";
}

export function parseDailyQuestion(raw: string): GeneratedDaily {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFences(raw));
  } catch {
    throw new MalformedStructuredOutputError("Daily question response is not JSON", raw);
  }

  const parsed = dailyQuestionSchema.safeParse(data);
  if (!parsed.success) {
    throw new MalformedStructuredOutputError("Daily question response has the wrong shape", raw);
  }
  const question = parsed.data.question.trim();
  if (!question) {
    throw new MalformedStructuredOutputError("Daily question text is empty", raw);
  }
  const answerType = toAnswerType(parsed.data.answer_type);
  if (!answerType) {
    throw new MalformedStructuredOutputError(`Unknown answer type: ${parsed.data.answer_type}`, raw);
  }

  return {
    question,
    answer_type: answerType,
    context: parsed.data.context?.trim() ?? "",
    category: toCategory(parsed.data.category),
  };
}

export function describeRiskTrend(summary: RiskSummary): string {
  const high = summary.risk_distribution.HIGH;
  if (high > 0) return `HIGH risk detected in last ${summary.period_days} days (${high} instances)`;
  if (summary.total_queries > 0) return `Stable condition (max risk: ${summary.max_risk_level})`;
  return "No significant risk trends";
}

/**
 * One personalised check-in question per request, built from the patient's
 * corpora, the last week's daily answers and their recent risk levels. A
 * generator failure yields a generic wellness question instead of an error.
 */
export class DailyQuestionService {
  private options: DailyOptions;

  constructor(private deps: DailyDeps, options: Partial<DailyOptions> = {}) {
    this.options = { kPerSource: 3, lookbackDays: 7, ...options };
  }

  async generate(patientId: string): Promise<DailyQuestion> {
    const patient = await this.requirePatient(patientId);
    const { lookbackDays } = this.options;
    const recent = await this.deps.storage.getDailyAnswers(patientId, lookbackDays);
    const trend = describeRiskTrend(await this.deps.storage.getRiskSummary(patientId, lookbackDays));
    const passages = await this.guidanceFor(patient, recent.slice(0, 3));

    const prompt = buildDailyQuestionPrompt({
      patientHistory: patient.medicalHistory,
      guidance: formatContext(passages),
      recentAnswers: recent,
      riskTrend: trend,
    });

    let generated = FALLBACK_DAILY_QUESTION;
    let fallback = true;
    try {
      const candidate = parseDailyQuestion(await this.deps.generator.generate(prompt, { jsonMode: true }));
      if (recent.some((a) => a.question === candidate.question)) {
        throw new MalformedStructuredOutputError("Daily question repeats a recent one", candidate.question);
      }
      generated = candidate;
      fallback = false;
    } catch (e) {
      if (!(e instanceof MalformedStructuredOutputError || e instanceof GenerationServiceUnavailableError)) throw e;
      logWarn(`daily question for ${patientId} fell back to the generic question: ${e.message}`, "daily");
    }

    await this.deps.storage.touchPatient(patientId);
    return {
      success: true,
      patient_id: patientId,
      ...generated,
      fallback,
      generated_at: new Date().toISOString(),
    };
  }

  async saveAnswer(patientId: string, input: DailyAnswerInput): Promise<DailyAnswerResult> {
    await this.requirePatient(patientId);

    const validated = validateAnswer(input.answer_type, input.answer);
    if (!validated.isValid) {
      throw new InvalidAnswerError(validated.error ?? "Invalid answer");
    }

    const row = await this.deps.storage.saveDailyAnswer({
      patientId,
      question: input.question,
      answer: validated.validatedAnswer,
      answerType: input.answer_type,
      category: toCategory(input.category),
    });
    log(`daily answer saved for ${patientId}`, "daily");

    return {
      success: true,
      patient_id: patientId,
      normalized_answer: row.answer,
      timestamp: row.createdAt.toISOString(),
    };
  }

  async history(patientId: string, days = this.options.lookbackDays): Promise<DailyHistory> {
    await this.requirePatient(patientId);
    const rows = await this.deps.storage.getDailyAnswers(patientId, days);
    return {
      patient_id: patientId,
      days,
      total: rows.length,
      history: rows.map((r) => ({
        question: r.question,
        answer: r.answer,
        answer_type: r.answerType,
        category: r.category,
        timestamp: r.createdAt.toISOString(),
      })),
    };
  }

  private async requirePatient(patientId: string): Promise<Patient> {
    const patient = await this.deps.storage.getPatient(patientId);
    if (!patient) throw new PatientNotFoundError(patientId);
    return patient;
  }

  // Guidance is optional here; a retrieval failure leaves the prompt without it.
  private async guidanceFor(
    patient: Patient,
    recent: Array<{ question: string; answer: string }>
  ): Promise<RetrievedPassage[]> {
    const query = [
      "daily neurological symptom check",
      patient.medicalHistory,
      ...recent.map((a) => `${a.question} ${a.answer}`),
    ]
      .filter((p) => p.trim().length > 0)
      .join(" ");
    try {
      return await this.deps.retrieval.retrieve(patient.patientId, query, this.options.kPerSource);
    } catch (e) {
      logWarn(`daily guidance retrieval failed: ${e instanceof Error ? e.message : String(e)}`, "daily");
      return [];
    }
  }
}
