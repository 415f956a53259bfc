import { randomUUID } from "crypto";
import { z } from "zod";
import {
  type AnswerType,
  type Patient,
  type QuestionAnswerPair,
  type RiskAssessment,
} from "@shared/schema";
import type { IStorage } from "../storage";
import type { TextGenerator } from "./llm";
import type { ReportGate } from "./reportGate";
import { formatContext, sourceNames, type RetrievalGateway, type RetrievedPassage } from "./retrieval";
import { stripCodeFences, type RiskClassifier } from "./riskClassifier";
import type { SessionStore } from "./sessionStore";
import { QuestionTracker, type TrackerState } from "./questionTracker";
import { toAnswerType, validateAnswer } from "./answers";
import { buildQuestionPrompt, MONITORING_SYSTEM_PROMPT } from "./prompts";
import {
  AssessmentNotReadyError,
  DuplicateQuestionError,
  InvalidAnswerError,
  InvalidRequestError,
  MalformedStructuredOutputError,
  PatientNotFoundError,
  QuestionGenerationFailedError,
  SessionClosedError,
  SessionNotFoundError,
} from "./errors";
import { log, logWarn } from "./logger";

export const MAX_GENERATION_ATTEMPTS = 3;

export type SessionStatus = "ACTIVE" | "COMPLETE";

export interface MonitoringTurn {
  question: string;
  answerType: AnswerType;
  explanation: string;
  answer?: string;
  answeredAt?: Date;
}

export interface AssessmentResult extends RiskAssessment {
  total_questions_asked: number;
  timestamp: string;
}

export interface MonitoringSession {
  id: string;
  patientId: string;
  maxQuestions: number;
  minQuestions: number;
  status: SessionStatus;
  tracker: QuestionTracker;
  turns: MonitoringTurn[];
  assessment: AssessmentResult | null;
  createdAt: Date;
  completedAt: Date | null;
  lastActivityAt: Date;
}

export interface StartSessionResult {
  session_id: string;
  patient_id: string;
  max_questions: number;
}

export interface QuestionPayload {
  session_id: string;
  question: string;
  answer_type: AnswerType;
  explanation: string;
  question_number: number;
  total_expected: number;
}

export interface CompleteMarker {
  session_id: string;
  status: "complete";
  question: null;
}

export type NextQuestionResult = QuestionPayload | CompleteMarker;

export interface SubmitAnswerResult {
  success: true;
  question_recorded: true;
  normalized_answer: string;
  questions_answered: number;
  can_request_assessment: boolean;
}

export interface SessionSnapshot {
  session_id: string;
  patient_id: string;
  status: SessionStatus;
  tracker_state: TrackerState;
  max_questions: number;
  min_questions: number;
  questions_asked: number;
  questions_answered: number;
  can_request_assessment: boolean;
  questions: Array<{ question: string; answer_type: AnswerType; answer: string | null }>;
  assessment: AssessmentResult | null;
  created_at: string;
  completed_at: string | null;
}

export interface MonitoringPolicy {
  minQuestions: number;
  maxQuestions: number;
  kPerSource: number;
}

export interface MonitoringDeps {
  storage: IStorage;
  reportGate: ReportGate;
  retrieval: RetrievalGateway;
  generator: TextGenerator;
  classifier: RiskClassifier;
  sessions: SessionStore<MonitoringSession>;
}

const generatedQuestionSchema = z.object({
  question: z.string(),
  answer_type: z.string(),
  explanation: z.string().optional(),
});

interface GeneratedQuestion {
  question: string;
  answerType: AnswerType;
  explanation: string;
}

export function parseGeneratedQuestion(raw: string): GeneratedQuestion {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFences(raw));
  } catch {
    throw new MalformedStructuredOutputError("Question response is not JSON", raw);
  }

  const parsed = generatedQuestionSchema.safeParse(data);
  if (!parsed.success) {
    throw new MalformedStructuredOutputError("Question response has the wrong shape", raw);
  }

  const question = parsed.data.question.trim();
  if (!question) {
    throw new MalformedStructuredOutputError("Question text is empty", raw);
  }
  const answerType = toAnswerType(parsed.data.answer_type);
  if (!answerType) {
    throw new MalformedStructuredOutputError(`Unknown answer type: ${parsed.data.answer_type}`, raw);
  }

  return { question, answerType, explanation: parsed.data.explanation?.trim() ?? "" };
}

function answeredPairs(session: MonitoringSession): QuestionAnswerPair[] {
  const pairs: QuestionAnswerPair[] = [];
  for (const turn of session.turns) {
    if (turn.answer !== undefined) {
      pairs.push({ question: turn.question, answer: turn.answer, answerType: turn.answerType });
    }
  }
  return pairs;
}

function pendingTurn(session: MonitoringSession): MonitoringTurn | undefined {
  const last = session.turns[session.turns.length - 1];
  return last && last.answer === undefined ? last : undefined;
}

/**
 * Owns the monitoring interview: start, ask, answer, assess. A session
 * accepts no changes once it is COMPLETE.
 */
export class MonitoringSessionManager {
  constructor(
    private deps: MonitoringDeps,
    private policy: MonitoringPolicy
  ) {}

  async startSession(patientId: string, maxQuestions = this.policy.maxQuestions): Promise<StartSessionResult> {
    const { minQuestions, maxQuestions: ceiling } = this.policy;
    if (!Number.isInteger(maxQuestions) || maxQuestions < minQuestions || maxQuestions > ceiling) {
      throw new InvalidRequestError(
        `max_questions must be an integer between ${minQuestions} and ${ceiling}`,
        "max_questions"
      );
    }

    await this.deps.reportGate.assertCanProceed(patientId);
    await this.deps.storage.touchPatient(patientId);

    const now = new Date();
    const session: MonitoringSession = {
      id: randomUUID(),
      patientId,
      maxQuestions,
      minQuestions,
      status: "ACTIVE",
      tracker: new QuestionTracker(minQuestions, maxQuestions),
      turns: [],
      assessment: null,
      createdAt: now,
      completedAt: null,
      lastActivityAt: now,
    };
    await this.deps.sessions.save(session);
    log(`session ${session.id} started for ${patientId} (max ${maxQuestions})`, "monitoring");

    return { session_id: session.id, patient_id: patientId, max_questions: maxQuestions };
  }

  async nextQuestion(sessionId: string): Promise<NextQuestionResult> {
    const session = await this.requireSession(sessionId);
    const complete: CompleteMarker = { session_id: session.id, status: "complete", question: null };
    if (session.status === "COMPLETE") return complete;

    const pending = pendingTurn(session);
    if (pending) return this.toPayload(session, pending, session.turns.length);

    if (!session.tracker.canAskMore(session.maxQuestions)) return complete;

    const patient = await this.requirePatient(session.patientId);
    const answered = answeredPairs(session);
    const passages = await this.deps.retrieval.retrieve(
      session.patientId,
      this.retrievalQuery(patient, answered),
      this.policy.kPerSource
    );

    const prompt = buildQuestionPrompt({
      patientHistory: patient.medicalHistory,
      guidance: formatContext(passages),
      answered,
      deniedQuestions: session.tracker.negativeQuestions(),
      questionNumber: session.tracker.askedCount + 1,
      maxQuestions: session.maxQuestions,
    });

    for (let attempt = 1; attempt <= MAX_GENERATION_ATTEMPTS; attempt++) {
      const raw = await this.deps.generator.generate(prompt, {
        systemPrompt: MONITORING_SYSTEM_PROMPT,
        jsonMode: true,
      });

      try {
        const generated = parseGeneratedQuestion(raw);
        session.tracker.recordQuestion(generated.question, generated.answerType);
        const turn: MonitoringTurn = {
          question: generated.question,
          answerType: generated.answerType,
          explanation: generated.explanation,
        };
        session.turns.push(turn);
        session.lastActivityAt = new Date();
        await this.deps.sessions.save(session);
        return this.toPayload(session, turn, session.turns.length);
      } catch (e) {
        if (e instanceof MalformedStructuredOutputError || e instanceof DuplicateQuestionError) {
          logWarn(`session ${session.id} question attempt ${attempt} rejected: ${e.message}`, "monitoring");
          continue;
        }
        throw e;
      }
    }

    throw new QuestionGenerationFailedError(MAX_GENERATION_ATTEMPTS);
  }

  async submitAnswer(
    sessionId: string,
    question: string,
    answer: string,
    answerType: AnswerType
  ): Promise<SubmitAnswerResult> {
    const session = await this.requireSession(sessionId);
    if (session.status === "COMPLETE") throw new SessionClosedError(session.id);

    const pending = pendingTurn(session);
    if (!pending) {
      throw new InvalidAnswerError("No question is awaiting an answer; request the next question first");
    }
    if (pending.question !== question) {
      throw new InvalidAnswerError("Answer does not match the question awaiting an answer");
    }
    if (pending.answerType !== answerType) {
      throw new InvalidAnswerError(`Expected an answer of type ${pending.answerType}, got ${answerType}`);
    }

    const validated = validateAnswer(answerType, answer);
    if (!validated.isValid) {
      throw new InvalidAnswerError(validated.error ?? "Invalid answer");
    }

    pending.answer = validated.validatedAnswer;
    pending.answeredAt = new Date();
    if (answerType === "YES_NO" && validated.validatedAnswer === "NO") {
      session.tracker.recordNegative(question);
    }
    session.lastActivityAt = pending.answeredAt;
    await this.deps.sessions.save(session);

    const answeredCount = answeredPairs(session).length;
    return {
      success: true,
      question_recorded: true,
      normalized_answer: validated.validatedAnswer,
      questions_answered: answeredCount,
      can_request_assessment: answeredCount >= session.minQuestions,
    };
  }

  async getAssessment(sessionId: string): Promise<AssessmentResult> {
    const session = await this.requireSession(sessionId);
    if (session.status === "COMPLETE" && session.assessment) return session.assessment;

    const answered = answeredPairs(session);
    if (answered.length < session.minQuestions) {
      throw new AssessmentNotReadyError(answered.length, session.minQuestions);
    }

    const patient = await this.requirePatient(session.patientId);
    const passages = await this.contextForAssessment(session, patient, answered);

    const assessment = await this.deps.classifier.assess(
      patient.medicalHistory,
      answered.map(({ question, answer }) => ({ question, answer })),
      formatContext(passages)
    );

    const completedAt = new Date();
    const result: AssessmentResult = {
      ...assessment,
      total_questions_asked: session.tracker.askedCount,
      timestamp: completedAt.toISOString(),
    };

    const sources = sourceNames(passages);
    await this.deps.storage.saveChatTurns(
      answered.map((qa) => ({
        patientId: session.patientId,
        question: qa.question,
        answer: qa.answer,
        riskLevel: result.risk_level,
        riskReason: result.reason.join("; "),
        sourceDocuments: sources,
        createdAt: completedAt,
      }))
    );

    session.status = "COMPLETE";
    session.assessment = result;
    session.completedAt = completedAt;
    session.lastActivityAt = completedAt;
    await this.deps.sessions.save(session);
    log(`session ${session.id} assessed ${result.risk_level} (${result.source})`, "monitoring");

    return result;
  }

  async getSession(sessionId: string): Promise<SessionSnapshot> {
    const session = await this.requireSession(sessionId);
    const answeredCount = answeredPairs(session).length;
    return {
      session_id: session.id,
      patient_id: session.patientId,
      status: session.status,
      tracker_state: session.tracker.state(),
      max_questions: session.maxQuestions,
      min_questions: session.minQuestions,
      questions_asked: session.tracker.askedCount,
      questions_answered: answeredCount,
      can_request_assessment: session.status === "ACTIVE" && answeredCount >= session.minQuestions,
      questions: session.turns.map((t) => ({
        question: t.question,
        answer_type: t.answerType,
        answer: t.answer ?? null,
      })),
      assessment: session.assessment,
      created_at: session.createdAt.toISOString(),
      completed_at: session.completedAt ? session.completedAt.toISOString() : null,
    };
  }

  private async requireSession(sessionId: string): Promise<MonitoringSession> {
    const session = await this.deps.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  private async requirePatient(patientId: string): Promise<Patient> {
    const patient = await this.deps.storage.getPatient(patientId);
    if (!patient) throw new PatientNotFoundError(patientId);
    return patient;
  }

  private retrievalQuery(patient: Patient, answered: QuestionAnswerPair[]): string {
    const last = answered[answered.length - 1];
    const parts = ["neurological symptoms after discharge", patient.medicalHistory];
    if (last) parts.push(`${last.question} ${last.answer}`);
    return parts.filter((p) => p.trim().length > 0).join(" ");
  }

  // Retrieval problems leave the assessment without context rather than failing it.
  private async contextForAssessment(
    session: MonitoringSession,
    patient: Patient,
    answered: QuestionAnswerPair[]
  ): Promise<RetrievedPassage[]> {
    const query = [patient.medicalHistory, ...answered.map((qa) => `${qa.question} ${qa.answer}`)].join(" ");
    try {
      return await this.deps.retrieval.retrieve(session.patientId, query, this.policy.kPerSource);
    } catch (e) {
      logWarn(`session ${session.id} assessment retrieval failed: ${e instanceof Error ? e.message : String(e)}`, "monitoring");
      return [];
    }
  }

  private toPayload(session: MonitoringSession, turn: MonitoringTurn, questionNumber: number): QuestionPayload {
    return {
      session_id: session.id,
      question: turn.question,
      answer_type: turn.answerType,
      explanation: turn.explanation,
      question_number: questionNumber,
      total_expected: session.maxQuestions,
    };
  }
}
