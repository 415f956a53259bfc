import type { Database } from "./db";
import {
  patients, chatHistory, dailyAnswers,
  RISK_LEVELS,
  type Patient, type InsertPatient,
  type ChatTurn, type InsertChatTurn,
  type DailyAnswer, type InsertDailyAnswer,
  type RiskLevel,
} from "@shared/schema";
import { and, eq, desc, gte } from "drizzle-orm";

export interface RiskSummary {
  patient_id: string;
  period_days: number;
  total_queries: number;
  max_risk_level: RiskLevel;
  risk_distribution: Record<RiskLevel, number>;
}

export interface IStorage {
  // Patients
  createPatient(patient: InsertPatient): Promise<Patient>;
  getPatient(patientId: string): Promise<Patient | undefined>;
  getPatients(): Promise<Patient[]>;
  touchPatient(patientId: string): Promise<void>;
  deletePatient(patientId: string): Promise<boolean>;

  // Chat history (append-only per patient)
  saveChatTurn(turn: InsertChatTurn): Promise<ChatTurn>;
  // All rows are written or none are.
  saveChatTurns(turns: InsertChatTurn[]): Promise<ChatTurn[]>;
  getChatHistory(patientId: string, limit?: number): Promise<ChatTurn[]>;
  clearChatHistory(patientId: string): Promise<number>;
  getRiskSummary(patientId: string, days: number): Promise<RiskSummary>;

  // Daily check-in answers
  saveDailyAnswer(answer: InsertDailyAnswer): Promise<DailyAnswer>;
  getDailyAnswers(patientId: string, days: number): Promise<DailyAnswer[]>;
}

function isRiskLevel(value: string): value is RiskLevel {
  return RISK_LEVELS.some((level) => level === value);
}

export function summarizeRisk(patientId: string, days: number, turns: ChatTurn[]): RiskSummary {
  const distribution: Record<RiskLevel, number> = { LOW: 0, MEDIUM: 0, HIGH: 0 };
  let maxIndex = 0;
  for (const turn of turns) {
    if (!isRiskLevel(turn.riskLevel)) continue;
    distribution[turn.riskLevel] += 1;
    maxIndex = Math.max(maxIndex, RISK_LEVELS.indexOf(turn.riskLevel));
  }
  return {
    patient_id: patientId,
    period_days: days,
    total_queries: turns.length,
    max_risk_level: RISK_LEVELS[maxIndex],
    risk_distribution: distribution,
  };
}

function since(days: number): Date {
  return new Date(Date.now() - days * 24 * 60 * 60 * 1000);
}

export class DatabaseStorage implements IStorage {
  constructor(private db: Database) {}

  // Patients
  async createPatient(patient: InsertPatient): Promise<Patient> {
    const [result] = await this.db.insert(patients).values(patient).returning();
    return result;
  }

  async getPatient(patientId: string): Promise<Patient | undefined> {
    const [result] = await this.db.select().from(patients).where(eq(patients.patientId, patientId));
    return result;
  }

  async getPatients(): Promise<Patient[]> {
    return this.db.select().from(patients).orderBy(desc(patients.lastAccessed));
  }

  async touchPatient(patientId: string): Promise<void> {
    await this.db
      .update(patients)
      .set({ lastAccessed: new Date() })
      .where(eq(patients.patientId, patientId));
  }

  async deletePatient(patientId: string): Promise<boolean> {
    const rows = await this.db
      .delete(patients)
      .where(eq(patients.patientId, patientId))
      .returning({ id: patients.id });
    return rows.length > 0;
  }

  // Chat history
  async saveChatTurn(turn: InsertChatTurn): Promise<ChatTurn> {
    const [result] = await this.db.insert(chatHistory).values(turn).returning();
    return result;
  }

  async saveChatTurns(turns: InsertChatTurn[]): Promise<ChatTurn[]> {
    if (turns.length === 0) return [];
    return this.db.insert(chatHistory).values(turns).returning();
  }

  async getChatHistory(patientId: string, limit = 50): Promise<ChatTurn[]> {
    const rows = await this.db
      .select()
      .from(chatHistory)
      .where(eq(chatHistory.patientId, patientId))
      .orderBy(desc(chatHistory.createdAt), desc(chatHistory.id))
      .limit(limit);
    return rows.reverse();
  }

  async clearChatHistory(patientId: string): Promise<number> {
    const rows = await this.db
      .delete(chatHistory)
      .where(eq(chatHistory.patientId, patientId))
      .returning({ id: chatHistory.id });
    return rows.length;
  }

  async getRiskSummary(patientId: string, days: number): Promise<RiskSummary> {
    const rows = await this.db
      .select()
      .from(chatHistory)
      .where(and(eq(chatHistory.patientId, patientId), gte(chatHistory.createdAt, since(days))));
    return summarizeRisk(patientId, days, rows);
  }

  // Daily answers
  async saveDailyAnswer(answer: InsertDailyAnswer): Promise<DailyAnswer> {
    const [result] = await this.db.insert(dailyAnswers).values(answer).returning();
    return result;
  }

  async getDailyAnswers(patientId: string, days: number): Promise<DailyAnswer[]> {
    return this.db
      .select()
      .from(dailyAnswers)
      .where(and(eq(dailyAnswers.patientId, patientId), gte(dailyAnswers.createdAt, since(days))))
      .orderBy(desc(dailyAnswers.createdAt), desc(dailyAnswers.id));
  }
}

// Used when DATABASE_URL is unset, and by the tests.
export class MemStorage implements IStorage {
  private patients = new Map<string, Patient>();
  private turns: ChatTurn[] = [];
  private daily: DailyAnswer[] = [];
  private nextPatientId = 1;
  private nextTurnId = 1;
  private nextDailyId = 1;

  async createPatient(patient: InsertPatient): Promise<Patient> {
    const now = new Date();
    const row: Patient = {
      id: this.nextPatientId++,
      patientId: patient.patientId,
      name: patient.name,
      email: patient.email ?? null,
      age: patient.age ?? null,
      medicalHistory: patient.medicalHistory ?? "",
      createdAt: now,
      lastAccessed: now,
    };
    this.patients.set(row.patientId, row);
    return row;
  }

  async getPatient(patientId: string): Promise<Patient | undefined> {
    return this.patients.get(patientId);
  }

  async getPatients(): Promise<Patient[]> {
    return Array.from(this.patients.values()).sort(
      (a, b) => b.lastAccessed.getTime() - a.lastAccessed.getTime()
    );
  }

  async touchPatient(patientId: string): Promise<void> {
    const patient = this.patients.get(patientId);
    if (patient) patient.lastAccessed = new Date();
  }

  async deletePatient(patientId: string): Promise<boolean> {
    this.turns = this.turns.filter((t) => t.patientId !== patientId);
    this.daily = this.daily.filter((a) => a.patientId !== patientId);
    return this.patients.delete(patientId);
  }

  private toRow(turn: InsertChatTurn): ChatTurn {
    return {
      id: this.nextTurnId++,
      patientId: turn.patientId,
      question: turn.question,
      answer: turn.answer,
      riskLevel: turn.riskLevel,
      riskReason: turn.riskReason ?? "",
      sourceDocuments: turn.sourceDocuments ?? [],
      createdAt: turn.createdAt ?? new Date(),
    };
  }

  async saveChatTurn(turn: InsertChatTurn): Promise<ChatTurn> {
    const row = this.toRow(turn);
    this.turns.push(row);
    return row;
  }

  async saveChatTurns(turns: InsertChatTurn[]): Promise<ChatTurn[]> {
    const rows = turns.map((turn) => this.toRow(turn));
    this.turns.push(...rows);
    return rows;
  }

  async getChatHistory(patientId: string, limit = 50): Promise<ChatTurn[]> {
    const own = this.turns.filter((t) => t.patientId === patientId);
    return limit > 0 ? own.slice(-limit) : [];
  }

  async clearChatHistory(patientId: string): Promise<number> {
    const before = this.turns.length;
    this.turns = this.turns.filter((t) => t.patientId !== patientId);
    return before - this.turns.length;
  }

  async getRiskSummary(patientId: string, days: number): Promise<RiskSummary> {
    const cutoff = since(days).getTime();
    const rows = this.turns.filter(
      (t) => t.patientId === patientId && t.createdAt.getTime() >= cutoff
    );
    return summarizeRisk(patientId, days, rows);
  }

  async saveDailyAnswer(answer: InsertDailyAnswer): Promise<DailyAnswer> {
    const row: DailyAnswer = {
      id: this.nextDailyId++,
      patientId: answer.patientId,
      question: answer.question,
      answer: answer.answer,
      answerType: answer.answerType,
      category: answer.category ?? "general",
      createdAt: answer.createdAt ?? new Date(),
    };
    this.daily.push(row);
    return row;
  }

  // Newest first.
  async getDailyAnswers(patientId: string, days: number): Promise<DailyAnswer[]> {
    const cutoff = since(days).getTime();
    return this.daily
      .filter((a) => a.patientId === patientId && a.createdAt.getTime() >= cutoff)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id);
  }
}
