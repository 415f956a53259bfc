import { pgTable, text, serial, integer, timestamp, jsonb } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";
import { relations } from "drizzle-orm";

// === TABLE DEFINITIONS ===

// Registered patients (caller-supplied identifier)
export const patients = pgTable("patients", {
  id: serial("id").primaryKey(),
  patientId: text("patient_id").notNull().unique(),
  name: text("name").notNull(),
  email: text("email"),
  age: integer("age"),
  medicalHistory: text("medical_history").notNull().default(""),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  lastAccessed: timestamp("last_accessed").defaultNow().notNull(),
});

// Append-only exchange log, one row per question/answer pair
export const chatHistory = pgTable("chat_history", {
  id: serial("id").primaryKey(),
  patientId: text("patient_id").notNull().references(() => patients.patientId, { onDelete: "cascade" }),
  question: text("question").notNull(),
  answer: text("answer").notNull(),
  riskLevel: text("risk_level").notNull(), // LOW | MEDIUM | HIGH
  riskReason: text("risk_reason").notNull().default(""),
  sourceDocuments: jsonb("source_documents").$type<string[]>().notNull().default([]),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

// One answered daily check-in question per row
export const dailyAnswers = pgTable("daily_answers", {
  id: serial("id").primaryKey(),
  patientId: text("patient_id").notNull().references(() => patients.patientId, { onDelete: "cascade" }),
  question: text("question").notNull(),
  answer: text("answer").notNull(),
  answerType: text("answer_type").notNull(), // YES_NO | SCALE_0_10 | SHORT_TEXT
  category: text("category").notNull().default("general"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
});

// === RELATIONS ===
export const patientsRelations = relations(patients, ({ many }) => ({
  chatHistory: many(chatHistory),
  dailyAnswers: many(dailyAnswers),
}));

export const chatHistoryRelations = relations(chatHistory, ({ one }) => ({
  patient: one(patients, {
    fields: [chatHistory.patientId],
    references: [patients.patientId],
  }),
}));

export const dailyAnswersRelations = relations(dailyAnswers, ({ one }) => ({
  patient: one(patients, {
    fields: [dailyAnswers.patientId],
    references: [patients.patientId],
  }),
}));

// === ZOD SCHEMAS ===
export const insertPatientSchema = createInsertSchema(patients).omit({
  id: true,
  createdAt: true,
  lastAccessed: true,
});

// === TYPES ===
export type Patient = typeof patients.$inferSelect;
export type InsertPatient = z.infer<typeof insertPatientSchema>;

export type ChatTurn = typeof chatHistory.$inferSelect;
export type InsertChatTurn = typeof chatHistory.$inferInsert;

export type DailyAnswer = typeof dailyAnswers.$inferSelect;
export type InsertDailyAnswer = typeof dailyAnswers.$inferInsert;

export const RISK_LEVELS = ["LOW", "MEDIUM", "HIGH"] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

export const ANSWER_TYPES = ["YES_NO", "SCALE_0_10", "SHORT_TEXT"] as const;
export type AnswerType = (typeof ANSWER_TYPES)[number];

export const KNOWLEDGE_SOURCES = ["SHARED", "PATIENT_PRIVATE"] as const;
export type KnowledgeSource = (typeof KNOWLEDGE_SOURCES)[number];

export interface RiskAssessment {
  risk_level: RiskLevel;
  reason: string[];
  action: string;
  source: "model" | "fallback";
}

export interface QuestionAnswerPair {
  question: string;
  answer: string;
  answerType: AnswerType;
}
