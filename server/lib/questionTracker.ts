import type { AnswerType } from "@shared/schema";
import { DuplicateQuestionError, QuestionBudgetExhaustedError } from "./errors";

export type TrackerState = "COLLECTING" | "READY_FOR_ASSESSMENT" | "MUST_ASSESS";

export interface QuestionRecord {
  text: string;
  answerType: AnswerType;
  negativeCount: number;
}

export interface TrackerSummary {
  total_questions_asked: number;
  questions: string[];
  negative_responses: Record<string, number>;
  state: TrackerState;
}

/**
 * Per-session record of asked questions. Duplicates are detected by exact
 * string comparison only.
 */
export class QuestionTracker {
  private records: QuestionRecord[] = [];

  constructor(
    readonly minQuestions: number,
    readonly maxQuestions: number
  ) {}

  get askedCount(): number {
    return this.records.length;
  }

  hasAsked(text: string): boolean {
    return this.records.some((r) => r.text === text);
  }

  recordQuestion(text: string, answerType: AnswerType): void {
    if (this.hasAsked(text)) throw new DuplicateQuestionError(text);
    if (!this.canAskMore()) throw new QuestionBudgetExhaustedError(this.maxQuestions);
    this.records.push({ text, answerType, negativeCount: 0 });
  }

  recordNegative(text: string): void {
    const record = this.records.find((r) => r.text === text);
    if (record) record.negativeCount += 1;
  }

  canAskMore(maxQuestions = this.maxQuestions): boolean {
    return this.askedCount < maxQuestions;
  }

  meetsMinimum(minQuestions = this.minQuestions): boolean {
    return this.askedCount >= minQuestions;
  }

  state(): TrackerState {
    if (!this.canAskMore()) return "MUST_ASSESS";
    if (this.meetsMinimum()) return "READY_FOR_ASSESSMENT";
    return "COLLECTING";
  }

  negativeQuestions(): string[] {
    return this.records.filter((r) => r.negativeCount > 0).map((r) => r.text);
  }

  summary(): TrackerSummary {
    const negatives: Record<string, number> = {};
    for (const r of this.records) {
      if (r.negativeCount > 0) negatives[r.text] = r.negativeCount;
    }
    return {
      total_questions_asked: this.askedCount,
      questions: this.records.map((r) => r.text),
      negative_responses: negatives,
      state: this.state(),
    };
  }
}
