import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { promises as fs } from "fs";
import type { ChatTurn, InsertChatTurn } from "@shared/schema";
import { MemStorage } from "../storage";
import { FileVectorIndexStore } from "./vectorIndex";
import { IndexNames, RetrievalGateway } from "./retrieval";
import { ReportGate } from "./reportGate";
import { RiskClassifier } from "./riskClassifier";
import { InMemorySessionStore } from "./sessionStore";
import { MonitoringSessionManager, parseGeneratedQuestion, type MonitoringSession } from "./monitoringSession";
import {
  AssessmentNotReadyError,
  GenerationServiceUnavailableError,
  InvalidAnswerError,
  InvalidRequestError,
  MalformedStructuredOutputError,
  PatientNotFoundError,
  QuestionGenerationFailedError,
  ReportNotUploadedError,
  SessionClosedError,
  SessionNotFoundError,
} from "./errors";
import { FakeGenerator, KeywordEmbedder, makeTempDir, questionJson } from "../testUtils";

const SLEEP_Q = "Did you sleep through the night?";
const HEADACHE_Q = "How would you rate your headache today?";
const WALK_Q = "Describe how walking felt today.";

class FlakyStorage extends MemStorage {
  failNextBatch = false;

  async saveChatTurns(turns: InsertChatTurn[]): Promise<ChatTurn[]> {
    if (this.failNextBatch) {
      this.failNextBatch = false;
      throw new Error("connection reset");
    }
    return super.saveChatTurns(turns);
  }
}

describe("parseGeneratedQuestion", () => {
  it("normalises the answer type and trims fields", () => {
    expect(parseGeneratedQuestion('{"question":"  Any nausea? ","answer_type":"yes_no"}')).toEqual({
      question: "Any nausea?",
      answerType: "YES_NO",
      explanation: "",
    });
  });

  it.each([
    ["non-JSON text", "Ask about sleep"],
    ["an unknown answer type", questionJson("Any nausea?", "MULTIPLE_CHOICE")],
    ["an empty question", questionJson("  ", "YES_NO")],
    ["a missing answer type", '{"question":"Any nausea?"}'],
  ])("rejects %s", (_label, raw) => {
    expect(() => parseGeneratedQuestion(raw)).toThrow(MalformedStructuredOutputError);
  });
});

describe("MonitoringSessionManager", () => {
  let root: string;
  let storage: FlakyStorage;
  let store: FileVectorIndexStore;
  let generator: FakeGenerator;
  let sessions: InMemorySessionStore<MonitoringSession>;
  let manager: MonitoringSessionManager;

  beforeEach(async () => {
    root = await makeTempDir();
    storage = new FlakyStorage();
    store = new FileVectorIndexStore(root);
    generator = new FakeGenerator();
    sessions = new InMemorySessionStore<MonitoringSession>(0);

    const names = new IndexNames("shared", "patient_");
    const embedder = new KeywordEmbedder();
    manager = new MonitoringSessionManager(
      {
        storage,
        reportGate: new ReportGate(storage, store, names),
        retrieval: new RetrievalGateway(embedder, store, names),
        generator,
        classifier: new RiskClassifier(generator),
        sessions,
      },
      { minQuestions: 2, maxQuestions: 5, kPerSource: 2 }
    );

    await storage.createPatient({ patientId: "P1", name: "Test Patient", medicalHistory: "Observed overnight" });
    await storage.createPatient({ patientId: "P2", name: "No Report" });
    await store.add("patient_P1", [
      { text: "Discharged home after observation.", source: "report.txt", embedding: await embedder.embed("Discharged home after observation.") },
    ]);
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  async function askAndAnswer(sessionId: string, question: string, type: "YES_NO" | "SCALE_0_10" | "SHORT_TEXT", answer: string) {
    generator.push(questionJson(question, type));
    const next = await manager.nextQuestion(sessionId);
    expect(next.question).toBe(question);
    return manager.submitAnswer(sessionId, question, answer, type);
  }

  describe("startSession", () => {
    it("returns a session with the requested budget", async () => {
      const started = await manager.startSession("P1", 3);
      expect(started).toMatchObject({ patient_id: "P1", max_questions: 3 });
      expect(await sessions.get(started.session_id)).toBeDefined();
    });

    it("defaults to the configured maximum", async () => {
      expect((await manager.startSession("P1")).max_questions).toBe(5);
    });

    it.each([1, 6, 2.5])("rejects a budget of %s", async (budget) => {
      await expect(manager.startSession("P1", budget)).rejects.toThrow(InvalidRequestError);
    });

    it("requires a known patient with an uploaded report", async () => {
      await expect(manager.startSession("P404")).rejects.toThrow(PatientNotFoundError);
      await expect(manager.startSession("P2")).rejects.toThrow(ReportNotUploadedError);
      expect(await sessions.size()).toBe(0);
    });
  });

  describe("nextQuestion", () => {
    it("asks until the budget is used and then reports completion", async () => {
      const { session_id } = await manager.startSession("P1", 3);

      generator.push(questionJson(SLEEP_Q, "YES_NO", "Sleep quality"));
      expect(await manager.nextQuestion(session_id)).toEqual({
        session_id,
        question: SLEEP_Q,
        answer_type: "YES_NO",
        explanation: "Sleep quality",
        question_number: 1,
        total_expected: 3,
      });
      expect(await manager.submitAnswer(session_id, SLEEP_Q, "yes", "YES_NO")).toEqual({
        success: true,
        question_recorded: true,
        normalized_answer: "YES",
        questions_answered: 1,
        can_request_assessment: false,
      });

      const second = await askAndAnswer(session_id, HEADACHE_Q, "SCALE_0_10", "4");
      expect(second).toMatchObject({ normalized_answer: "4", questions_answered: 2, can_request_assessment: true });
      await askAndAnswer(session_id, WALK_Q, "SHORT_TEXT", " Steady on my feet ");

      expect(await manager.nextQuestion(session_id)).toEqual({ session_id, status: "complete", question: null });
      expect(generator.calls).toHaveLength(3);
      expect((await manager.getSession(session_id)).tracker_state).toBe("MUST_ASSESS");
    });

    it("returns the unanswered question again without generating", async () => {
      const { session_id } = await manager.startSession("P1", 3);
      generator.push(questionJson(SLEEP_Q, "YES_NO"));

      const first = await manager.nextQuestion(session_id);
      const again = await manager.nextQuestion(session_id);

      expect(again).toEqual(first);
      expect(generator.calls).toHaveLength(1);
    });

    it("sends the generator a JSON request with the retrieved guidance", async () => {
      const { session_id } = await manager.startSession("P1", 3);
      generator.push(questionJson(SLEEP_Q, "YES_NO"));
      await manager.nextQuestion(session_id);

      const call = generator.calls[0];
      expect(call.options.jsonMode).toBe(true);
      expect(call.prompt).toContain("Medical History: Observed overnight");
      expect(call.prompt).toContain("MEDICAL GUIDANCE:\nDischarged home after observation.");
      expect(call.prompt).toContain("QUESTION 1 OF 3:");
    });

    it("lists questions answered NO in the next prompt", async () => {
      const { session_id } = await manager.startSession("P1", 3);
      await askAndAnswer(session_id, SLEEP_Q, "YES_NO", "nope");

      generator.push(questionJson(HEADACHE_Q, "SCALE_0_10"));
      await manager.nextQuestion(session_id);

      const prompt = generator.calls[1].prompt;
      expect(prompt).toContain(`ANSWERED "NO" (do not ask follow-ups on these):\n- ${SLEEP_Q}`);
      expect(prompt).toContain(`Q1: ${SLEEP_Q}\nAnswer (YES_NO): NO`);
    });

    it("regenerates duplicate and malformed questions", async () => {
      const { session_id } = await manager.startSession("P1", 3);
      await askAndAnswer(session_id, SLEEP_Q, "YES_NO", "yes");

      generator.push(questionJson(SLEEP_Q, "YES_NO"), "not json", questionJson(HEADACHE_Q, "SCALE_0_10"));
      const next = await manager.nextQuestion(session_id);

      expect(next).toMatchObject({ question: HEADACHE_Q, question_number: 2 });
      expect(generator.calls).toHaveLength(4);
    });

    it("gives up after three unusable attempts", async () => {
      const { session_id } = await manager.startSession("P1", 3);
      generator.push("one", "two", questionJson("", "YES_NO"));

      await expect(manager.nextQuestion(session_id)).rejects.toThrow(QuestionGenerationFailedError);
      expect(generator.calls).toHaveLength(3);
      expect((await manager.getSession(session_id)).questions_asked).toBe(0);
    });

    it("propagates a generator outage", async () => {
      const { session_id } = await manager.startSession("P1", 3);
      generator.push(new GenerationServiceUnavailableError("timeout"));

      await expect(manager.nextQuestion(session_id)).rejects.toThrow(GenerationServiceUnavailableError);
    });

    it("rejects unknown sessions", async () => {
      await expect(manager.nextQuestion("missing")).rejects.toThrow(SessionNotFoundError);
    });
  });

  describe("submitAnswer", () => {
    let sessionId: string;

    beforeEach(async () => {
      sessionId = (await manager.startSession("P1", 3)).session_id;
    });

    it("requires a pending question", async () => {
      await expect(manager.submitAnswer(sessionId, SLEEP_Q, "yes", "YES_NO")).rejects.toThrow(
        "No question is awaiting an answer; request the next question first"
      );
    });

    it("rejects a scale answer outside 0-10 and keeps the question pending", async () => {
      generator.push(questionJson(HEADACHE_Q, "SCALE_0_10"));
      await manager.nextQuestion(sessionId);

      await expect(manager.submitAnswer(sessionId, HEADACHE_Q, "15", "SCALE_0_10")).rejects.toThrow(
        "15 is outside the 0-10 scale"
      );
      const snapshot = await manager.getSession(sessionId);
      expect(snapshot.questions).toEqual([{ question: HEADACHE_Q, answer_type: "SCALE_0_10", answer: null }]);
    });

    it("rejects an answer for a different question or type", async () => {
      generator.push(questionJson(SLEEP_Q, "YES_NO"));
      await manager.nextQuestion(sessionId);

      await expect(manager.submitAnswer(sessionId, HEADACHE_Q, "yes", "YES_NO")).rejects.toThrow(InvalidAnswerError);
      await expect(manager.submitAnswer(sessionId, SLEEP_Q, "3", "SCALE_0_10")).rejects.toThrow(
        "Expected an answer of type YES_NO, got SCALE_0_10"
      );
      await expect(manager.submitAnswer(sessionId, SLEEP_Q, "maybe", "YES_NO")).rejects.toThrow(
        "Please answer YES or NO"
      );
    });
  });

  describe("getAssessment", () => {
    let sessionId: string;

    beforeEach(async () => {
      sessionId = (await manager.startSession("P1", 3)).session_id;
    });

    it("needs the minimum number of answers", async () => {
      await askAndAnswer(sessionId, SLEEP_Q, "YES_NO", "yes");
      await expect(manager.getAssessment(sessionId)).rejects.toThrow(AssessmentNotReadyError);
    });

    it("falls back to keyword rules when the model does not return JSON", async () => {
      await askAndAnswer(sessionId, SLEEP_Q, "YES_NO", "yes");
      await askAndAnswer(sessionId, HEADACHE_Q, "SCALE_0_10", "3");
      generator.push("The patient is doing fine.");

      const result = await manager.getAssessment(sessionId);

      expect(result).toMatchObject({
        risk_level: "MEDIUM",
        reason: ['Responses mention "headache", which should be watched closely.'],
        action:
          "Continue taking your prescribed medicines and monitor symptoms closely. Inform your doctor if symptoms worsen.",
        source: "fallback",
        total_questions_asked: 2,
      });
    });

    it("stores each answer with the assessment and closes the session", async () => {
      await askAndAnswer(sessionId, SLEEP_Q, "YES_NO", "no");
      await askAndAnswer(sessionId, HEADACHE_Q, "SCALE_0_10", "2");
      generator.push(JSON.stringify({ risk_level: "LOW", reason: ["Mild headache", "Sleeping"], action: "ok" }));

      const result = await manager.getAssessment(sessionId);
      expect(result.risk_level).toBe("LOW");

      const history = await storage.getChatHistory("P1");
      expect(
        history.map((t) => [t.question, t.answer, t.riskLevel, t.riskReason, t.sourceDocuments])
      ).toEqual([
        [SLEEP_Q, "NO", "LOW", "Mild headache; Sleeping", ["report.txt"]],
        [HEADACHE_Q, "2", "LOW", "Mild headache; Sleeping", ["report.txt"]],
      ]);
      expect(history[0].createdAt.toISOString()).toBe(result.timestamp);

      const snapshot = await manager.getSession(sessionId);
      expect(snapshot).toMatchObject({ status: "COMPLETE", can_request_assessment: false, completed_at: result.timestamp });
    });

    it("writes nothing and stays open when saving the answers fails", async () => {
      await askAndAnswer(sessionId, SLEEP_Q, "YES_NO", "yes");
      await askAndAnswer(sessionId, HEADACHE_Q, "SCALE_0_10", "8");
      storage.failNextBatch = true;
      generator.push(JSON.stringify({ risk_level: "HIGH", reason: ["Severe pain"], action: "ok" }));

      await expect(manager.getAssessment(sessionId)).rejects.toThrow("connection reset");
      expect(await storage.getChatHistory("P1")).toEqual([]);
      expect((await manager.getSession(sessionId)).status).toBe("ACTIVE");

      generator.push(JSON.stringify({ risk_level: "MEDIUM", reason: ["Pain reported"], action: "ok" }));
      const result = await manager.getAssessment(sessionId);

      expect(result.risk_level).toBe("MEDIUM");
      const history = await storage.getChatHistory("P1");
      expect(history.map((t) => [t.question, t.riskLevel])).toEqual([
        [SLEEP_Q, "MEDIUM"],
        [HEADACHE_Q, "MEDIUM"],
      ]);
    });

    it("returns the stored assessment on repeat calls and refuses further changes", async () => {
      await askAndAnswer(sessionId, SLEEP_Q, "YES_NO", "yes");
      await askAndAnswer(sessionId, HEADACHE_Q, "SCALE_0_10", "1");
      generator.push(JSON.stringify({ risk_level: "LOW", reason: ["Stable"], action: "ok" }));

      const first = await manager.getAssessment(sessionId);
      const second = await manager.getAssessment(sessionId);

      expect(second).toEqual(first);
      expect(generator.calls).toHaveLength(3);
      expect(await storage.getChatHistory("P1")).toHaveLength(2);
      expect(await manager.nextQuestion(sessionId)).toEqual({ session_id: sessionId, status: "complete", question: null });
      await expect(manager.submitAnswer(sessionId, SLEEP_Q, "yes", "YES_NO")).rejects.toThrow(SessionClosedError);
    });
  });
});
