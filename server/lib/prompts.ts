import type { QuestionAnswerPair, RiskLevel } from "@shared/schema";

export const MONITORING_SYSTEM_PROMPT = `You support post-discharge monitoring of neurological patients.

The patient's medical reports have been reviewed and are summarised in each request.

QUESTIONS:
- Ask ONE question at a time, specific to neurological symptoms
- Answer types: YES_NO, SCALE_0_10 or SHORT_TEXT
- Never repeat a question already asked in this session
- Use previous answers to choose what to ask next
- Do not follow up on symptoms the patient has already denied

SYMPTOM AREAS:
Headache and pain, motor function, sensation, cognition and memory, speech,
vision, balance and coordination, sleep, mood.

SAFETY:
1. Never diagnose
2. Never recommend medication changes
3. Use plain, patient-friendly language

Respond with a single JSON object and nothing else.`;

export interface QuestionPromptInput {
  patientHistory: string;
  guidance: string;
  answered: QuestionAnswerPair[];
  deniedQuestions: string[];
  questionNumber: number;
  maxQuestions: number;
}

function formatTranscript(pairs: QuestionAnswerPair[]): string {
  if (pairs.length === 0) return "No previous answers yet.";
  return pairs
    .map((qa, i) => `Q${i + 1}: ${qa.question}\nAnswer (${qa.answerType}): ${qa.answer}`)
    .join("\n");
}

export function buildQuestionPrompt(input: QuestionPromptInput): string {
  const denied = input.deniedQuestions.length > 0
    ? input.deniedQuestions.map((q) => `- ${q}`).join("\n")
    : "None";

  return `PATIENT CONTEXT:
Medical History: ${input.patientHistory || "Not provided"}

MEDICAL GUIDANCE:
${input.guidance || "No guidance retrieved."}

PREVIOUS RESPONSES:
${formatTranscript(input.answered)}

ANSWERED "NO" (do not ask follow-ups on these):
${denied}

QUESTION ${input.questionNumber} OF ${input.maxQuestions}:
Generate the next monitoring question:
1. Cover a neurological symptom not previously asked about
2. Choose the answer type that fits (YES_NO, SCALE_0_10 or SHORT_TEXT)
3. Make it specific and measurable

Return ONLY valid JSON:
{
  "question": "Your question here",
  "answer_type": "YES_NO | SCALE_0_10 | SHORT_TEXT",
  "explanation": "Why this is being asked, based on the context"
}`;
}

export function buildRiskSystemPrompt(actions: Record<RiskLevel, string>): string {
  return `You assess risk for post-discharge neurological patients from their monitoring answers.

RISK LEVELS (exactly one of LOW, MEDIUM, HIGH):
- HIGH: explicit red-flag symptoms such as seizure, new confusion, sudden weakness, vision loss, speech difficulty or severe headache
- MEDIUM: symptoms that are present, persistent or worsening but without red flags
- LOW: no concerning symptoms reported

Prefer LOW or MEDIUM unless a red-flag symptom is explicitly reported.

ACTIONS (use the text for the chosen level verbatim):
- HIGH: "${actions.HIGH}"
- MEDIUM: "${actions.MEDIUM}"
- LOW: "${actions.LOW}"

Never diagnose and never recommend medication changes.
Respond with a single JSON object and nothing else.`;
}

export interface RiskPromptInput {
  patientHistory: string;
  transcript: Array<{ question: string; answer: string }>;
  context: string;
}

export function buildRiskPrompt(input: RiskPromptInput): string {
  const transcript = input.transcript.length > 0
    ? input.transcript.map((qa, i) => `Q${i + 1}: ${qa.question}\nA${i + 1}: ${qa.answer}`).join("\n")
    : "No responses recorded.";

  return `PATIENT HISTORY:
${input.patientHistory || "Not provided"}

RESPONSES:
${transcript}

MEDICAL CONTEXT:
${input.context || "None"}

Return ONLY valid JSON:
{
  "risk_level": "LOW | MEDIUM | HIGH",
  "reason": ["short point", "short point"],
  "action": "the action text for the chosen level"
}`;
}

export const CHAT_SYSTEM_PROMPT = `You are a medical assistant for post-discharge neurological patients.
Answer using the patient's records and the clinical reference material provided.
If the material does not cover the question, say so.
Do not diagnose and do not recommend medication changes.
Keep answers short and in plain language.`;

export interface ChatPromptInput {
  patientHistory: string;
  context: string;
  memory: Array<{ question: string; answer: string }>;
  message: string;
}

export function buildChatPrompt(input: ChatPromptInput): string {
  const memory = input.memory.length > 0
    ? input.memory.map((ex) => `Patient: ${ex.question}\nAssistant: ${ex.answer}`).join("\n\n")
    : "None";

  return `PATIENT HISTORY:
${input.patientHistory || "Not provided"}

CONTEXT:
${input.context || "No documents matched this question."}

RECENT CONVERSATION:
${memory}

QUESTION:
${input.message}`;
}

export interface DailyPromptInput {
  patientHistory: string;
  guidance: string;
  recentAnswers: Array<{ question: string; answer: string }>;
  riskTrend: string;
}

export function buildDailyQuestionPrompt(input: DailyPromptInput): string {
  const recent = input.recentAnswers.length > 0
    ? input.recentAnswers.map((a) => `- ${a.question} -> ${a.answer}`).join("\n")
    : "No daily answers in the last week.";

  return `You are generating today's symptom check-in question for a post-discharge neurological patient.

PATIENT CONTEXT:
Medical History: ${input.patientHistory || "Not provided"}
Risk Trend: ${input.riskTrend}

RECENT DAILY ANSWERS:
${recent}

MEDICAL GUIDANCE:
${input.guidance || "No guidance retrieved."}

RULES:
1. Ask about ONE specific symptom, in plain language
2. Prefer YES_NO or SCALE_0_10; use SHORT_TEXT only when a number cannot capture it
3. Do not repeat a recent daily question; vary the focus
4. Be respectful and non-alarming

Return ONLY valid JSON:
{
  "question": "Your question here",
  "answer_type": "YES_NO | SCALE_0_10 | SHORT_TEXT",
  "context": "Why this matters today",
  "category": "headache | mobility | cognitive | pain | sleep | mood | general"
}`;
}
