import * as fs from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import { RISK_LEVELS, type RiskAssessment, type RiskLevel } from "@shared/schema";
import type { TextGenerator } from "./llm";
import { MalformedStructuredOutputError } from "./errors";
import { buildRiskPrompt, buildRiskSystemPrompt } from "./prompts";
import { logWarn } from "./logger";

export const MAX_CONTEXT_CHARS = 800;
export const MAX_REASON_ITEMS = 3;
export const MAX_REASON_LENGTH = 280;

const levelPolicySchema = z.object({
  keywords: z.array(z.string().min(1)),
  reason: z.string().min(1),
  action: z.string().min(1),
});

const riskPolicySchema = z.object({
  version: z.string(),
  levels: z.object({
    HIGH: levelPolicySchema,
    MEDIUM: levelPolicySchema,
    LOW: levelPolicySchema,
  }),
});

export type RiskPolicy = z.infer<typeof riskPolicySchema>;

const DEFAULT_POLICY_PATH = fileURLToPath(new URL("./riskPolicy.json", import.meta.url));

export function loadRiskPolicy(filePath = DEFAULT_POLICY_PATH): RiskPolicy {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  return riskPolicySchema.parse(raw);
}

export function actionTemplates(policy: RiskPolicy): Record<RiskLevel, string> {
  return {
    HIGH: policy.levels.HIGH.action,
    MEDIUM: policy.levels.MEDIUM.action,
    LOW: policy.levels.LOW.action,
  };
}

/**
 * Ordered keyword match over lowercased text: HIGH keywords first, then
 * MEDIUM, otherwise LOW. Pure and total.
 */
export function keywordFallback(text: string, policy: RiskPolicy): RiskAssessment {
  const lower = text.toLowerCase();
  for (const level of ["HIGH", "MEDIUM"] as const) {
    const rule = policy.levels[level];
    const keyword = rule.keywords.find((k) => lower.includes(k.toLowerCase()));
    if (keyword) {
      return {
        risk_level: level,
        reason: [rule.reason.replace("{keyword}", keyword)],
        action: rule.action,
        source: "fallback",
      };
    }
  }
  return {
    risk_level: "LOW",
    reason: [policy.levels.LOW.reason],
    action: policy.levels.LOW.action,
    source: "fallback",
  };
}

export function stripCodeFences(raw: string): string {
  const trimmed = raw.trim();
  const fenced = trimmed.match(/^```(?:json)?\s*([\s\S]*?)\s*```$/i);
  return fenced ? fenced[1] : trimmed;
}

const modelOutputSchema = z.object({
  risk_level: z.string(),
  reason: z.union([z.string(), z.array(z.string())]),
  action: z.string(),
});

function toRiskLevel(value: string): RiskLevel | undefined {
  const normalized = value.trim().toUpperCase();
  return RISK_LEVELS.find((level) => level === normalized);
}

/**
 * Validates a generator response. Throws MalformedStructuredOutputError on
 * anything that is not a usable assessment; the action is always taken from
 * the policy for the returned level.
 */
export function parseAssessment(raw: string, policy: RiskPolicy): RiskAssessment {
  let data: unknown;
  try {
    data = JSON.parse(stripCodeFences(raw));
  } catch {
    throw new MalformedStructuredOutputError("Assessment response is not JSON", raw);
  }

  const parsed = modelOutputSchema.safeParse(data);
  if (!parsed.success) {
    throw new MalformedStructuredOutputError(`Assessment response has the wrong shape: ${parsed.error.errors[0].message}`, raw);
  }

  const level = toRiskLevel(parsed.data.risk_level);
  if (!level) {
    throw new MalformedStructuredOutputError(`Unknown risk level: ${parsed.data.risk_level}`, raw);
  }

  const reasons = (Array.isArray(parsed.data.reason) ? parsed.data.reason : [parsed.data.reason])
    .map((r) => r.trim())
    .filter((r) => r.length > 0);
  if (reasons.length === 0) {
    throw new MalformedStructuredOutputError("Assessment has no reason", raw);
  }
  if (reasons.some((r) => r.length > MAX_REASON_LENGTH)) {
    throw new MalformedStructuredOutputError("Assessment reason is too long", raw);
  }

  if (!parsed.data.action.trim()) {
    throw new MalformedStructuredOutputError("Assessment has no action", raw);
  }

  return {
    risk_level: level,
    reason: reasons.slice(0, MAX_REASON_ITEMS),
    action: policy.levels[level].action,
    source: "model",
  };
}

export interface QuestionAnswer {
  question: string;
  answer: string;
}

export class RiskClassifier {
  private systemPrompt: string;

  constructor(
    private generator: TextGenerator,
    readonly policy: RiskPolicy = loadRiskPolicy()
  ) {
    this.systemPrompt = buildRiskSystemPrompt(actionTemplates(policy));
  }

  /**
   * Never rejects: a generator failure or unusable output degrades to the
   * keyword fallback over the same transcript and context.
   */
  async assess(patientHistory: string, qaPairs: QuestionAnswer[], retrievedContext: string): Promise<RiskAssessment> {
    const context = retrievedContext.slice(0, MAX_CONTEXT_CHARS);
    const prompt = buildRiskPrompt({ patientHistory, transcript: qaPairs, context });

    try {
      const raw = await this.generator.generate(prompt, { systemPrompt: this.systemPrompt, jsonMode: true });
      return parseAssessment(raw, this.policy);
    } catch (e) {
      const kind = e instanceof Error ? e.name : "UnknownError";
      logWarn(`assessment fell back to keyword rules (${kind})`, "risk");
      const text = [...qaPairs.map((qa) => `${qa.question} ${qa.answer}`), context].join(" ");
      return keywordFallback(text, this.policy);
    }
  }
}
