import { ANSWER_TYPES, type AnswerType } from "@shared/schema";

export interface ValidatedAnswer {
  isValid: boolean;
  validatedAnswer: string;
  error?: string;
}

export const SHORT_TEXT_MAX_LENGTH = 500;

// Case-insensitive match against the known answer types.
export function toAnswerType(value: string): AnswerType | undefined {
  const normalized = value.trim().toUpperCase();
  return ANSWER_TYPES.find((t) => t === normalized);
}

const acceptedYes = ["yes", "y", "yeah", "yep", "yea", "true", "correct"];
const acceptedNo = ["no", "n", "nope", "nah", "false", "negative"];

function validateYesNo(answer: string): ValidatedAnswer {
  const normalized = answer.trim().toLowerCase().replace(/[.!]+$/, "");

  if (acceptedYes.includes(normalized)) {
    return { isValid: true, validatedAnswer: "YES" };
  }
  if (acceptedNo.includes(normalized)) {
    return { isValid: true, validatedAnswer: "NO" };
  }
  return { isValid: false, validatedAnswer: answer.trim(), error: "Please answer YES or NO" };
}

function validateScale(answer: string): ValidatedAnswer {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) {
    return { isValid: false, validatedAnswer: trimmed, error: "Please answer with a whole number from 0 to 10" };
  }
  const value = parseInt(trimmed, 10);
  if (value < 0 || value > 10) {
    return { isValid: false, validatedAnswer: trimmed, error: `${value} is outside the 0-10 scale` };
  }
  return { isValid: true, validatedAnswer: String(value) };
}

function validateShortText(answer: string): ValidatedAnswer {
  const trimmed = answer.trim();
  if (!trimmed) {
    return { isValid: false, validatedAnswer: trimmed, error: "Answer cannot be empty" };
  }
  if (trimmed.length > SHORT_TEXT_MAX_LENGTH) {
    return {
      isValid: false,
      validatedAnswer: trimmed,
      error: `Answer must be at most ${SHORT_TEXT_MAX_LENGTH} characters`,
    };
  }
  return { isValid: true, validatedAnswer: trimmed };
}

export function validateAnswer(answerType: AnswerType, answer: string): ValidatedAnswer {
  switch (answerType) {
    case "YES_NO":
      return validateYesNo(answer);
    case "SCALE_0_10":
      return validateScale(answer);
    case "SHORT_TEXT":
      return validateShortText(answer);
  }
}
