// Error taxonomy for the monitoring engine. `status` is the HTTP status the
// error middleware responds with; internal-only errors carry 500.

export class MonitoringError extends Error {
  constructor(
    message: string,
    public status: number,
    public code: string
  ) {
    super(message);
    this.name = "MonitoringError";
  }

  toJSON(): Record<string, unknown> {
    return { error: this.code, message: this.message };
  }
}

export class PatientNotFoundError extends MonitoringError {
  constructor(public patientId: string) {
    super(`Patient ${patientId} not found`, 404, "PATIENT_NOT_FOUND");
    this.name = "PatientNotFoundError";
  }
}

export class PatientAlreadyExistsError extends MonitoringError {
  constructor(public patientId: string) {
    super(`Patient ${patientId} already exists`, 409, "PATIENT_EXISTS");
    this.name = "PatientAlreadyExistsError";
  }
}

export class ReportNotUploadedError extends MonitoringError {
  readonly action = "Please upload patient medical reports before starting monitoring";

  constructor(public patientId: string) {
    super("Medical reports are required before symptom monitoring can begin.", 400, "NO_MEDICAL_REPORT");
    this.name = "ReportNotUploadedError";
  }

  toJSON(): Record<string, unknown> {
    return { error: this.code, message: this.message, action: this.action };
  }
}

export class SessionNotFoundError extends MonitoringError {
  constructor(public sessionId: string) {
    super(`Session ${sessionId} not found`, 404, "SESSION_NOT_FOUND");
    this.name = "SessionNotFoundError";
  }
}

export class SessionClosedError extends MonitoringError {
  constructor(public sessionId: string) {
    super(`Session ${sessionId} is complete and can no longer be changed`, 409, "SESSION_COMPLETE");
    this.name = "SessionClosedError";
  }
}

export class InvalidAnswerError extends MonitoringError {
  constructor(message: string) {
    super(message, 400, "INVALID_ANSWER");
    this.name = "InvalidAnswerError";
  }
}

export class InvalidRequestError extends MonitoringError {
  constructor(message: string, public field?: string) {
    super(message, 400, "VALIDATION_ERROR");
    this.name = "InvalidRequestError";
  }

  toJSON(): Record<string, unknown> {
    return { error: this.code, message: this.message, field: this.field };
  }
}

export class AssessmentNotReadyError extends MonitoringError {
  constructor(public answered: number, public required: number) {
    super(
      `At least ${required} answered questions are required before assessment (answered: ${answered})`,
      400,
      "ASSESSMENT_NOT_READY"
    );
    this.name = "AssessmentNotReadyError";
  }
}

// Internal guard; the session manager regenerates instead of surfacing it.
export class DuplicateQuestionError extends MonitoringError {
  constructor(public question: string) {
    super(`Question already asked in this session: ${question}`, 500, "DUPLICATE_QUESTION");
    this.name = "DuplicateQuestionError";
  }
}

export class QuestionBudgetExhaustedError extends MonitoringError {
  constructor(public maxQuestions: number) {
    super(`Question budget of ${maxQuestions} already used`, 500, "QUESTION_BUDGET_EXHAUSTED");
    this.name = "QuestionBudgetExhaustedError";
  }
}

export class MalformedStructuredOutputError extends MonitoringError {
  constructor(message: string, public raw: string) {
    super(message, 502, "MALFORMED_OUTPUT");
    this.name = "MalformedStructuredOutputError";
  }
}

export class QuestionGenerationFailedError extends MonitoringError {
  constructor(public attempts: number) {
    super(`Could not generate a valid monitoring question after ${attempts} attempts`, 502, "QUESTION_GENERATION_FAILED");
    this.name = "QuestionGenerationFailedError";
  }
}

export class GenerationServiceUnavailableError extends MonitoringError {
  constructor(message: string, public cause?: unknown) {
    super(message, 503, "GENERATION_SERVICE_UNAVAILABLE");
    this.name = "GenerationServiceUnavailableError";
  }
}
