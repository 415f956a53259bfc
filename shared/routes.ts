import { z } from 'zod';
import { ANSWER_TYPES, RISK_LEVELS, type Patient, type ChatTurn } from './schema';

export const patientIdSchema = z
  .string()
  .trim()
  .min(1, "patient_id is required")
  .max(64)
  .regex(/^[A-Za-z0-9_-]+$/, "patient_id may only contain letters, digits, '_' and '-'");

export const errorSchemas = {
  validation: z.object({
    error: z.literal("VALIDATION_ERROR"),
    message: z.string(),
    field: z.string().optional(),
  }),
  notFound: z.object({
    error: z.string(),
    message: z.string(),
  }),
  noMedicalReport: z.object({
    error: z.literal("NO_MEDICAL_REPORT"),
    message: z.string(),
    action: z.string(),
  }),
  conflict: z.object({
    error: z.string(),
    message: z.string(),
  }),
  unavailable: z.object({
    error: z.string(),
    message: z.string(),
  }),
};

const riskAssessmentSchema = z.object({
  risk_level: z.enum(RISK_LEVELS),
  reason: z.array(z.string()),
  action: z.string(),
  source: z.enum(["model", "fallback"]),
  total_questions_asked: z.number(),
  timestamp: z.string(),
});

export const api = {
  health: {
    method: 'GET' as const,
    path: '/health',
    responses: {
      200: z.object({ status: z.literal("healthy"), timestamp: z.string(), version: z.string() }),
    },
  },
  patients: {
    register: {
      method: 'POST' as const,
      path: '/patient/register',
      input: z.object({
        patient_id: patientIdSchema,
        name: z.string().trim().min(1, "name is required"),
        email: z.string().email().optional(),
        age: z.number().int().min(0).max(130).optional(),
        medical_history: z.string().optional(),
      }),
      responses: {
        201: z.custom<Patient>(),
        400: errorSchemas.validation,
        409: errorSchemas.conflict,
      },
    },
    list: {
      method: 'GET' as const,
      path: '/patients',
      responses: {
        200: z.array(z.custom<Patient>()),
      },
    },
    get: {
      method: 'GET' as const,
      path: '/patient/:id',
      responses: {
        200: z.custom<Patient>(),
        404: errorSchemas.notFound,
      },
    },
    delete: {
      method: 'DELETE' as const,
      path: '/patient/:id',
      responses: {
        200: z.object({ success: z.boolean(), patient_id: z.string() }),
        404: errorSchemas.notFound,
      },
    },
    reportStatus: {
      method: 'GET' as const,
      path: '/patient/:id/report/status',
      responses: {
        200: z.object({
          patient_id: z.string(),
          has_medical_report: z.boolean(),
          status: z.string(),
          can_proceed_with_monitoring: z.boolean(),
        }),
        404: errorSchemas.notFound,
      },
    },
    uploadReport: {
      method: 'POST' as const,
      path: '/patient/:id/report',
      // Multipart form data, field "file"
      responses: {
        201: z.object({ success: z.boolean(), patient_id: z.string(), chunks: z.number(), total_entries: z.number() }),
        400: errorSchemas.validation,
        404: errorSchemas.notFound,
      },
    },
    documents: {
      method: 'GET' as const,
      path: '/patient/:id/documents',
      responses: {
        200: z.object({
          patient_id: z.string(),
          documents: z.array(z.object({ filename: z.string(), chunks: z.number(), uploaded_at: z.string() })),
          total: z.number(),
        }),
        404: errorSchemas.notFound,
      },
    },
    riskSummary: {
      method: 'GET' as const,
      path: '/patient/:id/risk/summary',
      query: z.object({
        days: z.coerce.number().int().min(1).max(365).default(30),
      }),
      responses: {
        200: z.object({
          patient_id: z.string(),
          period_days: z.number(),
          total_queries: z.number(),
          max_risk_level: z.enum(RISK_LEVELS),
          risk_distribution: z.record(z.number()),
        }),
        404: errorSchemas.notFound,
      },
    },
  },
  documents: {
    upload: {
      method: 'POST' as const,
      path: '/docs/upload',
      // Multipart form data, field "file"; indexed into the shared corpus
      responses: {
        201: z.object({ success: z.boolean(), chunks: z.number(), total_entries: z.number() }),
        400: errorSchemas.validation,
      },
    },
  },
  monitoring: {
    start: {
      method: 'POST' as const,
      path: '/monitoring/session/start',
      input: z.object({
        patient_id: patientIdSchema,
        max_questions: z.number().int().optional(),
      }),
      responses: {
        201: z.object({ session_id: z.string(), patient_id: z.string(), max_questions: z.number() }),
        400: z.union([errorSchemas.noMedicalReport, errorSchemas.validation]),
        404: errorSchemas.notFound,
      },
    },
    nextQuestion: {
      method: 'POST' as const,
      path: '/monitoring/session/:id/next-question',
      responses: {
        200: z.union([
          z.object({
            session_id: z.string(),
            question: z.string(),
            answer_type: z.enum(ANSWER_TYPES),
            explanation: z.string(),
            question_number: z.number(),
            total_expected: z.number(),
          }),
          z.object({ session_id: z.string(), status: z.literal("complete"), question: z.null() }),
        ]),
        404: errorSchemas.notFound,
        502: errorSchemas.unavailable,
        503: errorSchemas.unavailable,
      },
    },
    submitAnswer: {
      method: 'POST' as const,
      path: '/monitoring/session/:id/submit-answer',
      input: z.object({
        question: z.string().min(1, "question is required"),
        answer: z.union([z.string(), z.number()]).transform((v) => String(v)),
        answer_type: z.enum(ANSWER_TYPES),
      }),
      responses: {
        200: z.object({
          success: z.boolean(),
          question_recorded: z.boolean(),
          normalized_answer: z.string(),
          questions_answered: z.number(),
          can_request_assessment: z.boolean(),
        }),
        400: errorSchemas.validation,
        404: errorSchemas.notFound,
        409: errorSchemas.conflict,
      },
    },
    assessment: {
      method: 'POST' as const,
      path: '/monitoring/session/:id/assessment',
      responses: {
        200: riskAssessmentSchema,
        400: errorSchemas.validation,
        404: errorSchemas.notFound,
      },
    },
    get: {
      method: 'GET' as const,
      path: '/monitoring/session/:id',
      responses: {
        404: errorSchemas.notFound,
      },
    },
  },
  daily: {
    question: {
      method: 'POST' as const,
      path: '/questions/daily/:id',
      responses: {
        200: z.object({
          success: z.boolean(),
          patient_id: z.string(),
          question: z.string(),
          answer_type: z.enum(ANSWER_TYPES),
          context: z.string(),
          category: z.string(),
          fallback: z.boolean(),
          generated_at: z.string(),
        }),
        404: errorSchemas.notFound,
      },
    },
    answer: {
      method: 'POST' as const,
      path: '/questions/daily/:id/answer',
      input: z.object({
        question: z.string().trim().min(1, "question is required"),
        answer: z.union([z.string(), z.number()]).transform((v) => String(v)),
        answer_type: z.enum(ANSWER_TYPES),
        category: z.string().optional(),
      }),
      responses: {
        201: z.object({
          success: z.boolean(),
          patient_id: z.string(),
          normalized_answer: z.string(),
          timestamp: z.string(),
        }),
        400: errorSchemas.validation,
        404: errorSchemas.notFound,
      },
    },
    history: {
      method: 'GET' as const,
      path: '/questions/daily/:id/history',
      query: z.object({
        days: z.coerce.number().int().min(1).max(365).default(7),
      }),
      responses: {
        200: z.object({
          patient_id: z.string(),
          days: z.number(),
          total: z.number(),
          history: z.array(z.object({
            question: z.string(),
            answer: z.string(),
            answer_type: z.string(),
            category: z.string(),
            timestamp: z.string(),
          })),
        }),
        404: errorSchemas.notFound,
      },
    },
  },
  chat: {
    query: {
      method: 'POST' as const,
      path: '/chat/query',
      input: z.object({
        patient_id: patientIdSchema,
        message: z.string().trim().min(1, "message is required").max(2000),
      }),
      responses: {
        200: z.object({
          answer: z.string(),
          risk_level: z.enum(RISK_LEVELS),
          risk_reason: z.string(),
          source_documents: z.array(z.string()),
          timestamp: z.string(),
        }),
        400: z.union([errorSchemas.noMedicalReport, errorSchemas.validation]),
        404: errorSchemas.notFound,
        503: errorSchemas.unavailable,
      },
    },
    history: {
      method: 'GET' as const,
      path: '/chat/history/:patientId',
      query: z.object({
        limit: z.coerce.number().int().min(1).max(500).default(50),
      }),
      responses: {
        200: z.object({ patient_id: z.string(), history: z.array(z.custom<ChatTurn>()) }),
        404: errorSchemas.notFound,
      },
    },
    clearHistory: {
      method: 'DELETE' as const,
      path: '/chat/history/:patientId',
      responses: {
        200: z.object({ success: z.boolean(), deleted: z.number() }),
        404: errorSchemas.notFound,
      },
    },
  },
};

export function buildUrl(path: string, params?: Record<string, string | number>): string {
  let url = path;
  if (params) {
    Object.entries(params).forEach(([key, value]) => {
      if (url.includes(`:${key}`)) {
        url = url.replace(`:${key}`, String(value));
      }
    });
  }
  return url;
}
