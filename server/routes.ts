import type { Express, NextFunction, Request, Response } from "express";
import type { Server } from "http";
import * as path from "path";
import multer from "multer";
import { api, patientIdSchema } from "@shared/routes";
import type { Services } from "./services";
import { InvalidRequestError, PatientAlreadyExistsError, PatientNotFoundError } from "./lib/errors";

const MAX_UPLOAD_BYTES = 5 * 1024 * 1024;

const upload = multer({
  storage: multer.memoryStorage(),
  limits: { fileSize: MAX_UPLOAD_BYTES },
});

type Handler = (req: Request, res: Response) => Promise<unknown>;

// Express 4 does not forward rejected promises to the error middleware.
function handle(fn: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

function uploadedText(req: Request): { filename: string; text: string } {
  if (!req.file) throw new InvalidRequestError("No file uploaded", "file");
  const ext = path.extname(req.file.originalname).toLowerCase();
  if (ext !== ".txt") {
    throw new InvalidRequestError(`Unsupported file type ${ext || "(none)"}; upload a .txt report`, "file");
  }
  return { filename: req.file.originalname, text: req.file.buffer.toString("utf-8") };
}

export async function registerRoutes(
  httpServer: Server,
  app: Express,
  services: Services
): Promise<Server> {
  const { storage, reportGate, ingestor, monitoring, daily, chat } = services;

  const requirePatient = async (patientId: string) => {
    const patient = await storage.getPatient(patientId);
    if (!patient) throw new PatientNotFoundError(patientId);
    return patient;
  };

  app.get(api.health.path, (_req, res) => {
    res.json({ status: "healthy", timestamp: new Date().toISOString(), version: "1.0.0" });
  });

  // === Patients ===

  app.post(api.patients.register.path, handle(async (req, res) => {
    const input = api.patients.register.input.parse(req.body);
    if (await storage.getPatient(input.patient_id)) {
      throw new PatientAlreadyExistsError(input.patient_id);
    }
    const patient = await storage.createPatient({
      patientId: input.patient_id,
      name: input.name,
      email: input.email ?? null,
      age: input.age ?? null,
      medicalHistory: input.medical_history ?? "",
    });
    res.status(201).json(patient);
  }));

  app.get(api.patients.list.path, handle(async (_req, res) => {
    res.json(await storage.getPatients());
  }));

  app.get(api.patients.get.path, handle(async (req, res) => {
    const patientId = patientIdSchema.parse(req.params.id);
    const patient = await requirePatient(patientId);
    await storage.touchPatient(patientId);
    res.json(patient);
  }));

  app.delete(api.patients.delete.path, handle(async (req, res) => {
    const patientId = patientIdSchema.parse(req.params.id);
    await requirePatient(patientId);
    await storage.deletePatient(patientId);
    await services.indices.remove(services.names.forPatient(patientId));
    chat.forget(patientId);
    res.json({ success: true, patient_id: patientId });
  }));

  app.get(api.patients.reportStatus.path, handle(async (req, res) => {
    const patientId = patientIdSchema.parse(req.params.id);
    res.json(await reportGate.getStatus(patientId));
  }));

  app.post(api.patients.uploadReport.path, upload.single("file"), handle(async (req, res) => {
    const patientId = patientIdSchema.parse(req.params.id);
    await requirePatient(patientId);
    const { filename, text } = uploadedText(req);
    const result = await ingestor.ingestPatientReport(patientId, filename, text);
    res.status(201).json({
      success: true,
      patient_id: patientId,
      chunks: result.chunks,
      total_entries: result.totalEntries,
    });
  }));

  app.get(api.patients.documents.path, handle(async (req, res) => {
    const patientId = patientIdSchema.parse(req.params.id);
    await requirePatient(patientId);
    const reports = await ingestor.listPatientReports(patientId);
    res.json({
      patient_id: patientId,
      documents: reports.map((r) => ({ filename: r.source, chunks: r.chunks, uploaded_at: r.addedAt })),
      total: reports.length,
    });
  }));

  app.get(api.patients.riskSummary.path, handle(async (req, res) => {
    const patientId = patientIdSchema.parse(req.params.id);
    const { days } = api.patients.riskSummary.query.parse(req.query);
    await requirePatient(patientId);
    res.json(await storage.getRiskSummary(patientId, days));
  }));

  // === Shared corpus ===

  app.post(api.documents.upload.path, upload.single("file"), handle(async (req, res) => {
    const { filename, text } = uploadedText(req);
    const result = await ingestor.ingestSharedDocument(filename, text);
    res.status(201).json({ success: true, chunks: result.chunks, total_entries: result.totalEntries });
  }));

  // === Monitoring sessions ===

  app.post(api.monitoring.start.path, handle(async (req, res) => {
    const input = api.monitoring.start.input.parse(req.body);
    const result = await monitoring.startSession(input.patient_id, input.max_questions);
    res.status(201).json(result);
  }));

  app.post(api.monitoring.nextQuestion.path, handle(async (req, res) => {
    res.json(await monitoring.nextQuestion(req.params.id));
  }));

  app.post(api.monitoring.submitAnswer.path, handle(async (req, res) => {
    const input = api.monitoring.submitAnswer.input.parse(req.body);
    res.json(await monitoring.submitAnswer(req.params.id, input.question, input.answer, input.answer_type));
  }));

  app.post(api.monitoring.assessment.path, handle(async (req, res) => {
    res.json(await monitoring.getAssessment(req.params.id));
  }));

  app.get(api.monitoring.get.path, handle(async (req, res) => {
    res.json(await monitoring.getSession(req.params.id));
  }));

  // === Daily check-in ===

  app.post(api.daily.question.path, handle(async (req, res) => {
    const patientId = patientIdSchema.parse(req.params.id);
    res.json(await daily.generate(patientId));
  }));

  app.post(api.daily.answer.path, handle(async (req, res) => {
    const patientId = patientIdSchema.parse(req.params.id);
    const input = api.daily.answer.input.parse(req.body);
    res.status(201).json(await daily.saveAnswer(patientId, input));
  }));

  app.get(api.daily.history.path, handle(async (req, res) => {
    const patientId = patientIdSchema.parse(req.params.id);
    const { days } = api.daily.history.query.parse(req.query);
    res.json(await daily.history(patientId, days));
  }));

  // === Freeform chat ===

  app.post(api.chat.query.path, handle(async (req, res) => {
    const input = api.chat.query.input.parse(req.body);
    res.json(await chat.ask(input.patient_id, input.message));
  }));

  app.get(api.chat.history.path, handle(async (req, res) => {
    const patientId = patientIdSchema.parse(req.params.patientId);
    const { limit } = api.chat.history.query.parse(req.query);
    await requirePatient(patientId);
    res.json({ patient_id: patientId, history: await storage.getChatHistory(patientId, limit) });
  }));

  app.delete(api.chat.clearHistory.path, handle(async (req, res) => {
    const patientId = patientIdSchema.parse(req.params.patientId);
    await requirePatient(patientId);
    const deleted = await chat.clearHistory(patientId);
    res.json({ success: true, deleted });
  }));

  return httpServer;
}
