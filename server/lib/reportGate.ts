import type { Patient } from "@shared/schema";
import type { IStorage } from "../storage";
import type { VectorIndexStore } from "./vectorIndex";
import type { IndexNames } from "./retrieval";
import { PatientNotFoundError, ReportNotUploadedError } from "./errors";

export interface ReportStatus {
  patient_id: string;
  has_medical_report: boolean;
  status: "Ready for monitoring" | "Awaiting medical report upload";
  can_proceed_with_monitoring: boolean;
}

// Monitoring and chat stay closed until the patient has an indexed report.
export class ReportGate {
  constructor(
    private storage: IStorage,
    private indices: VectorIndexStore,
    private names: IndexNames
  ) {}

  async canProceed(patientId: string): Promise<boolean> {
    return (await this.indices.size(this.names.forPatient(patientId))) > 0;
  }

  async assertCanProceed(patientId: string): Promise<Patient> {
    const patient = await this.storage.getPatient(patientId);
    if (!patient) throw new PatientNotFoundError(patientId);
    if (!(await this.canProceed(patientId))) throw new ReportNotUploadedError(patientId);
    return patient;
  }

  async getStatus(patientId: string): Promise<ReportStatus> {
    const patient = await this.storage.getPatient(patientId);
    if (!patient) throw new PatientNotFoundError(patientId);
    const ready = await this.canProceed(patientId);
    return {
      patient_id: patientId,
      has_medical_report: ready,
      status: ready ? "Ready for monitoring" : "Awaiting medical report upload",
      can_proceed_with_monitoring: ready,
    };
  }
}
