import { asc } from 'drizzle-orm';
import { sourceDb } from '../config/database';
import {
  specialties,
  departments,
  providers,
  patients,
  diagnoses,
  procedures,
  encounters,
  encounterDiagnoses,
  encounterProcedures,
  billing,
} from '../drizzle/oltp.schema';
import type { SourceReader, SourceSnapshot } from '../etl/interfaces';

/** Read-only access to the normalized source schema. */
export class SourceRepository implements SourceReader {
  private db = sourceDb;

  async extractSnapshot(): Promise<SourceSnapshot> {
    return await this.db.transaction(
      async (tx) => {
        const [
          specialtyRows,
          departmentRows,
          providerRows,
          patientRows,
          diagnosisRows,
          procedureRows,
          encounterRows,
          encounterDiagnosisRows,
          encounterProcedureRows,
          billingRows,
        ] = await Promise.all([
          tx.select().from(specialties).orderBy(asc(specialties.specialtyId)),
          tx.select().from(departments).orderBy(asc(departments.departmentId)),
          tx.select().from(providers).orderBy(asc(providers.providerId)),
          tx.select().from(patients).orderBy(asc(patients.patientId)),
          tx.select().from(diagnoses).orderBy(asc(diagnoses.diagnosisId)),
          tx.select().from(procedures).orderBy(asc(procedures.procedureId)),
          tx.select().from(encounters).orderBy(asc(encounters.encounterId)),
          tx.select().from(encounterDiagnoses).orderBy(asc(encounterDiagnoses.encounterDiagnosisId)),
          tx.select().from(encounterProcedures).orderBy(asc(encounterProcedures.encounterProcedureId)),
          tx.select().from(billing).orderBy(asc(billing.billingId)),
        ]);

        return {
          specialties: specialtyRows,
          departments: departmentRows,
          providers: providerRows,
          patients: patientRows,
          diagnoses: diagnosisRows,
          procedures: procedureRows,
          encounters: encounterRows,
          encounterDiagnoses: encounterDiagnosisRows,
          encounterProcedures: encounterProcedureRows,
          billing: billingRows,
        };
      },
      { isolationLevel: 'repeatable read', accessMode: 'read only' }
    );
  }
}
