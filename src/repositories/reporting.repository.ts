import { asc, countDistinct, desc, eq, gte, sql } from 'drizzle-orm';
import { BaseRepository } from './base.repository';
import {
  bridgeEncounterDiagnoses,
  bridgeEncounterProcedures,
  dimDate,
  dimDiagnoses,
  dimEncounterType,
  dimProcedures,
  dimSpecialty,
  factEncounters,
} from '../drizzle/olap.schema';
import { INPATIENT_ENCOUNTER_TYPE } from '../config/etl';

export interface MonthlyEncounterRow {
  year: number;
  month: number;
  monthName: string;
  specialtyName: string;
  encounterTypeName: string;
  totalEncounters: number;
  uniquePatients: number;
}

export interface DiagnosisProcedurePairRow {
  icd10Code: string;
  icd10Description: string | null;
  cptCode: string;
  cptDescription: string | null;
  encounterCount: number;
}

export interface ReadmissionRateRow {
  specialtyName: string;
  totalInpatientEncounters: number;
  readmissions: number;
  readmissionRatePct: number;
}

export interface RevenueRow {
  year: number;
  month: number;
  monthName: string;
  specialtyName: string;
  totalEncounters: number;
  encountersWithBilling: number;
  totalClaimed: string;
  totalAllowed: string;
  avgAllowedPerClaim: string | null;
  billingRatePct: number;
}

/** Read-only queries over the published star schema. */
export class ReportingRepository extends BaseRepository {
  async monthlyEncountersBySpecialty(year?: number): Promise<MonthlyEncounterRow[]> {
    return await this.db
      .select({
        year: dimDate.year,
        month: dimDate.month,
        monthName: dimDate.monthName,
        specialtyName: dimSpecialty.specialtyName,
        encounterTypeName: dimEncounterType.encounterTypeName,
        totalEncounters: sql<number>`count(*)`.mapWith(Number),
        uniquePatients: countDistinct(factEncounters.patientKey),
      })
      .from(factEncounters)
      .innerJoin(dimDate, eq(factEncounters.dateKey, dimDate.dateKey))
      .innerJoin(dimSpecialty, eq(factEncounters.specialtyKey, dimSpecialty.specialtyKey))
      .innerJoin(dimEncounterType, eq(factEncounters.encounterTypeKey, dimEncounterType.encounterTypeKey))
      .where(year !== undefined ? eq(dimDate.year, year) : undefined)
      .groupBy(
        dimDate.year,
        dimDate.month,
        dimDate.monthName,
        dimSpecialty.specialtyName,
        dimEncounterType.encounterTypeName
      )
      .orderBy(desc(dimDate.year), desc(dimDate.month), asc(dimSpecialty.specialtyName));
  }

  async topDiagnosisProcedurePairs(minEncounters: number, limit: number): Promise<DiagnosisProcedurePairRow[]> {
    const encounterCount = countDistinct(bridgeEncounterDiagnoses.encounterKey);

    return await this.db
      .select({
        icd10Code: dimDiagnoses.icd10Code,
        icd10Description: dimDiagnoses.icd10Description,
        cptCode: dimProcedures.cptCode,
        cptDescription: dimProcedures.cptDescription,
        encounterCount,
      })
      .from(bridgeEncounterDiagnoses)
      .innerJoin(
        bridgeEncounterProcedures,
        eq(bridgeEncounterDiagnoses.encounterKey, bridgeEncounterProcedures.encounterKey)
      )
      .innerJoin(dimDiagnoses, eq(bridgeEncounterDiagnoses.diagnosisKey, dimDiagnoses.diagnosisKey))
      .innerJoin(dimProcedures, eq(bridgeEncounterProcedures.procedureKey, dimProcedures.procedureKey))
      .groupBy(
        dimDiagnoses.icd10Code,
        dimDiagnoses.icd10Description,
        dimProcedures.cptCode,
        dimProcedures.cptDescription
      )
      .having(gte(encounterCount, minEncounters))
      .orderBy(desc(encounterCount))
      .limit(limit);
  }

  /**
   * Rates are computed over inpatient encounters only, while the indicator on
   * the fact row looks at every encounter type.
   */
  async readmissionRatesBySpecialty(minEncounters: number): Promise<ReadmissionRateRow[]> {
    const total = sql<number>`count(*)`.mapWith(Number);
    const readmissions = sql<number>`sum(case when ${factEncounters.isReadmission} then 1 else 0 end)`.mapWith(Number);
    const ratePct = sql<number>`round(100.0 * sum(case when ${factEncounters.isReadmission} then 1 else 0 end) / count(*), 2)`.mapWith(Number);

    return await this.db
      .select({
        specialtyName: dimSpecialty.specialtyName,
        totalInpatientEncounters: total,
        readmissions,
        readmissionRatePct: ratePct,
      })
      .from(factEncounters)
      .innerJoin(dimSpecialty, eq(factEncounters.specialtyKey, dimSpecialty.specialtyKey))
      .innerJoin(dimEncounterType, eq(factEncounters.encounterTypeKey, dimEncounterType.encounterTypeKey))
      .where(eq(dimEncounterType.encounterTypeName, INPATIENT_ENCOUNTER_TYPE))
      .groupBy(dimSpecialty.specialtyName)
      .having(gte(total, minEncounters))
      .orderBy(desc(ratePct));
  }

  async revenueBySpecialtyAndMonth(year: number): Promise<RevenueRow[]> {
    const billed = sql`case when ${factEncounters.totalClaimAmount} > 0 then 1 else 0 end`;
    const totalAllowed = sql<string>`sum(${factEncounters.totalAllowedAmount})`;

    return await this.db
      .select({
        year: dimDate.year,
        month: dimDate.month,
        monthName: dimDate.monthName,
        specialtyName: dimSpecialty.specialtyName,
        totalEncounters: sql<number>`count(*)`.mapWith(Number),
        encountersWithBilling: sql<number>`sum(${billed})`.mapWith(Number),
        totalClaimed: sql<string>`sum(${factEncounters.totalClaimAmount})`,
        totalAllowed,
        avgAllowedPerClaim: sql<string | null>`round(avg(nullif(${factEncounters.totalAllowedAmount}, 0)), 2)`,
        billingRatePct: sql<number>`round(100.0 * sum(${billed}) / count(*), 2)`.mapWith(Number),
      })
      .from(factEncounters)
      .innerJoin(dimDate, eq(factEncounters.dateKey, dimDate.dateKey))
      .innerJoin(dimSpecialty, eq(factEncounters.specialtyKey, dimSpecialty.specialtyKey))
      .where(eq(dimDate.year, year))
      .groupBy(dimDate.year, dimDate.month, dimDate.monthName, dimSpecialty.specialtyName)
      .orderBy(asc(dimDate.month), desc(totalAllowed));
  }
}
