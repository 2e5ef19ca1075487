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
} from './oltp.schema';
import {
  dimSpecialty,
  dimDepartment,
  dimProvider,
  dimPatient,
  dimDiagnoses,
  dimProcedures,
  dimEncounterType,
  dimDate,
  factEncounters,
  bridgeEncounterDiagnoses,
  bridgeEncounterProcedures,
  etlControl,
} from './olap.schema';

export type SourceSpecialty = typeof specialties.$inferSelect;
export type SourceDepartment = typeof departments.$inferSelect;
export type SourceProvider = typeof providers.$inferSelect;
export type SourcePatient = typeof patients.$inferSelect;
export type SourceDiagnosis = typeof diagnoses.$inferSelect;
export type SourceProcedure = typeof procedures.$inferSelect;
export type SourceEncounter = typeof encounters.$inferSelect;
export type SourceEncounterDiagnosis = typeof encounterDiagnoses.$inferSelect;
export type SourceEncounterProcedure = typeof encounterProcedures.$inferSelect;
export type SourceBilling = typeof billing.$inferSelect;

export type DimSpecialty = typeof dimSpecialty.$inferSelect;

export type DimDepartment = typeof dimDepartment.$inferSelect;

export type DimProvider = typeof dimProvider.$inferSelect;

export type DimPatient = typeof dimPatient.$inferSelect;

export type DimDiagnosis = typeof dimDiagnoses.$inferSelect;

export type DimProcedure = typeof dimProcedures.$inferSelect;

export type DimEncounterType = typeof dimEncounterType.$inferSelect;

export type DimDate = typeof dimDate.$inferSelect;

export type FactEncounter = typeof factEncounters.$inferSelect;

export type BridgeEncounterDiagnosis = typeof bridgeEncounterDiagnoses.$inferSelect;

export type BridgeEncounterProcedure = typeof bridgeEncounterProcedures.$inferSelect;

export type EtlRun = typeof etlControl.$inferSelect;
