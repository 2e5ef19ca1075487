import { relations } from "drizzle-orm/relations";
import {
	factEncounters,
	dimDate,
	dimPatient,
	dimProvider,
	dimSpecialty,
	dimDepartment,
	dimEncounterType,
	dimDiagnoses,
	dimProcedures,
	bridgeEncounterDiagnoses,
	bridgeEncounterProcedures,
} from "./olap.schema";

export const factEncountersRelations = relations(factEncounters, ({one, many}) => ({
	date: one(dimDate, {
		fields: [factEncounters.dateKey],
		references: [dimDate.dateKey]
	}),
	patient: one(dimPatient, {
		fields: [factEncounters.patientKey],
		references: [dimPatient.patientKey]
	}),
	provider: one(dimProvider, {
		fields: [factEncounters.providerKey],
		references: [dimProvider.providerKey]
	}),
	specialty: one(dimSpecialty, {
		fields: [factEncounters.specialtyKey],
		references: [dimSpecialty.specialtyKey]
	}),
	department: one(dimDepartment, {
		fields: [factEncounters.departmentKey],
		references: [dimDepartment.departmentKey]
	}),
	encounterType: one(dimEncounterType, {
		fields: [factEncounters.encounterTypeKey],
		references: [dimEncounterType.encounterTypeKey]
	}),
	diagnoses: many(bridgeEncounterDiagnoses),
	procedures: many(bridgeEncounterProcedures),
}));

export const bridgeEncounterDiagnosesRelations = relations(bridgeEncounterDiagnoses, ({one}) => ({
	encounter: one(factEncounters, {
		fields: [bridgeEncounterDiagnoses.encounterKey],
		references: [factEncounters.encounterKey]
	}),
	diagnosis: one(dimDiagnoses, {
		fields: [bridgeEncounterDiagnoses.diagnosisKey],
		references: [dimDiagnoses.diagnosisKey]
	}),
}));

export const bridgeEncounterProceduresRelations = relations(bridgeEncounterProcedures, ({one}) => ({
	encounter: one(factEncounters, {
		fields: [bridgeEncounterProcedures.encounterKey],
		references: [factEncounters.encounterKey]
	}),
	procedure: one(dimProcedures, {
		fields: [bridgeEncounterProcedures.procedureKey],
		references: [dimProcedures.procedureKey]
	}),
}));

export const dimDiagnosesRelations = relations(dimDiagnoses, ({many}) => ({
	encounters: many(bridgeEncounterDiagnoses),
}));

export const dimProceduresRelations = relations(dimProcedures, ({many}) => ({
	encounters: many(bridgeEncounterProcedures),
}));
