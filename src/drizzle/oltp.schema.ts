import { pgSchema, serial, integer, varchar, date, timestamp, numeric, index, foreignKey } from "drizzle-orm/pg-core"

export const oltp = pgSchema("healthtech_oltp");

export const specialties = oltp.table("specialties", {
	specialtyId: serial("specialty_id").primaryKey(),
	specialtyName: varchar("specialty_name", { length: 100 }).notNull(),
	specialtyCode: varchar("specialty_code", { length: 20 }),
});

export const departments = oltp.table("departments", {
	departmentId: serial("department_id").primaryKey(),
	departmentName: varchar("department_name", { length: 100 }).notNull(),
	floor: integer(),
	capacity: integer(),
});

export const providers = oltp.table("providers", {
	providerId: serial("provider_id").primaryKey(),
	firstName: varchar("first_name", { length: 100 }),
	lastName: varchar("last_name", { length: 100 }),
	credential: varchar({ length: 20 }),
	specialtyId: integer("specialty_id"),
	departmentId: integer("department_id"),
}, (table) => [
	foreignKey({
			columns: [table.specialtyId],
			foreignColumns: [specialties.specialtyId],
			name: "providers_specialty_id_fkey"
		}),
	foreignKey({
			columns: [table.departmentId],
			foreignColumns: [departments.departmentId],
			name: "providers_department_id_fkey"
		}),
]);

export const patients = oltp.table("patients", {
	patientId: serial("patient_id").primaryKey(),
	firstName: varchar("first_name", { length: 100 }),
	lastName: varchar("last_name", { length: 100 }),
	dateOfBirth: date("date_of_birth", { mode: 'string' }),
	gender: varchar({ length: 10 }),
	mrn: varchar({ length: 20 }),
});

export const diagnoses = oltp.table("diagnoses", {
	diagnosisId: serial("diagnosis_id").primaryKey(),
	icd10Code: varchar("icd10_code", { length: 10 }).notNull(),
	icd10Description: varchar("icd10_description", { length: 200 }),
});

export const procedures = oltp.table("procedures", {
	procedureId: serial("procedure_id").primaryKey(),
	cptCode: varchar("cpt_code", { length: 10 }).notNull(),
	cptDescription: varchar("cpt_description", { length: 200 }),
});

export const encounters = oltp.table("encounters", {
	encounterId: serial("encounter_id").primaryKey(),
	patientId: integer("patient_id"),
	providerId: integer("provider_id"),
	encounterType: varchar("encounter_type", { length: 50 }),
	encounterDate: timestamp("encounter_date", { mode: 'string' }),
	dischargeDate: timestamp("discharge_date", { mode: 'string' }),
	departmentId: integer("department_id"),
}, (table) => [
	index("encounters_patient_date_idx").using("btree", table.patientId.asc().nullsLast(), table.encounterDate.asc().nullsLast()),
	index("encounters_provider_idx").using("btree", table.providerId.asc().nullsLast()),
]);

export const encounterDiagnoses = oltp.table("encounter_diagnoses", {
	encounterDiagnosisId: serial("encounter_diagnosis_id").primaryKey(),
	encounterId: integer("encounter_id").notNull(),
	diagnosisId: integer("diagnosis_id").notNull(),
	diagnosisSequence: integer("diagnosis_sequence"),
}, (table) => [
	index("encounter_diagnoses_encounter_idx").using("btree", table.encounterId.asc().nullsLast()),
	foreignKey({
			columns: [table.encounterId],
			foreignColumns: [encounters.encounterId],
			name: "encounter_diagnoses_encounter_id_fkey"
		}),
]);

export const encounterProcedures = oltp.table("encounter_procedures", {
	encounterProcedureId: serial("encounter_procedure_id").primaryKey(),
	encounterId: integer("encounter_id").notNull(),
	procedureId: integer("procedure_id").notNull(),
	procedureDate: date("procedure_date", { mode: 'string' }),
}, (table) => [
	index("encounter_procedures_encounter_idx").using("btree", table.encounterId.asc().nullsLast()),
	foreignKey({
			columns: [table.encounterId],
			foreignColumns: [encounters.encounterId],
			name: "encounter_procedures_encounter_id_fkey"
		}),
]);

export const billing = oltp.table("billing", {
	billingId: serial("billing_id").primaryKey(),
	encounterId: integer("encounter_id").notNull(),
	claimAmount: numeric("claim_amount", { precision: 12, scale: 2 }),
	allowedAmount: numeric("allowed_amount", { precision: 12, scale: 2 }),
	claimDate: date("claim_date", { mode: 'string' }),
	claimStatus: varchar("claim_status", { length: 50 }),
}, (table) => [
	index("billing_encounter_idx").using("btree", table.encounterId.asc().nullsLast()),
	foreignKey({
			columns: [table.encounterId],
			foreignColumns: [encounters.encounterId],
			name: "billing_encounter_id_fkey"
		}),
]);
