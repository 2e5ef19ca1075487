import { pgSchema, serial, integer, varchar, date, timestamp, numeric, boolean, text, index, foreignKey, primaryKey, uniqueIndex } from "drizzle-orm/pg-core"

export const olap = pgSchema("healthtech_olap");

export const dimSpecialty = olap.table("dim_specialty", {
	specialtyKey: integer("specialty_key").primaryKey(),
	specialtyId: integer("specialty_id").notNull(),
	specialtyName: varchar("specialty_name", { length: 100 }).notNull(),
	specialtyCode: varchar("specialty_code", { length: 20 }),
}, (table) => [
	uniqueIndex("dim_specialty_specialty_id_idx").on(table.specialtyId),
]);

export const dimDepartment = olap.table("dim_department", {
	departmentKey: integer("department_key").primaryKey(),
	departmentId: integer("department_id").notNull(),
	departmentName: varchar("department_name", { length: 100 }).notNull(),
	floor: integer(),
	capacity: integer(),
}, (table) => [
	uniqueIndex("dim_department_department_id_idx").on(table.departmentId),
]);

export const dimProvider = olap.table("dim_provider", {
	providerKey: integer("provider_key").primaryKey(),
	providerId: integer("provider_id").notNull(),
	fullName: varchar("full_name", { length: 200 }).notNull(),
	credential: varchar({ length: 20 }).notNull(),
}, (table) => [
	uniqueIndex("dim_provider_provider_id_idx").on(table.providerId),
]);

export const dimPatient = olap.table("dim_patient", {
	patientKey: integer("patient_key").primaryKey(),
	patientId: integer("patient_id").notNull(),
	firstName: varchar("first_name", { length: 100 }),
	lastName: varchar("last_name", { length: 100 }),
	gender: varchar({ length: 10 }),
	dateOfBirth: date("date_of_birth", { mode: 'string' }).notNull(),
	mrn: varchar({ length: 20 }),
	currentAge: integer("current_age").notNull(),
	ageGroup: varchar("age_group", { length: 10 }).notNull(),
}, (table) => [
	uniqueIndex("dim_patient_patient_id_idx").on(table.patientId),
]);

export const dimDiagnoses = olap.table("dim_diagnoses", {
	diagnosisKey: integer("diagnosis_key").primaryKey(),
	diagnosisId: integer("diagnosis_id").notNull(),
	icd10Code: varchar("icd10_code", { length: 10 }).notNull(),
	icd10Description: varchar("icd10_description", { length: 200 }),
}, (table) => [
	uniqueIndex("dim_diagnoses_diagnosis_id_idx").on(table.diagnosisId),
]);

export const dimProcedures = olap.table("dim_procedures", {
	procedureKey: integer("procedure_key").primaryKey(),
	procedureId: integer("procedure_id").notNull(),
	cptCode: varchar("cpt_code", { length: 10 }).notNull(),
	cptDescription: varchar("cpt_description", { length: 200 }),
}, (table) => [
	uniqueIndex("dim_procedures_procedure_id_idx").on(table.procedureId),
]);

export const dimEncounterType = olap.table("dim_encounter_type", {
	encounterTypeKey: integer("encounter_type_key").primaryKey(),
	encounterTypeName: varchar("encounter_type_name", { length: 50 }).notNull(),
}, (table) => [
	uniqueIndex("dim_encounter_type_name_idx").on(table.encounterTypeName),
]);

export const dimDate = olap.table("dim_date", {
	dateKey: integer("date_key").primaryKey(),
	fullDate: date("full_date", { mode: 'string' }).notNull(),
	year: integer().notNull(),
	quarter: integer().notNull(),
	month: integer().notNull(),
	monthName: varchar("month_name", { length: 10 }).notNull(),
	weekOfYear: integer("week_of_year").notNull(),
	dayOfMonth: integer("day_of_month").notNull(),
	dayName: varchar("day_name", { length: 10 }).notNull(),
	isWeekend: boolean("is_weekend").notNull(),
}, (table) => [
	index("dim_date_year_month_idx").using("btree", table.year.asc().nullsLast(), table.month.asc().nullsLast()),
]);

export const factEncounters = olap.table("fact_encounters", {
	encounterKey: integer("encounter_key").primaryKey(),
	encounterId: integer("encounter_id").notNull(),
	dateKey: integer("date_key").notNull(),
	patientKey: integer("patient_key").notNull(),
	providerKey: integer("provider_key").notNull(),
	specialtyKey: integer("specialty_key").notNull(),
	departmentKey: integer("department_key").notNull(),
	encounterTypeKey: integer("encounter_type_key").notNull(),
	isReadmission: boolean("is_readmission").notNull().default(false),
	totalClaimAmount: numeric("total_claim_amount", { precision: 12, scale: 2 }).notNull(),
	totalAllowedAmount: numeric("total_allowed_amount", { precision: 12, scale: 2 }).notNull(),
	lengthOfStayDays: integer("length_of_stay_days").notNull(),
	diagnosisCount: integer("diagnosis_count").notNull(),
	procedureCount: integer("procedure_count").notNull(),
}, (table) => [
	uniqueIndex("fact_encounters_encounter_id_idx").on(table.encounterId),
	index("fact_encounters_date_idx").using("btree", table.dateKey.asc().nullsLast()),
	index("fact_encounters_patient_idx").using("btree", table.patientKey.asc().nullsLast()),
	index("fact_encounters_provider_idx").using("btree", table.providerKey.asc().nullsLast()),
	index("fact_encounters_specialty_idx").using("btree", table.specialtyKey.asc().nullsLast()),
	index("fact_encounters_department_idx").using("btree", table.departmentKey.asc().nullsLast()),
	index("fact_encounters_encounter_type_idx").using("btree", table.encounterTypeKey.asc().nullsLast()),
	foreignKey({ columns: [table.dateKey], foreignColumns: [dimDate.dateKey], name: "fact_encounters_date_key_fkey" }),
	foreignKey({ columns: [table.patientKey], foreignColumns: [dimPatient.patientKey], name: "fact_encounters_patient_key_fkey" }),
	foreignKey({ columns: [table.providerKey], foreignColumns: [dimProvider.providerKey], name: "fact_encounters_provider_key_fkey" }),
	foreignKey({ columns: [table.specialtyKey], foreignColumns: [dimSpecialty.specialtyKey], name: "fact_encounters_specialty_key_fkey" }),
	foreignKey({ columns: [table.departmentKey], foreignColumns: [dimDepartment.departmentKey], name: "fact_encounters_department_key_fkey" }),
	foreignKey({ columns: [table.encounterTypeKey], foreignColumns: [dimEncounterType.encounterTypeKey], name: "fact_encounters_encounter_type_key_fkey" }),
]);

export const bridgeEncounterDiagnoses = olap.table("bridge_encounter_diagnoses", {
	encounterKey: integer("encounter_key").notNull(),
	diagnosisKey: integer("diagnosis_key").notNull(),
	diagnosisSequence: integer("diagnosis_sequence"),
}, (table) => [
	primaryKey({ columns: [table.encounterKey, table.diagnosisKey], name: "bridge_encounter_diagnoses_pkey" }),
	index("bridge_encounter_diagnoses_diagnosis_idx").using("btree", table.diagnosisKey.asc().nullsLast()),
	foreignKey({ columns: [table.encounterKey], foreignColumns: [factEncounters.encounterKey], name: "bridge_encounter_diagnoses_encounter_key_fkey" }),
	foreignKey({ columns: [table.diagnosisKey], foreignColumns: [dimDiagnoses.diagnosisKey], name: "bridge_encounter_diagnoses_diagnosis_key_fkey" }),
]);

export const bridgeEncounterProcedures = olap.table("bridge_encounter_procedures", {
	encounterKey: integer("encounter_key").notNull(),
	procedureKey: integer("procedure_key").notNull(),
	procedureDate: date("procedure_date", { mode: 'string' }),
}, (table) => [
	primaryKey({ columns: [table.encounterKey, table.procedureKey], name: "bridge_encounter_procedures_pkey" }),
	index("bridge_encounter_procedures_procedure_idx").using("btree", table.procedureKey.asc().nullsLast()),
	foreignKey({ columns: [table.encounterKey], foreignColumns: [factEncounters.encounterKey], name: "bridge_encounter_procedures_encounter_key_fkey" }),
	foreignKey({ columns: [table.procedureKey], foreignColumns: [dimProcedures.procedureKey], name: "bridge_encounter_procedures_procedure_key_fkey" }),
]);

export const etlControl = olap.table("etl_control", {
	etlRunId: serial("etl_run_id").primaryKey(),
	runStartDatetime: timestamp("run_start_datetime", { mode: 'string' }).defaultNow().notNull(),
	runEndDatetime: timestamp("run_end_datetime", { mode: 'string' }),
	status: varchar({ length: 20 }).notNull(),
	recordsProcessed: integer("records_processed"),
	errorMessage: text("error_message"),
	etlPhase: varchar("etl_phase", { length: 50 }).notNull(),
}, (table) => [
	index("etl_control_status_idx").using("btree", table.status.asc().nullsLast(), table.runStartDatetime.desc().nullsLast()),
]);
