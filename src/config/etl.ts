export const ETL_BATCH_SIZE = parseInt(process.env.ETL_BATCH_SIZE || '10000');

export const RUN_STALE_AFTER_MINUTES = parseInt(process.env.ETL_RUN_STALE_AFTER_MINUTES || '120');

export const READMISSION_WINDOW_DAYS = 30;

export const INPATIENT_ENCOUNTER_TYPE = 'INPATIENT';

export const UNKNOWN_CREDENTIAL = 'UNKNOWN';

export const AGE_GROUPS = {
  MINOR: '0-17',
  ADULT: '18-65',
  SENIOR: '66+',
} as const;

export const ADULT_MIN_AGE = 18;
export const SENIOR_MIN_AGE = 66;
