export type RunStatus = 'RUNNING' | 'SUCCESS' | 'FAILED';

export type TerminalRunStatus = Exclude<RunStatus, 'RUNNING'>;

export type DimensionName =
  | 'specialty'
  | 'department'
  | 'provider'
  | 'patient'
  | 'diagnosis'
  | 'procedure'
  | 'encounter_type'
  | 'date';

export type EtlPhase =
  | 'INITIALIZATION'
  | 'CLEANUP_COMPLETE'
  | 'SOURCE_EXTRACTED'
  | `DIM_${Uppercase<DimensionName>}_LOADED`
  | 'ALL_DIMENSIONS_LOADED'
  | 'STAGING_TABLE_CREATED'
  | 'FACT_TABLE_LOADED'
  | 'READMISSIONS_FLAGGED'
  | 'BRIDGES_LOADED'
  | 'PUBLISHED'
  | 'COMPLETED';

export type ExclusionReason =
  | 'patient_missing_birth_date'
  | 'encounter_missing_date'
  | 'encounter_unknown_provider'
  | 'fact_unresolved_dimension'
  | 'bridge_diagnosis_unmatched'
  | 'bridge_procedure_unmatched';

export interface PaginatedResponse<T> {
  data: T[];
  pagination: {
    total: number;
    limit: number;
    offset: number;
    hasMore: boolean;
  };
}
