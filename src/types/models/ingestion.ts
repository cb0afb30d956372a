import { IngestionStage, RunStatus } from '../common/enums';

export interface TransformSummary {
  accepted: number;
  skipped: number;
}

export interface TableSummary {
  table: string;
  totalCount: number;
  earliestDate: string | null;
  latestDate: string | null;
}

export interface LatestStockSample {
  date: string | null;
  closePrice: number;
  volume: number;
}

export interface VerificationReport {
  stock: TableSummary;
  weather: TableSummary;
  latestStock: LatestStockSample | null;
  ok: boolean;
}

/**
 * Outcome of one run. `stage` is the last stage entered; on failure it names the stage that failed.
 */
export interface IngestionRunResult {
  status: RunStatus;
  stage: IngestionStage;
  stockRecords: TransformSummary;
  weatherRecords: TransformSummary;
  stockUpserted: number;
  weatherUpserted: number;
  verification?: VerificationReport;
  error?: Error;
  durationMs: number;
}
