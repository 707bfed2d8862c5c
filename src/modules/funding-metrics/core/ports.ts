import type { Result } from 'neverthrow';

import type { FundingRepoError, FundingSinkError } from './errors.js';
import type { FundingRecord, FundingReport } from './types.js';

export interface FundingRecordSource {
  /**
   * Load every yearly record, sorted by year ascending.
   */
  loadAll(): Promise<Result<FundingRecord[], FundingRepoError>>;
}

export interface FundingReportSink {
  /**
   * Persist a finished report.
   * Returns the paths (or keys) of the written artifacts.
   */
  write(report: FundingReport): Promise<Result<string[], FundingSinkError>>;
}
