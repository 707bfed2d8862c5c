import type { ValueError } from '@sinclair/typebox/errors';

import type { MissingValueError, ValidationError } from '../../../common/types/errors.js';

/**
 * Denominators that can be zero for a given year.
 */
export type DivisionQuantity =
  | 'income_total'
  | 'nominal_total'
  | 'previous_real_total'
  | 'first_real_total'
  | 'services_peak';

export interface DivisionError {
  readonly type: 'DivisionError';
  readonly message: string;
  readonly year: number;
  readonly quantity: DivisionQuantity;
}

export const createDivisionError = (year: number, quantity: DivisionQuantity): DivisionError => ({
  type: 'DivisionError',
  message: `Cannot divide by zero ${quantity.replace(/_/g, ' ')} for year ${String(year)}`,
  year,
  quantity,
});

export type FundingMetricsError = DivisionError | ValidationError | MissingValueError;

export type FundingRepoError =
  | { type: 'NotFound'; message: string }
  | { type: 'ReadError'; message: string }
  | { type: 'ParseError'; message: string }
  | { type: 'SchemaValidationError'; message: string; row: number; details: string[] }
  | { type: 'InvalidDecimal'; message: string; row: number; column: string };

export type FundingSinkError =
  | { type: 'WriteError'; message: string; path: string }
  | ValidationError;

export type FundingAnalysisError = FundingMetricsError | FundingRepoError | FundingSinkError;

export const formatSchemaErrors = (errors: Iterable<ValueError>): string[] =>
  Array.from(errors).map((error) => `${error.path}: ${error.message}`);
