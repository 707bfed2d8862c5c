import fs from 'node:fs/promises';

import { TypeCompiler } from '@sinclair/typebox/compiler';
import { parse as parseCsv } from 'csv-parse/sync';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { formatSchemaErrors, type FundingRepoError } from '../../core/errors.js';
import { FundingCsvRowSchema, type FundingCsvRowDTO, type FundingRecord } from '../../core/types.js';

import type { FundingRecordSource } from '../../core/ports.js';

const validator = TypeCompiler.Compile(FundingCsvRowSchema);

/** Cell values that mark a missing optional number. */
const MISSING_MARKERS = new Set(['', 'NA', 'N/A', 'null']);

export interface FundingCsvRepoOptions {
  filePath: string;
}

const readCsvFile = async (filePath: string): Promise<Result<unknown[], FundingRepoError>> => {
  let contents: string;

  try {
    contents = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const code = (error as NodeJS.ErrnoException).code;
    if (code === 'ENOENT') {
      return err({
        type: 'NotFound',
        message: `Funding data file not found at ${filePath}`,
      });
    }

    return err({
      type: 'ReadError',
      message: `Failed to read funding data at ${filePath}: ${(error as Error).message}`,
    });
  }

  let parsed: unknown;
  try {
    parsed = parseCsv(contents, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
  } catch (error) {
    return err({
      type: 'ParseError',
      message: `Failed to parse CSV at ${filePath}: ${(error as Error).message}`,
    });
  }

  if (!Array.isArray(parsed)) {
    return err({ type: 'ParseError', message: `Expected CSV rows in ${filePath}` });
  }

  return ok(parsed);
};

const parseDecimalCell = (
  value: string,
  column: string,
  row: number
): Result<Decimal, FundingRepoError> => {
  const invalid: FundingRepoError = {
    type: 'InvalidDecimal',
    message: `Row ${String(row)}: value '${value}' in ${column} is not a valid number`,
    row,
    column,
  };

  let numeric: Decimal;
  try {
    numeric = new Decimal(value);
  } catch {
    return err(invalid);
  }

  if (!numeric.isFinite()) {
    return err(invalid);
  }
  // Amounts and shares are never below zero
  if (numeric.isNegative() && !numeric.isZero()) {
    return err({
      ...invalid,
      message: `Row ${String(row)}: value '${value}' in ${column} must not be negative`,
    });
  }

  return ok(numeric);
};

type NumericColumn = Exclude<keyof FundingCsvRowDTO, 'year' | 'gia_as_percent_of_peak_gia'>;

/**
 * Convert a validated CSV row into a funding record.
 * `row` is the 1-based line number in the file (header is line 1).
 */
export const parseFundingRow = (
  dto: FundingCsvRowDTO,
  row: number
): Result<FundingRecord, FundingRepoError> => {
  const cell = (column: NumericColumn): Result<Decimal, FundingRepoError> =>
    parseDecimalCell(dto[column], column, row);

  const gia = cell('gia_gbp_millions');
  if (gia.isErr()) return err(gia.error);
  const voluntary = cell('voluntary_gbp_millions');
  if (voluntary.isErr()) return err(voluntary.error);
  const investment = cell('investment_gbp_millions');
  if (investment.isErr()) return err(investment.error);
  const services = cell('services_gbp_millions');
  if (services.isErr()) return err(services.error);
  const other = cell('other_gbp_millions');
  if (other.isErr()) return err(other.error);
  const nominal = cell('nominal_gbp_millions');
  if (nominal.isErr()) return err(nominal.error);
  const real = cell('total_y2000_gbp_millions');
  if (real.isErr()) return err(real.error);

  let giaAsPercentOfPeakGia: Decimal | null = null;
  const peakShareRaw = dto.gia_as_percent_of_peak_gia;
  if (peakShareRaw !== undefined && !MISSING_MARKERS.has(peakShareRaw)) {
    const peakShare = parseDecimalCell(peakShareRaw, 'gia_as_percent_of_peak_gia', row);
    if (peakShare.isErr()) return err(peakShare.error);
    giaAsPercentOfPeakGia = peakShare.value;
  }

  return ok({
    year: Number.parseInt(dto.year, 10),
    giaGbpMillions: gia.value,
    voluntaryGbpMillions: voluntary.value,
    investmentGbpMillions: investment.value,
    servicesGbpMillions: services.value,
    otherGbpMillions: other.value,
    nominalGbpMillions: nominal.value,
    totalY2000GbpMillions: real.value,
    giaAsPercentOfPeakGia,
  });
};

export const createFundingCsvRepo = (options: FundingCsvRepoOptions): FundingRecordSource => ({
  async loadAll(): Promise<Result<FundingRecord[], FundingRepoError>> {
    const rowsResult = await readCsvFile(options.filePath);
    if (rowsResult.isErr()) {
      return err(rowsResult.error);
    }

    const records: FundingRecord[] = [];

    for (const [index, raw] of rowsResult.value.entries()) {
      const row = index + 2;

      if (!validator.Check(raw)) {
        return err({
          type: 'SchemaValidationError',
          message: `Row ${String(row)} of ${options.filePath} does not match the funding schema`,
          row,
          details: formatSchemaErrors(validator.Errors(raw)),
        });
      }

      const record = parseFundingRow(raw, row);
      if (record.isErr()) {
        return err(record.error);
      }
      records.push(record.value);
    }

    return ok(records.sort((a, b) => a.year - b.year));
  },
});
