import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import { createFundingCsvRepo } from '@/modules/funding-metrics/shell/repo/csv-repo.js';

const HEADER =
  'year,nominal_gbp_millions,gia_gbp_millions,voluntary_gbp_millions,investment_gbp_millions,' +
  'services_gbp_millions,other_gbp_millions,year_2000_gbp_millions,inflation_adjustment,' +
  'total_y2000_gbp_millions,percentage_of_y2000_income,gia_y2000_gbp_millions,gia_as_percent_of_peak_gia';

const writeCsv = async (contents: string): Promise<string> => {
  const dir = await mkdtemp(path.join(tmpdir(), 'funding-'));
  const filePath = path.join(dir, 'funding.csv');
  await writeFile(filePath, contents, 'utf8');
  return filePath;
};

describe('csv funding repo', () => {
  it('loads records sorted by year and ignores extra columns', async () => {
    const filePath = await writeCsv(
      [
        HEADER,
        '2001,110.5,80,10,5,12.5,3,110,1.01,108.2,1.0,80,0.95',
        '2000,100,75,9,4,10,2,100,1,100,1,75,1',
      ].join('\n')
    );

    const result = await createFundingCsvRepo({ filePath }).loadAll();

    expect(result.isOk()).toBe(true);
    const records = result._unsafeUnwrap();
    expect(records.map((r) => r.year)).toEqual([2000, 2001]);
    expect(records[1]?.nominalGbpMillions.toNumber()).toBe(110.5);
    expect(records[1]?.servicesGbpMillions.toNumber()).toBe(12.5);
    expect(records[1]?.totalY2000GbpMillions.toNumber()).toBe(108.2);
    expect(records[1]?.giaAsPercentOfPeakGia?.toNumber()).toBe(0.95);
  });

  it('reads NA and empty GIA shares as missing values', async () => {
    const filePath = await writeCsv(
      [HEADER, '2000,100,75,9,4,10,2,100,1,100,1,75,NA', '2001,100,75,9,4,10,2,100,1,100,1,75,'].join(
        '\n'
      )
    );

    const records = (await createFundingCsvRepo({ filePath }).loadAll())._unsafeUnwrap();

    expect(records.map((r) => r.giaAsPercentOfPeakGia)).toEqual([null, null]);
  });

  it('reports a missing file as NotFound', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'funding-'));

    const result = await createFundingCsvRepo({ filePath: path.join(dir, 'absent.csv') }).loadAll();

    expect(result._unsafeUnwrapErr().type).toBe('NotFound');
  });

  it('rejects a non-numeric cell with its row and column', async () => {
    const filePath = await writeCsv([HEADER, '2000,100,75,9,4,abc,2,100,1,100,1,75,1'].join('\n'));

    const error = (await createFundingCsvRepo({ filePath }).loadAll())._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'InvalidDecimal',
      message: "Row 2: value 'abc' in services_gbp_millions is not a valid number",
      row: 2,
      column: 'services_gbp_millions',
    });
  });

  it('rejects a negative income cell', async () => {
    const filePath = await writeCsv([HEADER, '2010,6,10,1,-6,1,0,6,1,100,1,10,1'].join('\n'));

    const error = (await createFundingCsvRepo({ filePath }).loadAll())._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'InvalidDecimal',
      message: "Row 2: value '-6' in investment_gbp_millions must not be negative",
      row: 2,
      column: 'investment_gbp_millions',
    });
  });

  it('rejects rows missing a required column', async () => {
    const filePath = await writeCsv(
      ['year,nominal_gbp_millions,gia_gbp_millions', '2000,100,75'].join('\n')
    );

    const error = (await createFundingCsvRepo({ filePath }).loadAll())._unsafeUnwrapErr();

    expect(error.type).toBe('SchemaValidationError');
    expect(error).toMatchObject({ row: 2 });
  });

  it('rejects a malformed year', async () => {
    const filePath = await writeCsv([HEADER, '99,100,75,9,4,10,2,100,1,100,1,75,1'].join('\n'));

    const error = (await createFundingCsvRepo({ filePath }).loadAll())._unsafeUnwrapErr();

    expect(error.type).toBe('SchemaValidationError');
  });

  it('reports rows with the wrong number of cells as a parse error', async () => {
    const filePath = await writeCsv([HEADER, '2000,100,75'].join('\n'));

    const error = (await createFundingCsvRepo({ filePath }).loadAll())._unsafeUnwrapErr();

    expect(error.type).toBe('ParseError');
  });

  it('ships sample data with one row per consecutive year', async () => {
    const filePath = fileURLToPath(new URL('../../../data/funding.csv', import.meta.url));

    const records = (await createFundingCsvRepo({ filePath }).loadAll())._unsafeUnwrap();

    const years = records.map((r) => r.year);
    expect(years[0]).toBe(2004);
    expect(years).toEqual(Array.from({ length: 20 }, (_, offset) => 2004 + offset));
  });
});
