import { describe, expect, it } from 'vitest';
import ExcelJS from 'exceljs';
import { readCsvRows } from '../src/readers/csv-reader.js';
import { readExcelRows } from '../src/readers/excel-reader.js';
import { readJsonRows } from '../src/readers/json-reader.js';

describe('readCsvRows', () => {
  it('maps cells to header names and keeps raw text', () => {
    const content = [
      'Short positions, published daily',
      'Positionsinnehavare;Bolagsnamn;Position i procent',
      'Fund One;Acme AB;0,52',
      '',
      'Fund Two;Beta AB;1,10',
    ].join('\n');

    expect(readCsvRows(content, { delimiter: ';', skipRows: 1 })).toEqual([
      { Positionsinnehavare: 'Fund One', Bolagsnamn: 'Acme AB', 'Position i procent': '0,52' },
      { Positionsinnehavare: 'Fund Two', Bolagsnamn: 'Beta AB', 'Position i procent': '1,10' },
    ]);
  });

  it('generates column names without a header row', () => {
    expect(readCsvRows('a,1\nb,2', { headers: false })).toEqual([
      { Column1: 'a', Column2: '1' },
      { Column1: 'b', Column2: '2' },
    ]);
  });

  it('reads snapshots far larger than the call stack allows for spread arguments', () => {
    const lines = ['id,value'];
    for (let i = 0; i < 200_000; i++) lines.push(`K${i},${i}`);

    const rows = readCsvRows(lines.join('\n'));

    expect(rows).toHaveLength(200_000);
    expect(rows[199_999]).toEqual({ id: 'K199999', value: '199999' });
  });

  it('sizes headerless rows by the widest row', () => {
    expect(readCsvRows('a\nb,2,x', { headers: false })).toEqual([
      { Column1: 'a', Column2: undefined, Column3: undefined },
      { Column1: 'b', Column2: '2', Column3: 'x' },
    ]);
  });

  it('returns no rows for empty content', () => {
    expect(readCsvRows('')).toEqual([]);
  });

  it('rejects unsafe header names', () => {
    expect(() => readCsvRows('__proto__,b\n1,2')).toThrow('Unsafe CSV header name: __proto__');
  });
});

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
}

describe('readJsonRows', () => {
  it('reads records under a dot path', () => {
    const content = JSON.stringify({ data: { items: [{ id: 'A', rank: 1 }, { id: 'B', rank: 2 }] } });

    expect(readJsonRows(content, { recordsPath: 'data.items' })).toEqual([
      { id: 'A', rank: 1 },
      { id: 'B', rank: 2 },
    ]);
  });

  it('reports a payload without a records array as a schema mismatch', () => {
    expect(thrown(() => readJsonRows('{"data":{}}', { recordsPath: 'data.items' }))).toMatchObject({
      code: 'SCHEMA_MISMATCH',
      message: 'No array found at recordsPath "data.items"',
    });
    expect(thrown(() => readJsonRows('not json'))).toMatchObject({ code: 'SCHEMA_MISMATCH' });
  });

  it('rejects unsafe path segments', () => {
    expect(thrown(() => readJsonRows('[]', { recordsPath: '__proto__.x' }))).toMatchObject({
      code: 'CONFIGURATION_ERROR',
    });
  });
});

describe('readExcelRows', () => {
  it('reads a sheet starting at the header row', async () => {
    const workbook = new ExcelJS.Workbook();
    workbook.addWorksheet('Info').getCell('A1').value = 'ignore me';
    const sheet = workbook.addWorksheet('Positions');
    sheet.getCell('A1').value = 'Report title';
    sheet.getCell('A2').value = 'holder';
    sheet.getCell('B2').value = 'position';
    sheet.getCell('A3').value = 'Fund One';
    sheet.getCell('B3').value = 0.52;
    sheet.getCell('A4').value = 'Fund Two';
    sheet.getCell('B4').value = { formula: 'B3*2', result: 1.04, date1904: false };

    const content = Buffer.from(await workbook.xlsx.writeBuffer());
    const rows = await readExcelRows(content, { sheet: 'Positions', startRow: 2 });

    expect(rows).toEqual([
      { holder: 'Fund One', position: 0.52 },
      { holder: 'Fund Two', position: 1.04 },
    ]);
  });

  it('reports a missing sheet as a schema mismatch', async () => {
    const workbook = new ExcelJS.Workbook();
    workbook.addWorksheet('Positions').getCell('A1').value = 'holder';
    const content = Buffer.from(await workbook.xlsx.writeBuffer());

    await expect(readExcelRows(content, { sheet: 'Other' })).rejects.toMatchObject({
      code: 'SCHEMA_MISMATCH',
      message: 'Sheet not found: Other',
    });
  });
});
