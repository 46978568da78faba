import { describe, it, expect } from 'vitest';
import { COLUMN_MAP, emptyRecord, extractRecord, isRetainable } from '../src/scraper/extract';
import { FakeRow, deedCells } from './fakes';

describe('extractRecord', () => {
  it('maps every column to its field and trims the text', async () => {
    const record = await extractRecord(new FakeRow(deedCells('  2024000123 ', { 'col-3': '\n SMITH JOHN  ' })));

    expect(record).toEqual({
      Grantor: 'SMITH JOHN',
      Grantee: 'DOE JANE',
      Doc_Type: 'DEED',
      Recorded_Date: '01/15/2024',
      Doc_Number: '2024000123',
      Book_Volume_Page: 'VOL 100 PG 20',
      Legal_Description: 'LOT 4 BLK 2 NCB 1234',
      Lot: '4',
      Block: '2',
      NCB: '1234',
      County_Block: '',
      Property_Address: '100 MAIN ST',
    });
  });

  it('uses an empty string for missing cells', async () => {
    const record = await extractRecord(new FakeRow({ 'col-7': '2024000123' }));

    expect(record).toEqual({ ...emptyRecord(), Doc_Number: '2024000123' });
  });

  it('uses an empty string for a cell whose lookup fails', async () => {
    const record = await extractRecord(
      new FakeRow(deedCells('2024000123', { 'col-9': new Error('detached from DOM') }))
    );

    expect(record.Legal_Description).toBe('');
    expect(record.Grantor).toBe('SMITH JOHN');
    expect(record.Doc_Number).toBe('2024000123');
  });

  it('honours a custom column map', async () => {
    const record = await extractRecord(new FakeRow({ 'doc': 'A-1', 'who': 'ACME LLC' }), {
      doc: 'Doc_Number',
      who: 'Grantor',
    });

    expect(record).toEqual({ ...emptyRecord(), Doc_Number: 'A-1', Grantor: 'ACME LLC' });
  });

  it('covers all twelve fields', () => {
    expect(Object.keys(COLUMN_MAP)).toHaveLength(12);
    expect(new Set(Object.values(COLUMN_MAP)).size).toBe(12);
  });
});

describe('isRetainable', () => {
  it('keeps only records with a doc number', () => {
    expect(isRetainable({ ...emptyRecord(), Doc_Number: '2024000123' })).toBe(true);
    expect(isRetainable({ ...emptyRecord(), Grantor: 'SMITH JOHN' })).toBe(false);
  });
});
