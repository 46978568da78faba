import type { DeedField, DeedRecord } from "../types";

/**
 * One rendered results row. `field` resolves a column identifier (the cell's
 * class, e.g. "col-7") to its text, or undefined when the row has no such
 * cell. It may also reject; callers treat that the same as a missing cell.
 */
export interface RowAccessor {
  field(column: string): Promise<string | undefined>;
}

export type ColumnMap = Readonly<Record<string, DeedField>>;

export const COLUMN_MAP: ColumnMap = {
  "col-3": "Grantor",
  "col-4": "Grantee",
  "col-5": "Doc_Type",
  "col-6": "Recorded_Date",
  "col-7": "Doc_Number",
  "col-8": "Book_Volume_Page",
  "col-9": "Legal_Description",
  "col-10": "Lot",
  "col-11": "Block",
  "col-12": "NCB",
  "col-13": "County_Block",
  "col-14": "Property_Address",
};

export function emptyRecord(): DeedRecord {
  return {
    Grantor: "",
    Grantee: "",
    Doc_Type: "",
    Recorded_Date: "",
    Doc_Number: "",
    Book_Volume_Page: "",
    Legal_Description: "",
    Lot: "",
    Block: "",
    NCB: "",
    County_Block: "",
    Property_Address: "",
  };
}

async function safeField(row: RowAccessor, column: string): Promise<string> {
  try {
    return (await row.field(column))?.trim() ?? "";
  } catch {
    return "";
  }
}

export async function extractRecord(row: RowAccessor, columns: ColumnMap = COLUMN_MAP): Promise<DeedRecord> {
  const record = emptyRecord();
  for (const [column, field] of Object.entries(columns)) {
    record[field] = await safeField(row, column);
  }
  return record;
}

export function isRetainable(record: DeedRecord) {
  return record.Doc_Number !== "";
}
