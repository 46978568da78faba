export const DEED_FIELDS = [
  "Grantor",
  "Grantee",
  "Doc_Type",
  "Recorded_Date",
  "Doc_Number",
  "Book_Volume_Page",
  "Legal_Description",
  "Lot",
  "Block",
  "NCB",
  "County_Block",
  "Property_Address",
] as const;

export type DeedField = (typeof DEED_FIELDS)[number];

/**
 * One row of the deed search results. Every field is a trimmed string;
 * cells the portal did not render are "".
 */
export type DeedRecord = Record<DeedField, string>;

export interface SearchWindow {
  startDate: string;    // YYYYMMDD
  endDate: string;      // YYYYMMDD
}

export interface CrawlCheckpoint {
  endDate: string;      // YYYYMMDD
  offset: number;       // multiple of the page size, or the ceiling sentinel
  lastUpdated?: string; // YYYY-MM-DD HH:MM:SS, local time
}

export interface StoreStats {
  recordCount: number;
  oldestRecordedDate: string | null; // YYYYMMDD
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };
