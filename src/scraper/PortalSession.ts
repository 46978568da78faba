import type { RowAccessor } from "./extract";
import type { SearchWindow } from "../types";

export interface PageTarget {
  window: SearchWindow;
  offset: number;
  pageSize: number;
}

/**
 * A live browsing session on the results page. The controller drives it one
 * page at a time and never holds two sessions.
 */
export interface PortalSession {
  /** Resolves false if no result row rendered within `timeoutMs`. */
  waitForResults(timeoutMs: number): Promise<boolean>;
  /** Raw page markup, used to tell a ceiling/error page from a slow one. */
  content(): Promise<string>;
  rows(): Promise<RowAccessor[]>;
  reload(): Promise<void>;
  /** Moves to the following results page; false when there is none. */
  nextPage(): Promise<boolean>;
  close(): Promise<void>;
}

export type OpenSession = (target: PageTarget) => Promise<PortalSession>;
