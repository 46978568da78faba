import type { CrawlSettings } from "../config";
import type { CrawlCheckpoint, StoreStats } from "../types";

export type CrawlPhase =
  | "reconcile"
  | "guard"
  | "fetch"
  | "extract"
  | "flush"
  | "checkpoint"
  | "advance"
  | "terminate";

export type StopReason =
  | "session_limit"   // page budget for this process used up
  | "offset_ceiling"  // offset reached the portal's result ceiling
  | "ceiling_marker"  // portal rendered its limit/error page
  | "no_rows"
  | "no_next_page"
  | "interrupted"
  | "fatal";

export const TRANSITIONS: Readonly<Record<CrawlPhase, readonly CrawlPhase[]>> = {
  reconcile: ["guard"],
  guard: ["fetch", "terminate"],
  // a transient timeout loops back through the guard after a reload
  fetch: ["extract", "guard", "terminate"],
  extract: ["flush", "checkpoint", "terminate"],
  flush: ["checkpoint"],
  checkpoint: ["advance"],
  advance: ["guard", "terminate"],
  terminate: [],
};

/** A fault or interrupt may end the run from any live phase. */
export function canTransition(from: CrawlPhase, to: CrawlPhase) {
  if (to === "terminate") return from !== "terminate";
  return TRANSITIONS[from].includes(to);
}

export interface Reconciliation {
  checkpoint: CrawlCheckpoint;
  slid: boolean;
}

/**
 * Moves the window end back to the oldest stored record once the store holds
 * at least a ceiling's worth of rows and the checkpoint is still newer.
 * Dates compare as YYYYMMDD strings.
 */
export function reconcile(
  checkpoint: CrawlCheckpoint,
  stats: StoreStats,
  settings: Pick<CrawlSettings, "offsetCeiling" | "defaultEndDate">
): Reconciliation {
  const oldest = stats.oldestRecordedDate;
  if (
    stats.recordCount >= settings.offsetCeiling &&
    oldest !== null &&
    oldest !== settings.defaultEndDate &&
    checkpoint.endDate > oldest
  ) {
    return { checkpoint: { endDate: oldest, offset: 0 }, slid: true };
  }
  return { checkpoint, slid: false };
}

export interface GuardInput {
  pagesThisSession: number; // already incremented for the page about to run
  offset: number;
  aborted: boolean;
}

/** Checks made before each fetch; null means go ahead. */
export function checkGuards(
  input: GuardInput,
  settings: Pick<CrawlSettings, "maxPagesPerSession" | "offsetCeiling">
): StopReason | null {
  if (input.aborted) return "interrupted";
  if (settings.maxPagesPerSession > 0 && input.pagesThisSession > settings.maxPagesPerSession) {
    return "session_limit";
  }
  if (input.offset >= settings.offsetCeiling) return "offset_ceiling";
  return null;
}

export function isBreakDue(pagesThisSession: number, everyNPages: number) {
  return everyNPages > 0 && pagesThisSession > 1 && pagesThisSession % everyNPages === 0;
}

export type TimeoutKind = "ceiling" | "transient";

export function classifyTimeout(content: string, markers: readonly string[]): TimeoutKind {
  const lower = content.toLowerCase();
  return markers.some(marker => lower.includes(marker.toLowerCase())) ? "ceiling" : "transient";
}

/** Whitespace-collapsed prefix of the page, for the log line. */
export function contentSnippet(content: string, length: number) {
  const collapsed = content.split(/\s+/).filter(Boolean).join(" ");
  return collapsed.length > length ? `${collapsed.slice(0, length)}...` : collapsed;
}

export function pageNumber(offset: number, pageSize: number) {
  return Math.floor(offset / pageSize) + 1;
}
