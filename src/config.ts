import path from "path";
import dotenv from "dotenv";
import { z } from "zod";
import { parseCompactDate } from "./utils/dates";

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

export interface CrawlSettings {
  defaultEndDate: string;
  minStartDate: string;
  windowYears: number;
  pageSize: number;
  offsetCeiling: number;
  batchSize: number;
  maxPagesPerSession: number; // 0 = unlimited
  resultsTimeoutMs: number;
  transientRetryPauseMs: number;
  breakEveryNPages: number;
  breakDurationMs: { min: number; max: number };
  pageDelayMs: { min: number; max: number };
  afterScrollMs: number;
  afterClickMs: number;
  ceilingMarkers: readonly string[];
  snippetLength: number;
}

export interface AppConfig {
  headless: boolean;
  ciMode: boolean;
  databasePath: string | null;
  checkpointFile: string;
  cdpUrl: string | null;
  portalUrl: string;
  pageLoadTimeoutMs: number;
  port: number;
  crawl: CrawlSettings;
}

export const DEFAULT_END_DATE = "20260121";
export const CI_MAX_PAGES = 180;
export const LOCAL_MAX_PAGES = 1000;

const flag = z
  .string()
  .optional()
  .transform(value => value?.trim().toLowerCase() === "true");

const compactDate = z
  .string()
  .refine(value => parseCompactDate(value).ok, { message: "expected a YYYYMMDD date" });

const envSchema = z.object({
  HEADLESS: flag,
  GITHUB_ACTIONS: flag,
  CI: flag,
  DATABASE_URL: z
    .string()
    .trim()
    .optional()
    .refine(value => !value || value.startsWith("file:") || !value.includes("://"), {
      message: "expected a SQLite file path or file: URL",
    }),
  CHECKPOINT_FILE: z.string().trim().min(1).default("scraper_state.json"),
  DEFAULT_END_DATE: compactDate.default(DEFAULT_END_DATE),
  MAX_PAGES_PER_SESSION: z.coerce.number().int().nonnegative().optional(),
  SBR_CDP_URL: z.string().trim().url().optional(),
  PORTAL_URL: z.string().url().default("https://bexar.tx.publicsearch.us/results"),
  PORT: z.coerce.number().int().positive().default(8080),
});

export type Env = Record<string, string | undefined>;

function resolveDatabasePath(url: string | undefined): string | null {
  if (!url) return null;
  if (url === ":memory:") return url;
  return path.resolve(url.replace(/^file:(\/\/)?/, ""));
}

/**
 * Builds the run configuration from environment variables. Blank values are
 * treated as unset.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`)
    );
  }
  const vars = parsed.data;
  const ciMode = vars.GITHUB_ACTIONS || vars.CI;

  const crawl: CrawlSettings = {
    defaultEndDate: vars.DEFAULT_END_DATE,
    minStartDate: "18000101",
    windowYears: 10,
    pageSize: 250,
    offsetCeiling: 9500,
    batchSize: 1000,
    maxPagesPerSession: vars.MAX_PAGES_PER_SESSION ?? (ciMode ? CI_MAX_PAGES : LOCAL_MAX_PAGES),
    resultsTimeoutMs: 60_000,
    transientRetryPauseMs: 10_000,
    breakEveryNPages: 50,
    breakDurationMs: { min: 60_000, max: 180_000 },
    pageDelayMs: { min: 3_000, max: 7_000 },
    afterScrollMs: 1_000,
    afterClickMs: 3_000,
    ceilingMarkers: ["limit", "error"],
    snippetLength: 400,
  };

  return Object.freeze({
    headless: vars.HEADLESS || ciMode,
    ciMode,
    databasePath: resolveDatabasePath(vars.DATABASE_URL),
    checkpointFile: path.resolve(vars.CHECKPOINT_FILE),
    cdpUrl: vars.SBR_CDP_URL ?? null,
    portalUrl: vars.PORTAL_URL,
    pageLoadTimeoutMs: 120_000,
    port: vars.PORT,
    crawl: Object.freeze(crawl),
  });
}

/** Reads `.env` (if any) into process.env, then builds the config. */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
