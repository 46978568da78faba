import fs from "fs";
import path from "path";
import { z } from "zod";
import type { CrawlCheckpoint } from "../types";
import { formatTimestamp, parseCompactDate } from "../utils/dates";
import { log } from "../utils/logger";

export interface CheckpointStore {
  load(): CrawlCheckpoint;
  save(endDate: string, offset: number): CrawlCheckpoint;
}

/** On-disk shape of the checkpoint file. */
export interface CheckpointFile {
  current_end_date: string;
  current_offset: number;
  last_updated: string;
}

function checkpointSchema(defaultEndDate: string) {
  // Each field falls back on its own: a bad offset does not discard a good date.
  return z.object({
    current_end_date: z
      .string()
      .refine(value => parseCompactDate(value).ok)
      .catch(defaultEndDate),
    current_offset: z.number().int().nonnegative().catch(0),
    last_updated: z.string().optional().catch(undefined),
  });
}

export class FileCheckpointStore implements CheckpointStore {
  private readonly schema: ReturnType<typeof checkpointSchema>;

  constructor(
    readonly filePath: string,
    private readonly defaultEndDate: string,
    private readonly now: () => Date = () => new Date()
  ) {
    this.schema = checkpointSchema(defaultEndDate);
  }

  load(): CrawlCheckpoint {
    const fallback: CrawlCheckpoint = { endDate: this.defaultEndDate, offset: 0 };
    if (!fs.existsSync(this.filePath)) return fallback;

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(this.filePath, "utf-8"));
    } catch (err) {
      log({ stage: "checkpoint_corrupt", path: this.filePath, error: String(err) });
      return fallback;
    }
    const parsed = this.schema.safeParse(raw);
    if (!parsed.success) {
      log({ stage: "checkpoint_corrupt", path: this.filePath, error: parsed.error.message });
      return fallback;
    }
    return {
      endDate: parsed.data.current_end_date,
      offset: parsed.data.current_offset,
      lastUpdated: parsed.data.last_updated,
    };
  }

  /**
   * Writes to a sibling temp file and renames it into place, so a reader
   * sees either the previous checkpoint or the new one.
   */
  save(endDate: string, offset: number): CrawlCheckpoint {
    const body: CheckpointFile = {
      current_end_date: endDate,
      current_offset: offset,
      last_updated: formatTimestamp(this.now()),
    };
    const dir = path.dirname(this.filePath);
    fs.mkdirSync(dir, { recursive: true });
    const tmp = path.join(dir, `.${path.basename(this.filePath)}.${process.pid}.tmp`);
    fs.writeFileSync(tmp, JSON.stringify(body, null, 2));
    fs.renameSync(tmp, this.filePath);
    return { endDate, offset, lastUpdated: body.last_updated };
  }
}
