import { log } from "./logger";

export async function withRetry<T>(
  fn: () => Promise<T>,
  retries = 3,
  baseDelay = 1000,
  label = "operation"
): Promise<T> {
  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (attempt === retries) throw err;
      const delay = baseDelay * Math.pow(2, attempt);
      log({ stage: "retry", label, attempt, delay_ms: delay, error: String(err) });
      await new Promise(r => setTimeout(r, delay));
    }
  }
  throw new Error("Retry failed");
}
