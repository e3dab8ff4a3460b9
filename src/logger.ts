import { appendJsonl, LOOKUPS_FILE } from "./data.js";
import { errorMessage } from "./errors.js";
import type { LookupRecord } from "./types.js";

/** Appends to the lookup history. A failed write is logged, never thrown. */
export function logLookup(record: LookupRecord, file: string = LOOKUPS_FILE): void {
  try {
    appendJsonl(file, record);
  } catch (err) {
    logError(`Could not record lookup in ${file}: ${errorMessage(err)}`);
  }

  const status = record.error ? "ERR" : record.notFound ? "---" : ">>>";
  const ids = record.candidates.map((c) => `${c.code}#${c.id}`).join(", ") || "none";
  console.error(`  ${status} "${record.query.slice(0, 60)}" → ${ids}`);
}

export function logInfo(msg: string): void {
  console.error(`[info] ${msg}`);
}

export function logError(msg: string): void {
  console.error(`[error] ${msg}`);
}
