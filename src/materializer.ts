import type { Logger } from 'pino';
import type { Transport } from './transport.js';
import type { Job, ResultRow, ResultSet } from './types.js';
import { isRecord, raiseForStatus } from './errors.js';
import { isSuccess } from './poller.js';

export const EMPTY_RESULT: ResultSet = Object.freeze({
  columns: Object.freeze([]),
  rows: Object.freeze([]),
});

/** Media entries carry a `media_id`; everything else is export metadata. */
const isMediaEntry = (entry: unknown): entry is Record<string, unknown> =>
  isRecord(entry) && typeof entry.media_id === 'string';

function entriesOf(document: unknown): unknown[] {
  if (Array.isArray(document)) {
    return document;
  }
  if (isRecord(document) && Array.isArray(document.media_items)) {
    return document.media_items;
  }
  return [];
}

/** Own enumerable property, including keys such as `__proto__`. */
function define(target: Record<string, unknown>, key: string, value: unknown): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

function deepFreeze<T>(value: T): T {
  if (Array.isArray(value)) {
    value.forEach(deepFreeze);
    Object.freeze(value);
  } else if (isRecord(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}

/**
 * Flatten nested objects into dotted keys. Arrays and scalars are leaves.
 */
export function flattenEntry(
  entry: Record<string, unknown>,
  prefix = '',
  out: Record<string, unknown> = {}
): Record<string, unknown> {
  for (const [key, value] of Object.entries(entry)) {
    const column = prefix ? `${prefix}.${key}` : key;
    if (isRecord(value)) {
      flattenEntry(value, column, out);
    } else {
      define(out, column, value);
    }
  }
  return out;
}

/**
 * Turn an export document into a ResultSet: one row per media item,
 * columns in first-seen order, missing cells null. Rows are frozen all the
 * way down, array cells included.
 */
export function toResultSet(document: unknown): ResultSet {
  const flat = entriesOf(document).filter(isMediaEntry).map((entry) => flattenEntry(entry));

  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of flat) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }

  const rows: ResultRow[] = flat.map((row) => {
    const ordered: Record<string, unknown> = {};
    for (const column of columns) {
      define(ordered, column, Object.hasOwn(row, column) ? row[column] : null);
    }
    return deepFreeze(ordered);
  });

  return Object.freeze({
    columns: Object.freeze(columns),
    rows: Object.freeze(rows),
  });
}

export class ResultMaterializer {
  readonly #transport: Transport;
  readonly #logger: Logger;

  constructor(transport: Transport, logger: Logger) {
    this.#transport = transport;
    this.#logger = logger;
  }

  /**
   * Download a finished job's export. Jobs that did not succeed yield an
   * empty ResultSet instead of an error. Read-only; safe to repeat.
   */
  async materialize(job: Job): Promise<ResultSet> {
    if (!isSuccess(job)) {
      this.#logger.info({ jobId: job.id, status: job.status }, 'export job not successful, returning no rows');
      return EMPTY_RESULT;
    }

    const res = await this.#transport.request<unknown>(
      'GET',
      `/dataset/${job.datasetId}/export_download`,
      { query: { export_task_id: job.id } }
    );
    raiseForStatus(res, `Export download for job ${job.id}`, job.datasetId);

    const result = toResultSet(res.body);
    this.#logger.info(
      { jobId: job.id, rows: result.rows.length, columns: result.columns.length },
      'export materialized'
    );
    return result;
  }
}
