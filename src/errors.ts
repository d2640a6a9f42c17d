import type { TransportResponse } from './transport.js';
import { DatasetNotFoundError, VisualLayerError } from './types.js';

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Pull a readable message out of an API error body. Handles the
 * `{ detail }` shape (string or list of `{ msg }`), `{ message }` and
 * `{ error }`.
 */
export function describeError(body: unknown): string {
  if (typeof body === 'string' && body.length > 0) {
    return body;
  }
  if (!isRecord(body)) {
    return 'no details';
  }

  const { detail, message, error } = body;
  if (typeof detail === 'string') {
    return detail;
  }
  if (Array.isArray(detail)) {
    const messages = detail
      .map((item) => (isRecord(item) && typeof item.msg === 'string' ? item.msg : undefined))
      .filter((msg): msg is string => msg !== undefined);
    if (messages.length > 0) {
      return messages.join('; ');
    }
  }
  if (typeof message === 'string') {
    return message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'no details';
}

/**
 * Throw for a non-2xx response. A 404 on a dataset-scoped call means the
 * dataset is gone.
 */
export function raiseForStatus(
  res: TransportResponse<unknown>,
  action: string,
  datasetId?: string
): void {
  if (res.ok) {
    return;
  }
  if (res.status === 404 && datasetId !== undefined) {
    throw new DatasetNotFoundError(datasetId, res.body);
  }
  throw new VisualLayerError(
    `${action} failed (${res.status}): ${describeError(res.body)}`,
    res.status,
    res.body
  );
}
