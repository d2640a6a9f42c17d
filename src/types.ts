import type { Logger } from 'pino';
import type { Transport } from './transport.js';

// ------------------------------------------------------------
// API Response Types (match Visual Layer API responses)
// ------------------------------------------------------------

export interface DatasetSummary {
  id: string;
  display_name?: string;
  status?: string;
  [key: string]: unknown;
}

export interface SampleDataset {
  dataset_id: string;
  display_name: string;
  [key: string]: unknown;
}

export interface DatasetDetails {
  id?: string;
  name?: string;
  status?: string;
  type?: string;
  [key: string]: unknown;
}

export interface DatasetStats {
  dataset?: unknown;
  redirect_url?: string;
  [key: string]: unknown;
}

export interface CreateDatasetResponse {
  id: string;
  status?: string;
  message?: string;
  [key: string]: unknown;
}

export interface TransactionResponse {
  transaction_id: string;
}

export interface UploadStatus {
  status?: string;
  [key: string]: unknown;
}

export interface HealthResponse {
  [key: string]: unknown;
}

export interface ErrorResponse {
  detail?: unknown;
  message?: string;
  error?: string;
}

// ------------------------------------------------------------
// Search & Export Types
// ------------------------------------------------------------

export type EntityType = 'IMAGES' | 'OBJECTS';

export type IssueType =
  | 'mislabels'
  | 'outliers'
  | 'duplicates'
  | 'blur'
  | 'dark'
  | 'bright'
  | 'normal';

/** Result of uploading a probe image for visual-similarity search. */
export interface AnchorReference {
  anchorMediaId: string;
  anchorType: string;
}

/** A single VQL filter, keyed by its filter family. */
export type VqlFilter = Record<string, unknown>;

export type VqlDocument = VqlFilter[];

export type SearchQuery =
  | { kind: 'labels'; labels: string[] }
  | { kind: 'captions'; captions: string[] }
  | {
      kind: 'issues';
      issueType: IssueType;
      confidenceMin: number;
      confidenceMax: number;
    }
  | { kind: 'similarity'; anchor: AnchorReference; threshold: number }
  | { kind: 'vql'; filters: VqlDocument };

export type JobStatus =
  | 'PENDING'
  | 'RUNNING'
  | 'READY'
  | 'COMPLETED'
  | 'FAILED'
  | 'TIMED_OUT';

/**
 * Local snapshot of a server-side export job. Never mutated: each poll
 * produces a new snapshot.
 */
export interface Job {
  readonly id: string;
  readonly datasetId: string;
  readonly query: VqlDocument;
  readonly entityType: EntityType;
  readonly status: JobStatus;
  readonly createdAt: Date;
}

export type ResultRow = Readonly<Record<string, unknown>>;

export interface ResultSet {
  readonly columns: readonly string[];
  readonly rows: readonly ResultRow[];
}

// ------------------------------------------------------------
// Client Types
// ------------------------------------------------------------

export interface ClientOptions {
  /** API key, sent as the JWT `sub` and `kid` */
  apiKey: string;

  /** API secret used to sign request tokens */
  apiSecret: string;

  /** Base URL of the API. Default: https://app.visual-layer.com/api/v1 */
  baseUrl?: string;

  /** Custom fetch implementation (for testing) */
  fetch?: typeof globalThis.fetch;

  /** Default request timeout in ms. Default: 30000 */
  timeout?: number;

  logger?: Logger;

  /** Replaces the built-in HTTP transport entirely */
  transport?: Transport;
}

export interface SearchOptions {
  /** Default: 'IMAGES' */
  entityType?: EntityType;

  /** Delay between status checks in ms. Default: 5000 */
  pollIntervalMs?: number;

  /** Give up (TIMED_OUT) after this much accumulated waiting. Default: 300000 */
  maxWaitMs?: number;

  /** Aborts the wait between status checks */
  signal?: AbortSignal;
}

export interface CreateDatasetOptions {
  datasetName: string;
  /** ID of a sample dataset to grant access to */
  vlDatasetId?: string;
  bucketPath?: string;
  uploadedFilename?: string;
  configUrl?: string;
  pipelineType?: string;
}

// ------------------------------------------------------------
// Error Types
// ------------------------------------------------------------

export class VisualLayerError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
    public readonly body?: unknown,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'VisualLayerError';
  }
}

/** Malformed caller input. */
export class ValidationError extends VisualLayerError {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Invalid client or polling parameters. */
export class ConfigurationError extends VisualLayerError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** The API rejected a search or export submission. */
export class SubmissionError extends VisualLayerError {
  constructor(message: string, status?: number, body?: unknown) {
    super(message, status, body);
    this.name = 'SubmissionError';
  }
}

/** Network failure, timeout, an HTTP error status, or an unreadable response. */
export class TransportError extends VisualLayerError {
  constructor(message: string, cause?: unknown, status?: number, body?: unknown) {
    super(message, status, body, { cause });
    this.name = 'TransportError';
  }
}

export class DatasetNotFoundError extends VisualLayerError {
  constructor(datasetId: string, body?: unknown) {
    super(`Dataset not found: ${datasetId}`, 404, body);
    this.name = 'DatasetNotFoundError';
  }
}
