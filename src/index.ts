// Main client
export { VisualLayerClient } from './client.js';

// Dataset handle
export { Dataset } from './dataset.js';
export type { IssueSearch } from './dataset.js';

// Search workflow
export {
  buildQuery,
  labelQuery,
  captionQuery,
  issueQuery,
  similarityQuery,
  vqlQuery,
  ISSUE_TYPES,
} from './query.js';
export {
  JobPoller,
  isSuccess,
  isTerminal,
  normalizeStatus,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_MAX_WAIT_MS,
} from './poller.js';
export type { SleepFn, SubmitParams, WaitParams, JobPollerOptions } from './poller.js';
export { ResultMaterializer, toResultSet, flattenEntry, EMPTY_RESULT } from './materializer.js';

// Transport
export { HttpTransport } from './transport.js';
export type {
  Transport,
  TransportRequest,
  TransportResponse,
  HttpMethod,
  FileField,
  HttpTransportOptions,
} from './transport.js';

// Ambient
export { loadConfig, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './config.js';
export type { ClientConfig } from './config.js';
export { createLogger } from './logger.js';
export type { LoggerConfig } from './logger.js';
export { generateJwt, TOKEN_TTL_SECONDS } from './auth.js';

// Types
export type {
  // API responses
  DatasetSummary,
  SampleDataset,
  DatasetDetails,
  DatasetStats,
  CreateDatasetResponse,
  TransactionResponse,
  UploadStatus,
  HealthResponse,
  ErrorResponse,
  // Search
  EntityType,
  IssueType,
  AnchorReference,
  VqlFilter,
  VqlDocument,
  SearchQuery,
  JobStatus,
  Job,
  ResultRow,
  ResultSet,
  // Client options
  ClientOptions,
  SearchOptions,
  CreateDatasetOptions,
} from './types.js';

// Errors
export {
  VisualLayerError,
  ValidationError,
  ConfigurationError,
  SubmissionError,
  TransportError,
  DatasetNotFoundError,
} from './types.js';
