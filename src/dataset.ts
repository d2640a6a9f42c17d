import { readFile, stat } from 'node:fs/promises';
import { basename } from 'node:path';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { Transport } from './transport.js';
import type {
  AnchorReference,
  DatasetDetails,
  DatasetStats,
  EntityType,
  IssueType,
  Job,
  ResultSet,
  SearchOptions,
  SearchQuery,
  TransactionResponse,
  UploadStatus,
  VqlDocument,
} from './types.js';
import { ValidationError, VisualLayerError } from './types.js';
import { raiseForStatus } from './errors.js';
import { buildQuery } from './query.js';
import { DEFAULT_MAX_WAIT_MS, DEFAULT_POLL_INTERVAL_MS, type JobPoller } from './poller.js';
import type { ResultMaterializer } from './materializer.js';

const anchorResponseSchema = z.object({
  anchor_media_id: z.string().min(1),
  anchor_type: z.string().min(1),
});

export interface DatasetContext {
  transport: Transport;
  poller: JobPoller;
  materializer: ResultMaterializer;
  logger: Logger;
}

export interface IssueSearch {
  issueType: IssueType;
  /** Default: 0.8 */
  confidenceMin?: number;
  /** Default: 1 */
  confidenceMax?: number;
}

/**
 * Handle to a dataset. Carries the dataset id and provides methods for
 * introspection, uploads, search and export.
 */
export class Dataset {
  readonly #transport: Transport;
  readonly #poller: JobPoller;
  readonly #materializer: ResultMaterializer;
  readonly #logger: Logger;

  constructor(
    public readonly id: string,
    context: DatasetContext
  ) {
    this.#transport = context.transport;
    this.#poller = context.poller;
    this.#materializer = context.materializer;
    this.#logger = context.logger.child({ datasetId: id });
  }

  // ----------------------------------------------------------
  // Introspection
  // ----------------------------------------------------------

  async getDetails(): Promise<DatasetDetails> {
    return this.#get<DatasetDetails>(`/dataset/${this.id}`, 'Get dataset details');
  }

  /**
   * Processing status as reported by the API, e.g. `READY`.
   */
  async getStatus(): Promise<string | undefined> {
    const details = await this.getDetails();
    return details.status;
  }

  async getStats(): Promise<DatasetStats> {
    return this.#get<DatasetStats>(`/dataset/${this.id}/stats`, 'Get dataset stats');
  }

  async explore(): Promise<Record<string, unknown>> {
    return this.#get<Record<string, unknown>>(`/explore/${this.id}`, 'Explore dataset');
  }

  // ----------------------------------------------------------
  // Uploads
  // ----------------------------------------------------------

  /**
   * Upload image files in one ingestion transaction and start processing.
   * Every path is checked before anything is sent.
   *
   * @returns The transaction id, for `getUploadStatus`
   */
  async uploadImages(imagePaths: string | string[]): Promise<string> {
    const paths = typeof imagePaths === 'string' ? [imagePaths] : imagePaths;
    if (paths.length === 0) {
      throw new ValidationError('No image paths given');
    }
    for (const path of paths) {
      const isFile = await stat(path).then(
        (info) => info.isFile(),
        () => false
      );
      if (!isFile) {
        throw new ValidationError(`Image file not found: ${path}`);
      }
    }

    const started = await this.#transport.request<TransactionResponse>(
      'POST',
      `/ingestion/${this.id}/data_files`
    );
    raiseForStatus(started, 'Start upload transaction', this.id);
    const transactionId = started.body?.transaction_id;
    if (!transactionId) {
      throw new VisualLayerError('Upload transaction response had no transaction_id', started.status, started.body);
    }

    for (const path of paths) {
      const data = await readFile(path);
      const res = await this.#transport.request(
        'POST',
        `/ingestion/${this.id}/data_files/${transactionId}`,
        { files: [{ filename: basename(path), data }] }
      );
      raiseForStatus(res, `Upload ${basename(path)}`, this.id);
      this.#logger.debug({ transactionId, file: basename(path) }, 'image uploaded');
    }

    const processed = await this.#transport.request(
      'POST',
      `/ingestion/${this.id}/process_files/${transactionId}`
    );
    raiseForStatus(processed, 'Process uploaded files', this.id);

    this.#logger.info({ transactionId, files: paths.length }, 'upload transaction submitted');
    return transactionId;
  }

  async getUploadStatus(transactionId: string): Promise<UploadStatus> {
    return this.#get<UploadStatus>(
      `/ingestion/${this.id}/data_files/${transactionId}`,
      'Get upload status'
    );
  }

  /**
   * Upload a probe image for visual-similarity search. The returned
   * anchor can be reused across searches.
   */
  async uploadAnchor(image: Uint8Array | Blob, filename: string): Promise<AnchorReference> {
    const res = await this.#transport.request<unknown>(
      'POST',
      `/dataset/${this.id}/search-image-similarity`,
      { files: [{ filename, data: image }] }
    );
    raiseForStatus(res, 'Upload similarity anchor', this.id);

    const parsed = anchorResponseSchema.safeParse(res.body);
    if (!parsed.success) {
      throw new VisualLayerError('Anchor upload returned no anchor_media_id', res.status, res.body);
    }
    return {
      anchorMediaId: parsed.data.anchor_media_id,
      anchorType: parsed.data.anchor_type,
    };
  }

  // ----------------------------------------------------------
  // Search & export
  // ----------------------------------------------------------

  /**
   * Run a search and return the matching media as rows. A job that fails
   * or times out yields an empty ResultSet; use `submitSearch` to see why.
   *
   * @example
   * const rows = await ds.search({ kind: 'captions', captions: ['dog', 'on', 'grass'] });
   */
  async search(query: SearchQuery, options: SearchOptions = {}): Promise<ResultSet> {
    const job = await this.submitSearch(query, options);
    return this.materialize(job);
  }

  /**
   * Submit a search and wait for its job to reach a terminal state.
   */
  async submitSearch(query: SearchQuery, options: SearchOptions = {}): Promise<Job> {
    return this.#run(buildQuery(query), options);
  }

  async materialize(job: Job): Promise<ResultSet> {
    return this.#materializer.materialize(job);
  }

  /**
   * Export the whole dataset.
   */
  async export(options: SearchOptions = {}): Promise<ResultSet> {
    const job = await this.#run([], options);
    return this.materialize(job);
  }

  async searchByLabels(labels: string[], options?: SearchOptions): Promise<ResultSet> {
    return this.search({ kind: 'labels', labels }, options);
  }

  async searchByCaptions(captions: string | string[], options?: SearchOptions): Promise<ResultSet> {
    return this.search(
      { kind: 'captions', captions: typeof captions === 'string' ? [captions] : captions },
      options
    );
  }

  async searchByIssues(issue: IssueSearch, options?: SearchOptions): Promise<ResultSet> {
    return this.search(
      {
        kind: 'issues',
        issueType: issue.issueType,
        confidenceMin: issue.confidenceMin ?? 0.8,
        confidenceMax: issue.confidenceMax ?? 1,
      },
      options
    );
  }

  async searchByVisualSimilarity(
    anchor: AnchorReference,
    threshold = 0,
    options?: SearchOptions
  ): Promise<ResultSet> {
    return this.search({ kind: 'similarity', anchor, threshold }, options);
  }

  /** Escape hatch for VQL filters this client does not model. */
  async searchByVql(filters: VqlDocument, options?: SearchOptions): Promise<ResultSet> {
    return this.search({ kind: 'vql', filters }, options);
  }

  // ----------------------------------------------------------
  // Lifecycle
  // ----------------------------------------------------------

  /**
   * Delete this dataset from the server.
   * The Dataset object becomes unusable after this.
   */
  async delete(): Promise<void> {
    const res = await this.#transport.request('DELETE', `/dataset/${this.id}`);
    raiseForStatus(res, 'Delete dataset', this.id);
    this.#logger.info('dataset deleted');
  }

  // ----------------------------------------------------------
  // Internal
  // ----------------------------------------------------------

  async #run(query: VqlDocument, options: SearchOptions): Promise<Job> {
    const entityType: EntityType = options.entityType ?? 'IMAGES';
    return this.#poller.submitAndWait({
      datasetId: this.id,
      query,
      entityType,
      pollIntervalMs: options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS,
      maxWaitMs: options.maxWaitMs ?? DEFAULT_MAX_WAIT_MS,
      signal: options.signal,
    });
  }

  async #get<T>(path: string, action: string): Promise<T> {
    const res = await this.#transport.request<T>('GET', path);
    raiseForStatus(res, action, this.id);
    if (res.body === undefined) {
      throw new VisualLayerError(`${action} returned an empty body`, res.status);
    }
    return res.body;
  }
}
