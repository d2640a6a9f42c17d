import { stat } from 'node:fs/promises';
import * as dotenv from 'dotenv';
import type { Logger } from 'pino';
import { Dataset } from './dataset.js';
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, loadConfig } from './config.js';
import { describeError, raiseForStatus } from './errors.js';
import { createLogger, logger as defaultLogger } from './logger.js';
import { ResultMaterializer } from './materializer.js';
import { JobPoller } from './poller.js';
import { HttpTransport, type Transport } from './transport.js';
import type {
  ClientOptions,
  CreateDatasetOptions,
  CreateDatasetResponse,
  DatasetSummary,
  HealthResponse,
  SampleDataset,
} from './types.js';
import { ValidationError, VisualLayerError } from './types.js';

/**
 * Client for the Visual Layer dataset API.
 *
 * @example
 * ```ts
 * const client = new VisualLayerClient({ apiKey: 'key', apiSecret: 'secret' });
 *
 * // Find images with a caption match
 * const dataset = client.getDataset('3972b3fc-1809-11ef-bb76-064432e0d220');
 * const results = await dataset.searchByCaptions(['cat', 'sitting', 'outdoors']);
 *
 * console.log(results.columns, results.rows.length);
 * ```
 */
export class VisualLayerClient {
  readonly #transport: Transport;
  readonly #logger: Logger;
  readonly #poller: JobPoller;
  readonly #materializer: ResultMaterializer;

  constructor(options: ClientOptions) {
    if (!options.apiKey || !options.apiSecret) {
      throw new ValidationError('Both apiKey and apiSecret are required');
    }

    this.#logger = options.logger ?? defaultLogger;
    this.#transport =
      options.transport ??
      new HttpTransport({
        baseUrl: options.baseUrl ?? DEFAULT_BASE_URL,
        apiKey: options.apiKey,
        apiSecret: options.apiSecret,
        fetch: options.fetch ?? globalThis.fetch.bind(globalThis),
        timeout: options.timeout ?? DEFAULT_TIMEOUT_MS,
        logger: this.#logger,
      });
    this.#poller = new JobPoller(this.#transport, { logger: this.#logger });
    this.#materializer = new ResultMaterializer(this.#transport, this.#logger);
  }

  /**
   * Build a client from `VISUAL_LAYER_*` environment variables, reading a
   * `.env` file in the working directory first when one exists.
   */
  static fromEnv(overrides: Partial<ClientOptions> = {}): VisualLayerClient {
    dotenv.config();
    const config = loadConfig(process.env);

    return new VisualLayerClient({
      apiKey: config.apiKey,
      apiSecret: config.apiSecret,
      baseUrl: config.baseUrl,
      timeout: config.timeout,
      logger: createLogger({ level: config.logLevel }),
      ...overrides,
    });
  }

  /**
   * Get a handle for an existing dataset. Makes no network call; use
   * `getDetails()` on the result to check the dataset exists.
   */
  getDataset(datasetId: string): Dataset {
    return new Dataset(datasetId, {
      transport: this.#transport,
      poller: this.#poller,
      materializer: this.#materializer,
      logger: this.#logger,
    });
  }

  async healthcheck(): Promise<HealthResponse> {
    const res = await this.#transport.request<HealthResponse>('GET', '/healthcheck');
    raiseForStatus(res, 'Health check');
    return res.body ?? {};
  }

  /**
   * Health check that never throws.
   */
  async isHealthy(): Promise<boolean> {
    try {
      await this.healthcheck();
      return true;
    } catch (error) {
      this.#logger.debug({ err: error }, 'health check failed');
      return false;
    }
  }

  async getAllDatasets(): Promise<DatasetSummary[]> {
    const res = await this.#transport.request<DatasetSummary[]>('GET', '/datasets');
    raiseForStatus(res, 'List datasets');
    return res.body ?? [];
  }

  async getSampleDatasets(): Promise<SampleDataset[]> {
    const res = await this.#transport.request<SampleDataset[]>('GET', '/datasets/sample_data');
    raiseForStatus(res, 'List sample datasets');
    return res.body ?? [];
  }

  /**
   * Create a dataset. Only `datasetName` is required; unset options are
   * left out of the request.
   */
  async createDataset(options: CreateDatasetOptions): Promise<Dataset> {
    if (!options.datasetName) {
      throw new ValidationError('datasetName is required');
    }

    const form: Record<string, string> = { dataset_name: options.datasetName };
    const optional = {
      vl_dataset_id: options.vlDatasetId,
      bucket_path: options.bucketPath,
      uploaded_filename: options.uploadedFilename,
      config_url: options.configUrl,
      pipeline_type: options.pipelineType,
    };
    for (const [key, value] of Object.entries(optional)) {
      if (value !== undefined) {
        form[key] = value;
      }
    }

    const created = await this.#postDataset(form);
    this.#logger.info({ datasetId: created.id, name: options.datasetName }, 'dataset created');
    return this.getDataset(created.id);
  }

  /**
   * Create a dataset from a folder on the machine the API processes from.
   */
  async createDatasetFromLocalFolder(
    folderPath: string,
    datasetName: string,
    pipelineType?: string
  ): Promise<Dataset> {
    if (!folderPath || !datasetName) {
      throw new ValidationError('Both folderPath and datasetName are required');
    }

    const info = await stat(folderPath).catch(() => undefined);
    if (!info) {
      throw new ValidationError(`Folder path does not exist: ${folderPath}`);
    }
    if (!info.isDirectory()) {
      throw new ValidationError(`Path is not a directory: ${folderPath}`);
    }

    const created = await this.#postDataset({
      dataset_name: datasetName,
      vl_dataset_id: '',
      bucket_path: '',
      uploaded_filename: folderPath,
      config_url: '',
      pipeline_type: pipelineType ?? '',
    });
    this.#logger.info({ datasetId: created.id, folderPath }, 'dataset created from folder');
    return this.getDataset(created.id);
  }

  // ----------------------------------------------------------
  // Internal
  // ----------------------------------------------------------

  async #postDataset(form: Record<string, string>): Promise<CreateDatasetResponse> {
    const res = await this.#transport.request<CreateDatasetResponse>('POST', '/dataset', { form });
    raiseForStatus(res, 'Create dataset');

    const body = res.body;
    if (body?.status === 'error') {
      throw new VisualLayerError(`Create dataset failed: ${describeError(body)}`, res.status, body);
    }
    const id = body?.id ?? body?.dataset_id;
    if (typeof id !== 'string' || id.length === 0) {
      throw new VisualLayerError('Create dataset response had no id', res.status, body);
    }
    return { ...body, id };
  }
}
