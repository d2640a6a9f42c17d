import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest'
import { decodeProtectedHeader, jwtVerify } from 'jose'
import {
  VisualLayerClient,
  Dataset,
  TransportError,
  ValidationError,
  VisualLayerError,
} from '../src/index.js'
import { createMockFetch, silentLogger } from './helpers.js'

const BASE_URL = 'https://vl.test'

function createClient (mockFetch: ReturnType<typeof createMockFetch>) {
  return new VisualLayerClient({
    apiKey: 'test-key',
    apiSecret: 'test-secret',
    baseUrl: BASE_URL,
    fetch: mockFetch,
    logger: silentLogger,
  })
}

function sentHeaders (mockFetch: ReturnType<typeof createMockFetch>, index = 0): Headers {
  return new Headers(mockFetch.mock.calls[index]?.[1]?.headers)
}

describe('VisualLayerClient', () => {
  describe('constructor', () => {
    it('should require credentials', () => {
      expect(() => new VisualLayerClient({ apiKey: '', apiSecret: 'test-secret' })).toThrow(ValidationError)
    })

    it('should strip a trailing slash from the base URL', async () => {
      const mockFetch = createMockFetch({
        'GET /api/v1/healthcheck': { status: 200, body: { status: 'ok' } },
      })
      const client = new VisualLayerClient({
        apiKey: 'test-key',
        apiSecret: 'test-secret',
        baseUrl: 'https://vl.test/api/v1/',
        fetch: mockFetch,
        logger: silentLogger,
      })

      await client.healthcheck()

      expect(mockFetch).toHaveBeenCalledWith('https://vl.test/api/v1/healthcheck', expect.anything())
    })
  })

  describe('authentication', () => {
    it('should sign every request with a JWT', async () => {
      const mockFetch = createMockFetch({
        'GET /healthcheck': { status: 200, body: { status: 'ok' } },
      })
      const client = createClient(mockFetch)

      await client.healthcheck()

      const headers = sentHeaders(mockFetch)
      expect(headers.get('accept')).toBe('application/json')
      const authorization = headers.get('authorization') ?? ''
      expect(authorization.startsWith('Bearer ')).toBe(true)

      const token = authorization.slice('Bearer '.length)
      expect(decodeProtectedHeader(token)).toEqual({ alg: 'HS256', typ: 'JWT', kid: 'test-key' })

      const { payload } = await jwtVerify(token, new TextEncoder().encode('test-secret'))
      expect(payload.sub).toBe('test-key')
      expect(payload.iss).toBe('sdk')
      expect((payload.exp ?? 0) - (payload.iat ?? 0)).toBe(600)
    })
  })

  describe('healthcheck', () => {
    it('should return the health body', async () => {
      const mockFetch = createMockFetch({
        'GET /healthcheck': { status: 200, body: { status: 'ok', version: '1.2' } },
      })

      expect(await createClient(mockFetch).healthcheck()).toEqual({ status: 'ok', version: '1.2' })
    })

    it('should raise VisualLayerError with the server detail', async () => {
      const mockFetch = createMockFetch({
        'GET /healthcheck': { status: 503, body: { detail: 'maintenance' } },
      })

      const error = await createClient(mockFetch).healthcheck().catch((e: unknown) => e)

      expect(error).toBeInstanceOf(VisualLayerError)
      expect(error).toMatchObject({ status: 503, message: 'Health check failed (503): maintenance' })
    })

    it('should raise TransportError when the network fails', async () => {
      const mockFetch = vi.fn().mockRejectedValue(new Error('Network error'))
      const client = new VisualLayerClient({
        apiKey: 'test-key',
        apiSecret: 'test-secret',
        baseUrl: BASE_URL,
        fetch: mockFetch,
        logger: silentLogger,
      })

      await expect(client.healthcheck()).rejects.toThrow(TransportError)
      await expect(client.healthcheck()).rejects.toThrow('GET /healthcheck failed: Network error')
    })

    it('should raise TransportError when the request times out', async () => {
      const mockFetch = vi.fn((_input: RequestInfo | URL, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')))
        }))
      const client = new VisualLayerClient({
        apiKey: 'test-key',
        apiSecret: 'test-secret',
        baseUrl: BASE_URL,
        fetch: mockFetch,
        timeout: 10,
        logger: silentLogger,
      })

      const error = await client.healthcheck().catch((e: unknown) => e)

      expect(error).toBeInstanceOf(TransportError)
      expect(error).toMatchObject({
        message: 'GET /healthcheck failed: timed out after 10ms',
        cause: new Error('aborted'),
      })
    })

    it('should raise TransportError when a successful response is not JSON', async () => {
      const mockFetch = vi.fn().mockResolvedValue({
        ok: true,
        status: 200,
        json: async (): Promise<unknown> => { throw new SyntaxError('Unexpected token <') },
      } as Response)
      const client = new VisualLayerClient({
        apiKey: 'test-key',
        apiSecret: 'test-secret',
        baseUrl: BASE_URL,
        fetch: mockFetch,
        logger: silentLogger,
      })

      const error = await client.healthcheck().catch((e: unknown) => e)

      expect(error).toBeInstanceOf(TransportError)
      expect(error).toMatchObject({
        message: 'GET /healthcheck returned a non-JSON body',
        cause: new SyntaxError('Unexpected token <'),
      })
    })
  })

  describe('isHealthy', () => {
    it('should return true when the server is healthy', async () => {
      const mockFetch = createMockFetch({
        'GET /healthcheck': { status: 200, body: { status: 'ok' } },
      })

      expect(await createClient(mockFetch).isHealthy()).toBe(true)
    })

    it('should return false when the server is unreachable', async () => {
      const mockFetch = vi.fn().mockRejectedValue(new Error('Network error'))
      const client = new VisualLayerClient({
        apiKey: 'test-key',
        apiSecret: 'test-secret',
        baseUrl: BASE_URL,
        fetch: mockFetch,
        logger: silentLogger,
      })

      expect(await client.isHealthy()).toBe(false)
    })
  })

  describe('listing', () => {
    it('should list all datasets', async () => {
      const mockFetch = createMockFetch({
        'GET /datasets': {
          status: 200,
          body: [
            { id: 'ds-1', display_name: 'Cats', status: 'READY' },
            { id: 'ds-2', display_name: 'Dogs', status: 'INDEXING' },
          ],
        },
      })

      const datasets = await createClient(mockFetch).getAllDatasets()

      expect(datasets).toHaveLength(2)
      expect(datasets[1]).toEqual({ id: 'ds-2', display_name: 'Dogs', status: 'INDEXING' })
    })

    it('should list sample datasets', async () => {
      const mockFetch = createMockFetch({
        'GET /datasets/sample_data': {
          status: 200,
          body: [{ dataset_id: 'sample-1', display_name: 'Fruits' }],
        },
      })

      const samples = await createClient(mockFetch).getSampleDatasets()

      expect(samples).toEqual([{ dataset_id: 'sample-1', display_name: 'Fruits' }])
    })
  })

  describe('getDataset', () => {
    it('should create a Dataset without network call', () => {
      const mockFetch = createMockFetch({})
      const dataset = createClient(mockFetch).getDataset('existing-id')

      expect(dataset).toBeInstanceOf(Dataset)
      expect(dataset.id).toBe('existing-id')
      expect(mockFetch).not.toHaveBeenCalled()
    })
  })

  describe('createDataset', () => {
    it('should post a form with only the given fields', async () => {
      const mockFetch = createMockFetch({
        'POST /dataset': { status: 200, body: { id: 'ds-new' } },
      })

      const dataset = await createClient(mockFetch).createDataset({
        datasetName: 'cats',
        pipelineType: 'fast',
      })

      expect(dataset.id).toBe('ds-new')
      expect(mockFetch).toHaveBeenCalledWith(
        'https://vl.test/dataset',
        expect.objectContaining({
          method: 'POST',
          body: 'dataset_name=cats&pipeline_type=fast',
        })
      )
      expect(sentHeaders(mockFetch).get('content-type')).toBe('application/x-www-form-urlencoded')
    })

    it('should reject a body reporting an error', async () => {
      const mockFetch = createMockFetch({
        'POST /dataset': { status: 200, body: { status: 'error', message: 'name taken' } },
      })

      await expect(createClient(mockFetch).createDataset({ datasetName: 'cats' })).rejects.toThrow(
        'Create dataset failed: name taken'
      )
    })

    it('should require a name', async () => {
      const mockFetch = createMockFetch({})

      await expect(createClient(mockFetch).createDataset({ datasetName: '' })).rejects.toThrow(ValidationError)
      expect(mockFetch).not.toHaveBeenCalled()
    })
  })

  describe('createDatasetFromLocalFolder', () => {
    let folder: string

    beforeAll(async () => {
      folder = await mkdtemp(join(tmpdir(), 'vl-client-'))
      await writeFile(join(folder, 'image.jpg'), 'not really a jpeg')
    })

    afterAll(async () => {
      await rm(folder, { recursive: true, force: true })
    })

    it('should post the folder path with empty optional fields', async () => {
      const mockFetch = createMockFetch({
        'POST /dataset': { status: 200, body: { dataset_id: 'ds-folder', status: 'pending' } },
      })

      const dataset = await createClient(mockFetch).createDatasetFromLocalFolder(folder, 'archive')

      expect(dataset.id).toBe('ds-folder')
      const form = new URLSearchParams(String(mockFetch.mock.calls[0]?.[1]?.body))
      expect(Object.fromEntries(form)).toEqual({
        dataset_name: 'archive',
        vl_dataset_id: '',
        bucket_path: '',
        uploaded_filename: folder,
        config_url: '',
        pipeline_type: '',
      })
    })

    it('should reject a missing folder before any request', async () => {
      const mockFetch = createMockFetch({})

      await expect(
        createClient(mockFetch).createDatasetFromLocalFolder(join(folder, 'missing'), 'archive')
      ).rejects.toThrow('Folder path does not exist')
      expect(mockFetch).not.toHaveBeenCalled()
    })

    it('should reject a file path', async () => {
      const mockFetch = createMockFetch({})

      await expect(
        createClient(mockFetch).createDatasetFromLocalFolder(join(folder, 'image.jpg'), 'archive')
      ).rejects.toThrow('Path is not a directory')
    })
  })
})
