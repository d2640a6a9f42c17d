import { vi } from 'vitest'
import { pino } from 'pino'
import type { HttpMethod, Transport, TransportRequest, TransportResponse } from '../src/index.js'

export const silentLogger = pino({ level: 'silent' })

export interface MockResponse {
  status: number
  body: unknown
}

/**
 * Mock fetch keyed by `METHOD /path`. A list of responses is served in
 * order, repeating the last one.
 */
export function createMockFetch (responses: Record<string, MockResponse | MockResponse[]>) {
  const queues = new Map<string, MockResponse[]>()
  for (const [key, value] of Object.entries(responses)) {
    queues.set(key, Array.isArray(value) ? [...value] : [value])
  }

  return vi.fn(async (input: RequestInfo | URL, init?: RequestInit) => {
    const url = typeof input === 'string' ? input : input instanceof Request ? input.url : input.href
    const path = new URL(url).pathname
    const method = init?.method ?? 'GET'
    const key = `${method} ${path}`

    const queue = queues.get(key)
    const response = queue && queue.length > 1 ? queue.shift() : queue?.[0]
    if (!response) {
      throw new Error(`No mock for: ${key}`)
    }

    return {
      ok: response.status >= 200 && response.status < 300,
      status: response.status,
      json: async () => response.body,
    } as Response
  })
}

export type MockFetch = ReturnType<typeof createMockFetch>

/** `METHOD /path` of every call the mock fetch received. */
export function calledRoutes (mockFetch: MockFetch): string[] {
  return mockFetch.mock.calls.map(([input, init]) => {
    const url = typeof input === 'string' ? input : input instanceof Request ? input.url : input.href
    return `${init?.method ?? 'GET'} ${new URL(url).pathname}`
  })
}

/** Full URL of the nth call whose route matches. */
export function calledUrl (mockFetch: MockFetch, route: string, nth = 0): URL {
  const matches = mockFetch.mock.calls.filter((_, index) => calledRoutes(mockFetch)[index] === route)
  const call = matches[nth]
  if (!call) {
    throw new Error(`No call for: ${route}`)
  }
  const [input] = call
  return new URL(typeof input === 'string' ? input : input instanceof Request ? input.url : input.href)
}

type FakeReply = TransportResponse | Error

export interface RecordedCall {
  method: HttpMethod
  path: string
  init?: TransportRequest
}

/**
 * In-process Transport. Replies are keyed by `METHOD /path` and served in
 * order, repeating the last; an Error reply is thrown.
 */
export class FakeTransport implements Transport {
  readonly calls: RecordedCall[] = []
  readonly #replies = new Map<string, FakeReply[]>()

  constructor (replies: Record<string, FakeReply | FakeReply[]> = {}) {
    for (const [key, value] of Object.entries(replies)) {
      this.#replies.set(key, Array.isArray(value) ? [...value] : [value])
    }
  }

  async request<T = unknown> (method: HttpMethod, path: string, init?: TransportRequest): Promise<TransportResponse<T>> {
    this.calls.push({ method, path, init })
    const key = `${method} ${path}`
    const queue = this.#replies.get(key)
    const reply = queue && queue.length > 1 ? queue.shift() : queue?.[0]
    if (!reply) {
      throw new Error(`No reply for: ${key}`)
    }
    if (reply instanceof Error) {
      throw reply
    }
    const body: T = reply.body as T
    return { status: reply.status, ok: reply.ok, body }
  }

  callsTo (method: HttpMethod, path: string): RecordedCall[] {
    return this.calls.filter((call) => call.method === method && call.path === path)
  }
}

export const ok = (body: unknown, status = 200): TransportResponse => ({ status, ok: true, body })

export const fail = (status: number, body?: unknown): TransportResponse => ({ status, ok: false, body })
