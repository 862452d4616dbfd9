import { z } from 'zod'
import { NetworkError, type AppError } from '@lib/errors'
import { createLogger, type Logger } from '@lib/logger'

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'
export type ErrorFactory = (message: string, status: number) => AppError

export interface HttpClientOptions {
  baseUrl: string
  fetch?: FetchLike
  getToken?: () => string | null
  toError?: ErrorFactory
  logger?: Logger
}

export interface RequestOptions<S extends z.ZodTypeAny> {
  schema: S
  body?: unknown
}

export interface HttpClient {
  request: <S extends z.ZodTypeAny>(
    method: HttpMethod,
    path: string,
    options: RequestOptions<S>
  ) => Promise<z.infer<S>>
}

const errorPayloadSchema = z.union([
  z.object({ error: z.object({ message: z.string().min(1) }) }),
  z.object({ message: z.string().min(1) })
])

export const errorMessageFrom = (payload: unknown): string | null => {
  const parsed = errorPayloadSchema.safeParse(payload)
  if (!parsed.success) return null
  return 'error' in parsed.data ? parsed.data.error.message : parsed.data.message
}

const parseBody = (text: string): { ok: true; value: unknown } | { ok: false } => {
  if (!text.trim()) return { ok: true, value: null }
  try {
    return { ok: true, value: JSON.parse(text) }
  } catch {
    return { ok: false }
  }
}

export const createHttpClient = ({
  baseUrl,
  fetch: fetchImpl = (input, init) => fetch(input, init),
  getToken = () => null,
  toError = (message, status) => new NetworkError(message, status),
  logger = createLogger('http')
}: HttpClientOptions): HttpClient => ({
  request: async (method, path, { schema, body }) => {
    const headers: Record<string, string> = { accept: 'application/json' }
    if (body !== undefined) headers['content-type'] = 'application/json'
    const token = getToken()
    if (token) headers.authorization = `Bearer ${token}`

    const url = `${baseUrl}${path}`
    let response: Response
    try {
      response = await fetchImpl(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body)
      })
    } catch (error) {
      logger.warn(`${method} ${path} failed`, error)
      throw new NetworkError('Network unavailable. Check your connection and try again.', null, {
        cause: error
      })
    }

    const parsedBody = parseBody(await response.text())

    if (!response.ok) {
      const message =
        (parsedBody.ok ? errorMessageFrom(parsedBody.value) : null) ??
        `Request failed with status ${response.status}`
      logger.warn(`${method} ${path} -> ${response.status}: ${message}`)
      throw toError(message, response.status)
    }

    if (!parsedBody.ok) {
      throw new NetworkError('The server sent an unreadable response.', response.status)
    }

    const result = schema.safeParse(parsedBody.value)
    if (!result.success) {
      logger.error(`${method} ${path} returned an unexpected payload`, result.error.issues)
      throw new NetworkError('The server sent an unexpected response.', response.status, {
        cause: result.error
      })
    }

    logger.debug(`${method} ${path} -> ${response.status}`)
    return result.data
  }
})
