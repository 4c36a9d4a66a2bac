// src/providers/github.ts
import got, { RequestError } from 'got'
import type { Response } from 'got'
import { z } from 'zod'
import type { ExecuteRequest, SearchExecutor } from './base.js'
import type { ProviderPage, RepositorySummary } from '../core/types.js'
import { ProviderRejected, ProviderUnavailable } from '../core/errors.js'
import type { RejectionReason } from '../core/errors.js'

export const GITHUB_API_URL = 'https://api.github.com'
const DEFAULT_TIMEOUT_MS = 15_000

const RepositoryItem = z.object({
  full_name: z.string(),
  stargazers_count: z.number(),
  html_url: z.string(),
  description: z.string().nullish(),
  topics: z.array(z.string()).nullish(),
})

const SearchPayload = z.object({
  total_count: z.number().int().min(0),
  items: z.array(RepositoryItem),
})

export interface GitHubExecutorOptions {
  token?: string
  baseUrl?: string
  timeoutMs?: number
}

export class GitHubSearchExecutor implements SearchExecutor {
  readonly name = 'github'
  private readonly baseUrl: string
  private readonly timeoutMs: number

  constructor(private readonly opts: GitHubExecutorOptions = {}) {
    this.baseUrl = opts.baseUrl ?? GITHUB_API_URL
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS
  }

  async execute(request: ExecuteRequest): Promise<ProviderPage> {
    let res: Response<string>
    try {
      res = await got.get(`${this.baseUrl}/search/repositories`, {
        searchParams: {
          q: request.query,
          sort: request.sort,
          order: request.order,
          per_page: request.limit,
          page: request.page,
        },
        headers: this.headers(),
        retry: { limit: 0 },
        timeout: { request: this.timeoutMs },
        throwHttpErrors: false,
      })
    } catch (err: unknown) {
      throw toUnavailable(err)
    }

    if (res.statusCode < 200 || res.statusCode >= 300) {
      throw toRejected(res)
    }

    const payload = SearchPayload.safeParse(parseJson(res.body))
    if (!payload.success) {
      throw new ProviderRejected(res.statusCode, 'MALFORMED_RESPONSE', 'Unexpected search response shape')
    }

    return {
      totalCount: payload.data.total_count,
      items: payload.data.items.map(normalize),
    }
  }

  async validate(): Promise<boolean> {
    try {
      const res = await got.get(`${this.baseUrl}/rate_limit`, {
        headers: this.headers(),
        retry: { limit: 0 },
        timeout: { request: 5_000 },
        throwHttpErrors: false,
      })
      return res.statusCode === 200
    } catch {
      return false
    }
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'User-Agent': 'repoquery',
      'X-GitHub-Api-Version': '2022-11-28',
    }
    if (this.opts.token) headers['Authorization'] = `Bearer ${this.opts.token}`
    return headers
  }
}

function normalize(item: z.infer<typeof RepositoryItem>): RepositorySummary {
  return {
    fullName: item.full_name,
    stars: item.stargazers_count,
    url: item.html_url,
    description: item.description ?? null,
    topics: item.topics ?? [],
  }
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body)
  } catch {
    return undefined
  }
}

function toUnavailable(err: unknown): ProviderUnavailable {
  if (err instanceof RequestError) return new ProviderUnavailable(err.code, err.message)
  return new ProviderUnavailable('UNKNOWN', String(err))
}

function toRejected(res: Response<string>): ProviderRejected {
  const status = res.statusCode
  const body = parseJson(res.body)
  const message =
    typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string'
      ? body.message
      : `HTTP ${status}`
  return new ProviderRejected(status, classify(status, res.headers['x-ratelimit-remaining']), message)
}

function classify(status: number, remaining: string | string[] | undefined): RejectionReason {
  if (status === 429) return 'RATE_LIMIT'
  if (status === 403) return remaining === '0' ? 'RATE_LIMIT' : 'AUTH'
  if (status === 401) return 'AUTH'
  if (status === 422) return 'INVALID_QUERY'
  return 'UNKNOWN'
}
