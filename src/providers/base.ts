// src/providers/base.ts
import type { ProviderPage, SortField, SortOrder } from '../core/types.js'

export interface ExecuteRequest {
  query: string
  sort: SortField
  order: SortOrder
  limit: number
  page: number
}

/** Remote repository search. One round trip per call, never retried. */
export interface SearchExecutor {
  readonly name: string
  /**
   * @throws ProviderUnavailable on transport failure
   * @throws ProviderRejected on a non-success status or an unexpected payload
   */
  execute(request: ExecuteRequest): Promise<ProviderPage>
  validate(): Promise<boolean>
}

/** Language model that answers a prompt with free text */
export interface Interpreter {
  readonly name: string
  complete(prompt: string): Promise<string>
}
