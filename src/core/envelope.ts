// src/core/envelope.ts
import type { FilterModel, ProviderPage, SearchResultEnvelope } from './types.js'

export function assembleEnvelope(filters: FilterModel, page: ProviderPage): SearchResultEnvelope {
  return {
    filters,
    totalCount: page.totalCount,
    items: page.items,
  }
}
