// src/results/base.ts
import type { SearchResponse } from '../core/types.js'

export type OutputFormat = 'json' | 'markdown'

export interface ResultFormatter {
  format(response: SearchResponse): string
}
