// src/results/index.ts
import type { OutputFormat, ResultFormatter } from './base.js'
import { JsonFormatter } from './json.js'
import { MarkdownFormatter } from './markdown.js'

export function formatterFor(format: OutputFormat): ResultFormatter {
  return format === 'markdown' ? new MarkdownFormatter() : new JsonFormatter()
}
