// src/results/markdown.ts
import type { ResultFormatter } from './base.js'
import type { SearchResponse } from '../core/types.js'

const MAX_TOPICS = 5

export class MarkdownFormatter implements ResultFormatter {
  format(response: SearchResponse): string {
    const { results } = response
    const lines: string[] = [
      `## Repositories for \`${response.query}\``,
      `> ${results.totalCount} repositories, page ${response.filters.page}, ${response.elapsed_ms}ms`,
      '',
    ]

    if (results.items.length === 0) {
      lines.push('No repositories matched. Try a different query.')
      return lines.join('\n')
    }

    lines.push('| Repository | Stars | Description | Topics |', '|---|---|---|---|')
    for (const r of results.items) {
      const topics = r.topics.slice(0, MAX_TOPICS).join(', ')
      lines.push(`| [${r.fullName}](${r.url}) | ${r.stars} | ${cell(r.description ?? '')} | ${topics} |`)
    }

    return lines.join('\n')
  }
}

function cell(text: string): string {
  return text.replace(/\s*\n\s*/g, ' ').replace(/\|/g, '\\|')
}
