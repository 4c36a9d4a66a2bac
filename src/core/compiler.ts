// src/core/compiler.ts
import type { FilterModel } from './types.js'

// Substituted for a missing bound so the stars clause is always a closed range
export const STARS_FLOOR = 0
export const STARS_CEILING = 500_000

/**
 * Compile filters into a GitHub repository search query.
 *
 * Token order is fixed (language, stars, topics, license, issue flags, dates,
 * fork, archived) so equal filters always produce the same string. The fork
 * and archived tokens are always present.
 */
export function compileQuery(filters: FilterModel): string {
  const parts: string[] = []
  if (filters.language) parts.push(`language:${formatValue(filters.language)}`)
  if (filters.stars) {
    const min = filters.stars.min ?? STARS_FLOOR
    const max = filters.stars.max ?? Math.max(STARS_CEILING, min)
    parts.push(`stars:${min}..${max}`)
  }
  for (const topic of filters.topics) parts.push(`topic:${formatValue(topic)}`)
  if (filters.license) parts.push(`license:${formatValue(filters.license)}`)
  if (filters.goodFirstIssue) parts.push('good-first-issues:>0')
  if (filters.helpWanted) parts.push('help-wanted-issues:>0')
  if (filters.updatedAfter) parts.push(`pushed:>${filters.updatedAfter}`)
  if (filters.createdAfter) parts.push(`created:>${filters.createdAfter}`)
  parts.push(filters.includeForks ? 'fork:true' : 'fork:false')
  parts.push(filters.includeArchived ? 'archived:true' : 'archived:false')
  return parts.join(' ')
}

function formatValue(value: string): string {
  return /\s/.test(value) ? `"${value}"` : value
}
