// src/core/filters.ts
import { z } from 'zod'
import { ValidationError } from './errors.js'
import { SORT_FIELDS, SORT_ORDERS } from './types.js'
import type { FilterModel, StarsRange } from './types.js'

export const DEFAULT_LIMIT = 10
export const MAX_LIMIT = 100

// null is treated as "absent" everywhere: language models like to emit it
const filterText = z
  .string()
  .trim()
  .refine((v) => !v.includes('"'), 'must not contain double quotes')

const optionalText = filterText.nullish().transform((v) => (v ? v : undefined))

const optionalDate = z
  .string()
  .date('must be a calendar date (YYYY-MM-DD)')
  .nullish()
  .transform((v) => v ?? undefined)

const flag = z.boolean().nullish().transform((v) => v ?? false)

const starBound = z.number().int().min(0).nullish().transform((v) => v ?? undefined)

const starsRange = z
  .object({ min: starBound, max: starBound })
  .nullish()
  .superRefine((range, ctx) => {
    if (range?.min !== undefined && range.max !== undefined && range.min > range.max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'min must not exceed max' })
    }
  })
  .transform((range): StarsRange | undefined => {
    if (!range) return undefined
    const out: { min?: number; max?: number } = {}
    if (range.min !== undefined) out.min = range.min
    if (range.max !== undefined) out.max = range.max
    return out.min === undefined && out.max === undefined ? undefined : out
  })

export const FilterInputSchema = z.object({
  language: optionalText.describe('Programming language, e.g. "python" or "typescript".'),
  topics: z
    .array(filterText.refine((v) => v.length > 0, 'must not be empty'))
    .nullish()
    .transform((v) => v ?? [])
    .describe('Repository topics, all of which must match, e.g. ["web", "api"].'),
  stars: starsRange.describe('Star count range, e.g. {"min": 100, "max": 2000}. Either bound may be omitted.'),
  license: optionalText.describe('License keyword, e.g. "mit" or "apache-2.0".'),
  goodFirstIssue: flag.describe('Only repositories with open "good first issue" issues.'),
  helpWanted: flag.describe('Only repositories with open "help wanted" issues.'),
  updatedAfter: optionalDate.describe('Only repositories pushed to after this date (YYYY-MM-DD).'),
  createdAfter: optionalDate.describe('Only repositories created after this date (YYYY-MM-DD).'),
  includeForks: flag.describe('Include forks (default false).'),
  includeArchived: flag.describe('Include archived repositories (default false).'),
  sort: z.enum(SORT_FIELDS).nullish().transform((v) => v ?? 'stars').describe('Sort field (default "stars").'),
  order: z.enum(SORT_ORDERS).nullish().transform((v) => v ?? 'desc').describe('Sort order (default "desc").'),
  limit: z
    .number()
    .int()
    .min(1)
    .max(MAX_LIMIT)
    .nullish()
    .transform((v) => v ?? DEFAULT_LIMIT)
    .describe(`Results per page (default ${DEFAULT_LIMIT}, max ${MAX_LIMIT}).`),
  page: z
    .number()
    .int()
    .min(1)
    .nullish()
    .transform((v) => v ?? 1)
    .describe('1-based page number (default 1).'),
})

type Mutable<T> = { -readonly [K in keyof T]: T[K] }

/**
 * Validate raw key-value input (decoded JSON, CLI options, model output) and
 * apply defaults. Unknown keys are dropped.
 *
 * @throws ValidationError naming the first offending field as a dotted path
 */
export function parseFilters(raw: unknown): FilterModel {
  const parsed = FilterInputSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'filters'
    throw new ValidationError(field, issue?.message ?? 'invalid filters')
  }

  const d = parsed.data
  const model: Mutable<FilterModel> = {
    topics: d.topics,
    goodFirstIssue: d.goodFirstIssue,
    helpWanted: d.helpWanted,
    includeForks: d.includeForks,
    includeArchived: d.includeArchived,
    sort: d.sort,
    order: d.order,
    limit: d.limit,
    page: d.page,
  }
  if (d.language !== undefined) model.language = d.language
  if (d.stars !== undefined) model.stars = d.stars
  if (d.license !== undefined) model.license = d.license
  if (d.updatedAfter !== undefined) model.updatedAfter = d.updatedAfter
  if (d.createdAfter !== undefined) model.createdAfter = d.createdAfter
  return model
}

/** Schema defaults with every optional field absent */
export function defaultFilters(): FilterModel {
  return parseFilters({})
}

export function withPage(filters: FilterModel, page: number): FilterModel {
  return parseFilters({ ...filters, page })
}
