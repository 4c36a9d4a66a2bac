import { describe, it, expect } from 'vitest'
import { defaultFilters, parseFilters, withPage } from '../../src/core/filters.js'
import { ValidationError } from '../../src/core/errors.js'

function fieldOf(fn: () => unknown): string | undefined {
  try {
    fn()
  } catch (err) {
    if (err instanceof ValidationError) return err.field
    throw err
  }
  return undefined
}

describe('parseFilters', () => {
  it('applies defaults to empty input', () => {
    expect(parseFilters({})).toEqual({
      topics: [],
      goodFirstIssue: false,
      helpWanted: false,
      includeForks: false,
      includeArchived: false,
      sort: 'stars',
      order: 'desc',
      limit: 10,
      page: 1,
    })
  })

  it('defaultFilters has every optional field absent', () => {
    const f = defaultFilters()
    expect(f).not.toHaveProperty('language')
    expect(f).not.toHaveProperty('stars')
    expect(f).not.toHaveProperty('license')
    expect(f).not.toHaveProperty('updatedAfter')
    expect(f).not.toHaveProperty('createdAfter')
  })

  it('keeps provided values', () => {
    const f = parseFilters({
      language: 'Rust',
      topics: ['cli', 'tui'],
      stars: { min: 10, max: 2000 },
      license: 'mit',
      goodFirstIssue: true,
      helpWanted: true,
      updatedAfter: '2024-01-31',
      createdAfter: '2020-02-29',
      includeForks: true,
      includeArchived: true,
      sort: 'updated',
      order: 'asc',
      limit: 100,
      page: 4,
    })
    expect(f.language).toBe('Rust')
    expect(f.topics).toEqual(['cli', 'tui'])
    expect(f.stars).toEqual({ min: 10, max: 2000 })
    expect(f.updatedAfter).toBe('2024-01-31')
    expect(f.createdAfter).toBe('2020-02-29')
    expect(f.sort).toBe('updated')
    expect(f.order).toBe('asc')
    expect(f.limit).toBe(100)
    expect(f.page).toBe(4)
  })

  it('treats null and empty strings as absent', () => {
    const f = parseFilters({ language: '', license: null, stars: null, topics: null, sort: null, limit: null })
    expect(f).not.toHaveProperty('language')
    expect(f).not.toHaveProperty('license')
    expect(f).not.toHaveProperty('stars')
    expect(f.topics).toEqual([])
    expect(f.sort).toBe('stars')
    expect(f.limit).toBe(10)
  })

  it('drops an empty stars object and keeps a one-sided range', () => {
    expect(parseFilters({ stars: {} })).not.toHaveProperty('stars')
    expect(parseFilters({ stars: { min: 100 } }).stars).toEqual({ min: 100 })
    expect(parseFilters({ stars: { max: 500, min: null } }).stars).toEqual({ max: 500 })
  })

  it('drops unknown keys', () => {
    expect(parseFilters({ stars_min: 5 })).not.toHaveProperty('stars_min')
  })

  it('rejects an inverted stars range on the stars field', () => {
    expect(fieldOf(() => parseFilters({ stars: { min: 500, max: 100 } }))).toBe('stars')
  })

  it('rejects negative star bounds', () => {
    expect(fieldOf(() => parseFilters({ stars: { min: -1 } }))).toBe('stars.min')
  })

  it('rejects limit outside 1..100', () => {
    expect(fieldOf(() => parseFilters({ limit: 0 }))).toBe('limit')
    expect(fieldOf(() => parseFilters({ limit: 101 }))).toBe('limit')
    expect(fieldOf(() => parseFilters({ limit: 2.5 }))).toBe('limit')
  })

  it('rejects page below 1', () => {
    expect(fieldOf(() => parseFilters({ page: 0 }))).toBe('page')
  })

  it('rejects impossible calendar dates', () => {
    expect(fieldOf(() => parseFilters({ updatedAfter: '2023-02-30' }))).toBe('updatedAfter')
    expect(fieldOf(() => parseFilters({ createdAfter: '2023/01/01' }))).toBe('createdAfter')
  })

  it('rejects an empty topic with its index', () => {
    expect(fieldOf(() => parseFilters({ topics: ['web', '  '] }))).toBe('topics.1')
  })

  it('rejects values containing double quotes', () => {
    expect(fieldOf(() => parseFilters({ language: 'c"' }))).toBe('language')
  })

  it('rejects unknown sort fields', () => {
    expect(fieldOf(() => parseFilters({ sort: 'best-match' }))).toBe('sort')
  })

  it('names the root when input is not an object', () => {
    expect(fieldOf(() => parseFilters('python'))).toBe('filters')
  })

  it('prefixes the message with the field', () => {
    expect(() => parseFilters({ page: 0 })).toThrow(/^page: /)
  })
})

describe('withPage', () => {
  it('returns a copy with the new page', () => {
    const base = parseFilters({ language: 'go' })
    const next = withPage(base, 3)
    expect(next.page).toBe(3)
    expect(next.language).toBe('go')
    expect(base.page).toBe(1)
  })

  it('rejects an invalid page', () => {
    expect(() => withPage(defaultFilters(), 0)).toThrow(ValidationError)
  })
})
