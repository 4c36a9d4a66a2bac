import { describe, it, expect, vi } from 'vitest'
import {
  FilterResolver,
  DEFAULT_INSTRUCTIONS,
  buildPrompt,
  stripCodeFence,
} from '../../src/core/resolver.js'
import { defaultFilters } from '../../src/core/filters.js'
import type { Interpreter } from '../../src/providers/base.js'

function makeInterpreter(answer: string | Error): Interpreter & { complete: ReturnType<typeof vi.fn> } {
  return {
    name: 'fake',
    complete: answer instanceof Error ? vi.fn().mockRejectedValue(answer) : vi.fn().mockResolvedValue(answer),
  }
}

describe('stripCodeFence', () => {
  it('unwraps a json fence', () => {
    expect(stripCodeFence('```json\n{"language": "go"}\n```')).toBe('{"language": "go"}')
  })

  it('unwraps a bare fence with surrounding prose', () => {
    expect(stripCodeFence('Here you go:\n```\n{"limit": 5}\n```\nEnjoy')).toBe('{"limit": 5}')
  })

  it('unwraps a fence that was never closed', () => {
    expect(stripCodeFence('```json\n{"language": "go"}')).toBe('{"language": "go"}')
  })

  it('leaves unfenced text trimmed', () => {
    expect(stripCodeFence('  {"a": 1}\n')).toBe('{"a": 1}')
  })
})

describe('buildPrompt', () => {
  it('inserts the request text verbatim', () => {
    const prompt = buildPrompt(DEFAULT_INSTRUCTIONS, 'pythn machne lerning $&')
    expect(prompt).toContain('Request: "pythn machne lerning $&"')
    expect(prompt).not.toContain('{{query}}')
  })

  it('lists the filter vocabulary and the defaults', () => {
    for (const key of ['language', 'topics', 'stars', 'license', 'goodFirstIssue', 'helpWanted', 'updatedAfter', 'createdAfter']) {
      expect(DEFAULT_INSTRUCTIONS).toContain(`- ${key}:`)
    }
    expect(DEFAULT_INSTRUCTIONS).toContain(
      '{"includeArchived": false, "includeForks": false, "sort": "stars", "order": "desc", "limit": 10}',
    )
  })
})

describe('FilterResolver', () => {
  it('parses a fenced JSON answer into filters', async () => {
    const interpreter = makeInterpreter(
      '```json\n{"language": "python", "goodFirstIssue": true, "stars": {"min": 500}, ' +
        '"includeArchived": false, "includeForks": false, "sort": "stars", "order": "desc", "limit": 10}\n```',
    )
    const filters = await new FilterResolver(interpreter).resolve('good python first issue 500+ stars')
    expect(filters.language).toBe('python')
    expect(filters.goodFirstIssue).toBe(true)
    expect(filters.stars).toEqual({ min: 500 })
    expect(filters.limit).toBe(10)
  })

  it('keeps filters from an answer cut off before the closing fence', async () => {
    const filters = await new FilterResolver(makeInterpreter('```json\n{"language": "go"}')).resolve('go')
    expect(filters.language).toBe('go')
  })

  it('reports whether defaults were substituted', async () => {
    await expect(new FilterResolver(makeInterpreter('{"language": "go"}')).resolveWithOutcome('go')).resolves.toEqual({
      filters: { ...defaultFilters(), language: 'go' },
      fallback: false,
    })
    await expect(new FilterResolver(makeInterpreter('nope')).resolveWithOutcome('go')).resolves.toEqual({
      filters: defaultFilters(),
      fallback: true,
    })
  })

  it('sends the user text inside the instructions', async () => {
    const interpreter = makeInterpreter('{}')
    await new FilterResolver(interpreter, { instructions: 'Q={{query}}' }).resolve('rust cli')
    expect(interpreter.complete).toHaveBeenCalledWith('Q=rust cli')
  })

  it('falls back to defaults on non-JSON answers', async () => {
    const filters = await new FilterResolver(makeInterpreter('Sorry, I cannot help with that.')).resolve('x')
    expect(filters).toEqual(defaultFilters())
  })

  it('falls back to defaults on truncated JSON', async () => {
    const filters = await new FilterResolver(makeInterpreter('{"language": "go"')).resolve('x')
    expect(filters).toEqual(defaultFilters())
  })

  it('falls back to defaults when the interpreter fails', async () => {
    const interpreter = makeInterpreter(new Error('deadline exceeded'))
    await expect(new FilterResolver(interpreter).resolve('x')).resolves.toEqual(defaultFilters())
    expect(interpreter.complete).toHaveBeenCalledTimes(1)
  })

  it('falls back to defaults when the answer violates the filter model', async () => {
    const filters = await new FilterResolver(makeInterpreter('{"limit": 500}')).resolve('x')
    expect(filters).toEqual(defaultFilters())
  })

  it('falls back to defaults when the answer is a JSON array', async () => {
    const filters = await new FilterResolver(makeInterpreter('["python"]')).resolve('x')
    expect(filters).toEqual(defaultFilters())
  })
})
