// src/core/resolver.ts
import type { Interpreter } from '../providers/base.js'
import type { FilterModel } from './types.js'
import { InterpretationFailure } from './errors.js'
import { defaultFilters, parseFilters } from './filters.js'
import { createLogger } from './logger.js'

const log = createLogger({ name: 'resolver' })

export const QUERY_PLACEHOLDER = '{{query}}'

export const DEFAULT_INSTRUCTIONS = `Convert this GitHub repository search request to JSON filters.

Available filters:
- language: string (e.g. "python", "javascript")
- topics: array of strings (e.g. ["web", "api"])
- stars: object with optional integer bounds (e.g. {"min": 100, "max": 2000})
- license: string (e.g. "mit")
- goodFirstIssue: boolean, repositories with open good first issues
- helpWanted: boolean, repositories with open help wanted issues
- updatedAfter: date "YYYY-MM-DD", last pushed after this date
- createdAfter: date "YYYY-MM-DD", created after this date
- sort: one of "stars", "forks", "help-wanted-issues", "updated"
- order: "asc" or "desc"
- limit: integer between 1 and 100

Handle spelling mistakes intelligently. Leave out filters the request does not mention.

Request: "${QUERY_PLACEHOLDER}"

Return ONLY valid JSON with these defaults:
{"includeArchived": false, "includeForks": false, "sort": "stars", "order": "desc", "limit": 10}

JSON:`

export interface ResolverOptions {
  /** Prompt template; must contain {{query}} */
  instructions?: string
}

// The closing fence is optional
const FENCE = /```[\w-]*[ \t]*\r?\n?([\s\S]*?)(?:```|$)/

/** Unwrap the first ```lang ... ``` block, if any */
export function stripCodeFence(text: string): string {
  const match = FENCE.exec(text)
  return (match?.[1] ?? text).trim()
}

export function buildPrompt(instructions: string, text: string): string {
  return instructions.replace(QUERY_PLACEHOLDER, () => text)
}

export interface Resolution {
  filters: FilterModel
  /** True when the interpreter's answer was unusable and defaults were substituted */
  fallback: boolean
}

export class FilterResolver {
  private readonly instructions: string

  constructor(
    private readonly interpreter: Interpreter,
    opts: ResolverOptions = {},
  ) {
    this.instructions = opts.instructions ?? DEFAULT_INSTRUCTIONS
  }

  /**
   * Turn free text into filters. Never throws: any failure of the interpreter
   * or of its answer yields the default filters.
   */
  async resolve(text: string): Promise<FilterModel> {
    return (await this.resolveWithOutcome(text)).filters
  }

  async resolveWithOutcome(text: string): Promise<Resolution> {
    try {
      return { filters: await this.interpret(text), fallback: false }
    } catch (err: unknown) {
      log.warn(
        { interpreter: this.interpreter.name, error: err instanceof Error ? err.message : String(err) },
        'interpretation failed, using default filters',
      )
      return { filters: defaultFilters(), fallback: true }
    }
  }

  private async interpret(text: string): Promise<FilterModel> {
    let answer: string
    try {
      answer = await this.interpreter.complete(buildPrompt(this.instructions, text))
    } catch (err: unknown) {
      throw new InterpretationFailure(`${this.interpreter.name} call failed`, { cause: err })
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(stripCodeFence(answer))
    } catch (err: unknown) {
      throw new InterpretationFailure('answer is not valid JSON', { cause: err })
    }

    try {
      return parseFilters(parsed)
    } catch (err: unknown) {
      throw new InterpretationFailure(
        `answer is not a valid filter set: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err },
      )
    }
  }
}
