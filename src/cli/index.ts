#!/usr/bin/env node
// src/cli/index.ts
import { realpathSync } from 'node:fs'
import { createInterface } from 'node:readline'
import { pathToFileURL } from 'node:url'
import { Command } from 'commander'
import { loadConfig } from '../core/config.js'
import { SqliteMetrics } from '../core/metrics.js'
import { buildExecutor, buildService } from '../core/engine-factory.js'
import { compileQuery } from '../core/compiler.js'
import { parseFilters } from '../core/filters.js'
import { formatterFor } from '../results/index.js'
import type { RepoSearchService } from '../core/engine.js'
import type { SearchResponse } from '../core/types.js'

interface CliDeps {
  searchNatural?: (text: string, page: number) => Promise<SearchResponse>
  searchStructured?: (raw: unknown) => Promise<SearchResponse>
  write?: (s: string) => void
  /** Line source for the interactive prompt; stdin when absent */
  input?: NodeJS.ReadableStream
}

const QUIT_WORDS = new Set(['quit', 'exit', 'q'])

interface FilterOptions {
  lang?: string
  topic: string[]
  starsMin?: string
  starsMax?: string
  license?: string
  goodFirstIssue?: boolean
  helpWanted?: boolean
  updatedAfter?: string
  createdAfter?: string
  includeForks?: boolean
  includeArchived?: boolean
  sort?: string
  order?: string
  limit?: string
  page?: string
}

interface OutputOptions {
  output: string
}

export function buildCli(deps: CliDeps = {}): Command {
  const write = deps.write ?? ((s: string) => process.stdout.write(s + '\n'))

  let service: RepoSearchService | undefined
  const getService = (): RepoSearchService => {
    if (!service) service = buildService()
    return service
  }
  const searchNatural = deps.searchNatural ?? ((text: string, page: number) => getService().searchNatural(text, page))
  const searchStructured = deps.searchStructured ?? ((raw: unknown) => getService().searchStructured(raw))

  const program = new Command()
  program
    .name('repoquery')
    .description('Find GitHub repositories by plain-language description or explicit filters')
    .version('0.1.0')

  // ---- ask: natural language ----
  program
    .command('ask [text...]')
    .description('Describe the repositories you want, e.g. "python machine learning 500+ stars"; no text starts a prompt')
    .option('--page <n>', 'result page', '1')
    .option('--output <fmt>', 'output format: json | markdown', 'json')
    .action(async (words: string[], opts: OutputOptions & { page: string }) => {
      const formatter = formatterFor(opts.output === 'markdown' ? 'markdown' : 'json')
      const page = Number(opts.page)
      if (words.length > 0) {
        write(formatter.format(await searchNatural(words.join(' '), page)))
        return
      }

      const rl = createInterface({
        input: deps.input ?? process.stdin,
        output: deps.input ? undefined : process.stdout,
      })
      rl.setPrompt('repoquery> ')
      rl.prompt()
      for await (const line of rl) {
        const text = line.trim()
        if (QUIT_WORDS.has(text.toLowerCase())) break
        if (text) {
          try {
            write(formatter.format(await searchNatural(text, page)))
          } catch (err: unknown) {
            write(`Error: ${err instanceof Error ? err.message : String(err)}`)
          }
        }
        rl.prompt()
      }
      rl.close()
    })

  // ---- search: structured filters ----
  addFilterOptions(
    program
      .command('search')
      .description('Search with explicit filters'),
  )
    .option('--output <fmt>', 'output format: json | markdown', 'json')
    .action(async (opts: FilterOptions & OutputOptions) => {
      const response = await searchStructured(toRawFilters(opts))
      write(formatterFor(opts.output === 'markdown' ? 'markdown' : 'json').format(response))
    })

  // ---- compile: query string only ----
  addFilterOptions(
    program
      .command('compile')
      .description('Print the GitHub search query for the given filters without searching'),
  ).action((opts: FilterOptions) => {
    write(compileQuery(parseFilters(toRawFilters(opts))))
  })

  // ---- validate command ----
  program
    .command('validate')
    .description('Check GitHub connectivity and token')
    .action(async () => {
      const ok = await buildExecutor(loadConfig()).validate()
      write(JSON.stringify({ github: ok }, null, 2))
    })

  // ---- stats command ----
  program
    .command('stats')
    .description('Show search metrics')
    .option('--since <hours>', 'hours to look back', '24')
    .action(async (opts: { since: string }) => {
      const cfg = loadConfig()
      const metrics = new SqliteMetrics(cfg.metricsPath)
      try {
        write(JSON.stringify(await metrics.stats(Number(opts.since) * 3600), null, 2))
      } finally {
        metrics.close()
      }
    })

  // ---- mcp-serve command ----
  program
    .command('mcp-serve')
    .description('Start MCP server (stdio transport)')
    .action(async () => {
      const { startMcpServer } = await import('../mcp/server.js')
      await startMcpServer()
    })

  return program
}

function addFilterOptions(cmd: Command): Command {
  return cmd
    .option('-l, --lang <lang>', 'programming language')
    .option('-t, --topic <topic>', 'topic (repeatable)', collect, [] as string[])
    .option('--stars-min <n>', 'minimum stars')
    .option('--stars-max <n>', 'maximum stars')
    .option('--license <license>', 'license keyword, e.g. mit')
    .option('--good-first-issue', 'has open good first issues')
    .option('--help-wanted', 'has open help wanted issues')
    .option('--updated-after <date>', 'pushed after YYYY-MM-DD')
    .option('--created-after <date>', 'created after YYYY-MM-DD')
    .option('--include-forks', 'include forks')
    .option('--include-archived', 'include archived repositories')
    .option('--sort <field>', 'stars | forks | help-wanted-issues | updated')
    .option('--order <order>', 'asc | desc')
    .option('--limit <n>', 'results per page (1-100)')
    .option('--page <n>', 'result page')
}

function toRawFilters(opts: FilterOptions): Record<string, unknown> {
  const stars =
    opts.starsMin !== undefined || opts.starsMax !== undefined
      ? { min: toNumber(opts.starsMin), max: toNumber(opts.starsMax) }
      : undefined
  return {
    language: opts.lang,
    topics: opts.topic,
    stars,
    license: opts.license,
    goodFirstIssue: opts.goodFirstIssue,
    helpWanted: opts.helpWanted,
    updatedAfter: opts.updatedAfter,
    createdAfter: opts.createdAfter,
    includeForks: opts.includeForks,
    includeArchived: opts.includeArchived,
    sort: opts.sort,
    order: opts.order,
    limit: toNumber(opts.limit),
    page: toNumber(opts.page),
  }
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value)
}

function collect(val: string, prev: string[]): string[] {
  return [...prev, val]
}

function isMainModule(): boolean {
  const entry = process.argv[1]
  if (!entry) return false
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href
  } catch {
    return false // entry path vanished or is not a file
  }
}

// Direct entrypoint - only runs when file is executed directly
if (isMainModule()) {
  const program = buildCli()
  program.parseAsync(process.argv).catch((e: unknown) => {
    process.stderr.write(String(e) + '\n')
    process.exit(1)
  })
}
