import { homedir } from 'node:os'
import { join, dirname } from 'node:path'
import { fileURLToPath } from 'node:url'
import { readFileSync } from 'node:fs'

const ENV_LINE = /^\s*(?:export\s+)?([A-Za-z_][\w.]*)\s*=\s*(.*?)\s*$/

/** Parse `KEY=value` lines of a .env file. Comments, blanks and malformed lines are skipped. */
export function parseEnvFile(content: string): Record<string, string> {
  const vars: Record<string, string> = {}
  for (const line of content.split(/\r?\n/)) {
    if (line.trimStart().startsWith('#')) continue
    const match = ENV_LINE.exec(line)
    if (!match?.[1]) continue
    const raw = match[2] ?? ''
    const quoted = /^(["'])(.*)\1$/.exec(raw)
    vars[match[1]] = quoted ? (quoted[2] ?? '') : raw
  }
  return vars
}

// .env beside package.json; variables already set win
function loadEnvFile(): void {
  const file = join(dirname(fileURLToPath(import.meta.url)), '..', '..', '.env')
  let content: string
  try {
    content = readFileSync(file, 'utf8')
  } catch {
    return
  }
  for (const [key, value] of Object.entries(parseEnvFile(content))) {
    if (process.env[key] === undefined) process.env[key] = value
  }
}

/** Positive finite number from env, else the fallback */
export function positiveNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback
  const n = Number(value)
  return Number.isFinite(n) && n > 0 ? n : fallback
}

loadEnvFile()

export interface Config {
  githubToken: string | undefined
  githubApiUrl: string
  providerTimeoutMs: number
  googleApiKey: string | undefined
  geminiModel: string
  interpreterTimeoutMs: number
  metricsPath: string
  logLevel: string
  logFile: string | undefined
}

export function loadConfig(): Config {
  return {
    githubToken: process.env['GITHUB_TOKEN'] || undefined,
    githubApiUrl: process.env['GITHUB_API_URL'] ?? 'https://api.github.com',
    providerTimeoutMs: positiveNumber(process.env['REPOQUERY_PROVIDER_TIMEOUT_MS'], 15_000),
    googleApiKey: process.env['GOOGLE_API_KEY'] || undefined,
    geminiModel: process.env['GEMINI_MODEL'] ?? 'gemini-2.0-flash',
    interpreterTimeoutMs: positiveNumber(process.env['REPOQUERY_INTERPRETER_TIMEOUT_MS'], 20_000),
    metricsPath: join(homedir(), '.cache', 'repoquery', 'metrics.db'),
    logLevel: process.env['LOG_LEVEL'] ?? 'info',
    logFile: process.env['LOG_FILE'] || undefined,
  }
}
