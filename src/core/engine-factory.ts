// src/core/engine-factory.ts
import { loadConfig } from './config.js'
import type { Config } from './config.js'
import { RepoSearchService } from './engine.js'
import { FilterResolver } from './resolver.js'
import { openMetrics } from './metrics.js'
import { GitHubSearchExecutor } from '../providers/github.js'
import { GeminiInterpreter } from '../providers/gemini.js'

export function buildExecutor(cfg: Config): GitHubSearchExecutor {
  return new GitHubSearchExecutor({
    token: cfg.githubToken,
    baseUrl: cfg.githubApiUrl,
    timeoutMs: cfg.providerTimeoutMs,
  })
}

export function buildService(cfg: Config = loadConfig()): RepoSearchService {
  // natural-language search is unavailable without a key; structured search still works
  const resolver = cfg.googleApiKey
    ? new FilterResolver(
        new GeminiInterpreter({
          apiKey: cfg.googleApiKey,
          model: cfg.geminiModel,
          timeoutMs: cfg.interpreterTimeoutMs,
        }),
      )
    : undefined
  return new RepoSearchService(buildExecutor(cfg), resolver, openMetrics(cfg.metricsPath))
}
