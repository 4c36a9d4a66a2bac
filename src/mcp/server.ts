// src/mcp/server.ts
import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js'
import { zodToJsonSchema } from 'zod-to-json-schema'
import { tools, SearchNaturalInput, SearchStatsInput } from './tools.js'
import {
  handleSearchRepositories,
  handleSearchNatural,
  handleCompileQuery,
  handleSearchStats,
} from './handlers.js'
import { loadConfig } from '../core/config.js'
import { createLogger } from '../core/logger.js'
import { isProviderFailure } from '../core/errors.js'

export async function startMcpServer(): Promise<void> {
  const cfg = loadConfig()
  const log = createLogger({ level: cfg.logLevel, file: cfg.logFile, name: 'mcp' })

  const server = new Server(
    { name: 'repoquery', version: '0.1.0' },
    { capabilities: { tools: {} } },
  )

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: tools.map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: { ...zodToJsonSchema(t.inputSchema, { $refStrategy: 'none' }), type: 'object' as const },
    })),
  }))

  server.setRequestHandler(CallToolRequestSchema, async (req) => {
    const { name, arguments: args } = req.params
    log.info({ tool: name }, 'MCP tool call')

    try {
      let result: string
      switch (name) {
        case 'search_repositories':
          result = await handleSearchRepositories(args)
          break
        case 'search_natural_language':
          result = await handleSearchNatural(SearchNaturalInput.parse(args))
          break
        case 'compile_query':
          result = handleCompileQuery(args)
          break
        case 'search_stats':
          result = await handleSearchStats(SearchStatsInput.parse(args ?? {}))
          break
        default:
          throw new Error(`Unknown tool: ${name}`)
      }
      return { content: [{ type: 'text' as const, text: result }] }
    } catch (err) {
      const retryable = isProviderFailure(err) && err.retryable
      log.error({ tool: name, error: String(err), retryable }, 'tool error')
      const hint = retryable ? ' (temporary, retry later)' : ''
      return {
        content: [{ type: 'text' as const, text: `Error: ${String(err)}${hint}` }],
        isError: true,
      }
    }
  })

  const transport = new StdioServerTransport()
  await server.connect(transport)
  log.info('MCP server running on stdio')
}
