// MCP server: exposes the research pipeline as tools over stdio.
// Handlers never throw; failures come back as isError content.

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { z } from 'zod';
import { parseSettings, type PipelineSettings, type PipelineSettingsInput } from '../config/settings.js';
import { analyze } from '../orchestrator/index.js';
import { LANGUAGES } from '../types/agents.js';
import type { DataFetcher } from '../types/data.js';
import type { GenerationProvider } from '../types/provider.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('McpServer');

export const AnalyzeStockSchema = z.object({
  entity_id: z.string().trim().min(1).describe("Entity identifier, e.g. a listed stock code such as '7203'"),
  model: z.string().trim().min(1).optional().describe('Model identifier override'),
  debate_rounds: z.coerce.number().int().min(1).max(3).optional().describe('Bull/bear debate rounds (1-3)'),
  language: z.enum(LANGUAGES).optional().describe('Output language of the agent reports'),
});

export type AnalyzeStockInput = z.input<typeof AnalyzeStockSchema>;

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

export interface ServerDeps {
  fetcher: DataFetcher;
  /** Base settings; per-call arguments override them */
  settings?: PipelineSettingsInput;
  createProvider: (settings: PipelineSettings) => GenerationProvider;
}

export function wrapResponse(result: unknown): ToolResponse {
  if (result instanceof Error) {
    return {
      content: [{ type: 'text', text: JSON.stringify({ error: result.message }) }],
      isError: true,
    };
  }
  return {
    content: [{ type: 'text', text: typeof result === 'string' ? result : JSON.stringify(result, null, 2) }],
  };
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

export async function handleAnalyzeStock(params: AnalyzeStockInput, deps: ServerDeps): Promise<ToolResponse> {
  try {
    const input = AnalyzeStockSchema.parse(params);
    const overrides: PipelineSettingsInput = { ...deps.settings };
    if (input.model !== undefined) overrides.model = input.model;
    if (input.debate_rounds !== undefined) overrides.debateRounds = input.debate_rounds;
    if (input.language !== undefined) overrides.language = input.language;

    const settings = parseSettings(overrides);
    const result = await analyze(input.entity_id, {
      provider: deps.createProvider(settings),
      fetcher: deps.fetcher,
      settings,
    });
    return wrapResponse(result);
  } catch (err) {
    log.error('analyze_stock failed', { error: toError(err).message });
    return wrapResponse(toError(err));
  }
}

export async function handleCheckDataSources(deps: Pick<ServerDeps, 'fetcher'>): Promise<ToolResponse> {
  try {
    const sources = await deps.fetcher.checkSources();
    const available = sources.filter((s) => s.available).length;
    return wrapResponse({ sources, available, total: sources.length });
  } catch (err) {
    return wrapResponse(toError(err));
  }
}

export function createMcpServer(deps: ServerDeps): McpServer {
  const server = new McpServer({
    name: 'signal-desk',
    version: '0.1.0',
  });

  server.tool(
    'analyze_stock',
    'Run the multi-agent research pipeline for one entity: five analyst reports, bull/bear debate, ' +
      'a BUY/SELL/HOLD decision with fact-checked key facts, and a risk review. Returns the full result as JSON.',
    AnalyzeStockSchema.shape,
    async (params) => handleAnalyzeStock(params, deps),
  );

  server.tool(
    'check_data_sources',
    'Report which market-data sources the configured data server exposes',
    async () => handleCheckDataSources(deps),
  );

  return server;
}

export async function startServer(deps: ServerDeps): Promise<McpServer> {
  const server = createMcpServer(deps);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info('MCP server listening on stdio');
  return server;
}
