// Market data over MCP: one tool per source, called concurrently, each
// under the data timeout. A failing or empty source becomes null.

import { SOURCE_NAMES } from '../types/data.js';
import type {
  DataFetcher, FetchOptions, SourceAvailability, SourceData, SourceName,
} from '../types/data.js';
import { errorMessage } from '../utils/errors.js';
import { isRecord } from '../utils/json.js';
import { createLogger } from '../utils/logger.js';
import { isEmptyPayload } from '../utils/payload.js';
import { withTimeout } from '../utils/timeout.js';
import type { ToolCaller } from './mcp-client.js';

const log = createLogger('DataFetcher');

export const DEFAULT_SOURCE_TOOLS: Record<SourceName, string> = {
  statements: 'get_financial_statements',
  disclosures: 'get_disclosures',
  stock_price: 'get_stock_price',
  news: 'get_news',
  macro: 'get_macro_indicators',
  rates: 'get_policy_rates',
  fx: 'get_exchange_rates',
};

export interface McpDataFetcherOptions {
  callTool: ToolCaller;
  listTools?: () => Promise<Array<{ name: string }>>;
  /** Override tool names per source */
  tools?: Partial<Record<SourceName, string>>;
}

export class McpDataFetcher implements DataFetcher {
  private readonly callTool: ToolCaller;
  private readonly listTools?: () => Promise<Array<{ name: string }>>;
  private readonly tools: Record<SourceName, string>;

  constructor(options: McpDataFetcherOptions) {
    this.callTool = options.callTool;
    this.listTools = options.listTools;
    this.tools = { ...DEFAULT_SOURCE_TOOLS, ...options.tools };
  }

  async fetch(entityId: string, options: FetchOptions): Promise<SourceData> {
    const payloads = await Promise.all(
      SOURCE_NAMES.map((source) => this.fetchSource(source, entityId, options.timeoutMs)),
    );
    const data: SourceData = {};
    SOURCE_NAMES.forEach((source, i) => {
      data[source] = payloads[i];
    });
    return data;
  }

  private async fetchSource(source: SourceName, entityId: string, timeoutMs: number): Promise<unknown> {
    const tool = this.tools[source];
    try {
      const payload = await withTimeout(this.callTool(tool, { entity_id: entityId }), timeoutMs, `${tool}`);
      if (isEmptyPayload(payload)) return null;
      if (isRecord(payload) && typeof payload.error === 'string') {
        log.warn('Source returned an error payload', { source, entityId, error: payload.error });
        return null;
      }
      return payload;
    } catch (err) {
      log.warn('Source fetch failed', { source, entityId, error: errorMessage(err) });
      return null;
    }
  }

  async checkSources(): Promise<SourceAvailability[]> {
    const available = new Set<string>();
    if (this.listTools) {
      for (const tool of await this.listTools()) available.add(tool.name);
    }
    return SOURCE_NAMES.map((source) => ({
      source,
      tool: this.tools[source],
      available: available.has(this.tools[source]),
    }));
  }
}

/** Used when no data server is configured: every source is absent. */
export class NullDataFetcher implements DataFetcher {
  async fetch(): Promise<SourceData> {
    return {};
  }

  async checkSources(): Promise<SourceAvailability[]> {
    return SOURCE_NAMES.map((source) => ({ source, tool: DEFAULT_SOURCE_TOOLS[source], available: false }));
  }
}
