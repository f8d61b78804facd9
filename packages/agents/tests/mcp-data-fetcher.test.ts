// Tests for McpDataFetcher: per-source tool calls with degradation to null

import { describe, it, expect, vi } from 'vitest';
import { parseServerCommand } from '../bridge/mcp-client.js';
import { DEFAULT_SOURCE_TOOLS, McpDataFetcher, NullDataFetcher } from '../bridge/mcp-data-fetcher.js';

const payloads: Record<string, unknown> = {
  get_financial_statements: { company_name: 'Example Motors' },
  get_disclosures: [],
  get_stock_price: { close: 1000 },
  get_macro_indicators: { error: 'table not found' },
  get_exchange_rates: { rates: { USDJPY: 150.25 } },
};

function scriptedCallTool() {
  return vi.fn(async (tool: string, _params: Record<string, unknown>): Promise<unknown> => {
    if (tool === 'get_news') throw new Error('news backend down');
    if (tool === 'get_policy_rates') return new Promise(() => undefined);
    return payloads[tool] ?? null;
  });
}

describe('McpDataFetcher', () => {
  it('fetches every source and degrades failures to null', async () => {
    const callTool = scriptedCallTool();
    const fetcher = new McpDataFetcher({ callTool });

    const data = await fetcher.fetch('7203', { timeoutMs: 20 });

    expect(data).toEqual({
      statements: { company_name: 'Example Motors' },
      disclosures: null,
      stock_price: { close: 1000 },
      news: null,
      macro: null,
      rates: null,
      fx: { rates: { USDJPY: 150.25 } },
    });
    expect(callTool).toHaveBeenCalledTimes(7);
    expect(callTool).toHaveBeenCalledWith('get_stock_price', { entity_id: '7203' });
  });

  it('uses tool name overrides', async () => {
    const callTool = vi.fn(async (_tool: string, _params: Record<string, unknown>): Promise<unknown> => ({ ok: 1 }));
    const fetcher = new McpDataFetcher({ callTool, tools: { news: 'search_news' } });

    await fetcher.fetch('7203', { timeoutMs: 100 });

    expect(callTool).toHaveBeenCalledWith('search_news', { entity_id: '7203' });
    expect(callTool).not.toHaveBeenCalledWith('get_news', expect.anything());
  });

  it('reports which tools the server exposes', async () => {
    const fetcher = new McpDataFetcher({
      callTool: vi.fn(),
      listTools: async () => [{ name: 'get_stock_price' }, { name: 'get_news' }, { name: 'unrelated' }],
    });

    const sources = await fetcher.checkSources();

    expect(sources.filter((s) => s.available).map((s) => s.source)).toEqual(['stock_price', 'news']);
    expect(sources).toHaveLength(7);
  });

  it('reports nothing available without a tool listing', async () => {
    const sources = await new McpDataFetcher({ callTool: vi.fn() }).checkSources();

    expect(sources.every((s) => !s.available)).toBe(true);
  });
});

describe('NullDataFetcher', () => {
  it('returns no data and no available sources', async () => {
    const fetcher = new NullDataFetcher();

    expect(await fetcher.fetch()).toEqual({});
    const sources = await fetcher.checkSources();
    expect(sources.map((s) => s.tool)).toEqual(Object.values(DEFAULT_SOURCE_TOOLS));
    expect(sources.some((s) => s.available)).toBe(false);
  });
});

describe('parseServerCommand', () => {
  it('splits a command line into command and args', () => {
    expect(parseServerCommand('  node  ./server.js --stdio ')).toEqual({ command: 'node', args: ['./server.js', '--stdio'] });
  });

  it('returns null for a blank line', () => {
    expect(parseServerCommand('   ')).toBeNull();
  });
});
