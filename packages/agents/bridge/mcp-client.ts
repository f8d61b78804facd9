// MCP client bridge: connects to the market-data tool server over stdio

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { isRecord } from '../utils/json.js';

export interface McpBridgeConfig {
  /** Command that launches the server, e.g. 'node' */
  command: string;
  args?: string[];
  env?: Record<string, string>;
}

export type ToolCaller = (toolName: string, params: Record<string, unknown>) => Promise<unknown>;

export class McpBridge {
  private client: Client;
  private transport: StdioClientTransport | null = null;
  private connected = false;

  constructor() {
    this.client = new Client(
      { name: 'signal-desk', version: '0.1.0' },
      { capabilities: {} },
    );
  }

  async connect(config: McpBridgeConfig): Promise<void> {
    if (this.connected) return;

    this.transport = new StdioClientTransport({
      command: config.command,
      args: config.args ?? [],
      env: config.env,
    });

    await this.client.connect(this.transport);
    this.connected = true;
  }

  async disconnect(): Promise<void> {
    if (!this.connected) return;
    await this.client.close();
    this.connected = false;
  }

  async listTools(): Promise<Array<{ name: string; description?: string }>> {
    if (!this.connected) throw new Error('MCP bridge not connected');
    const result = await this.client.listTools();
    return result.tools.map(t => ({ name: t.name, description: t.description }));
  }

  /** Call a tool; JSON text content is parsed, other text is returned as-is */
  async callTool(toolName: string, params: Record<string, unknown>): Promise<unknown> {
    if (!this.connected) throw new Error('MCP bridge not connected');

    const result: unknown = await this.client.callTool({ name: toolName, arguments: params });
    const text = firstText(result);

    if (isRecord(result) && result.isError === true) {
      throw new Error(`Tool ${toolName} failed: ${text ?? 'unknown error'}`);
    }
    if (text === null) return result;
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  }

  get isConnected(): boolean {
    return this.connected;
  }
}

function firstText(result: unknown): string | null {
  if (!isRecord(result) || !Array.isArray(result.content)) return null;
  for (const item of result.content) {
    if (isRecord(item) && item.type === 'text' && typeof item.text === 'string') return item.text;
  }
  return null;
}

/** Parse a command line such as "node ./server.js --flag" into a bridge config */
export function parseServerCommand(commandLine: string): McpBridgeConfig | null {
  const parts = commandLine.trim().split(/\s+/).filter(Boolean);
  if (parts.length === 0) return null;
  const [command, ...args] = parts;
  return { command, args };
}

/**
 * Create a connected callTool function. The caller owns the bridge and
 * disconnects it when done.
 */
export async function createToolCaller(config: McpBridgeConfig): Promise<{
  callTool: ToolCaller;
  bridge: McpBridge;
}> {
  const bridge = new McpBridge();
  await bridge.connect(config);
  return {
    callTool: (name, params) => bridge.callTool(name, params),
    bridge,
  };
}
