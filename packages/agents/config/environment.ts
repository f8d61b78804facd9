// Runtime collaborators resolved from the environment: credentials,
// the market-data server command and the snapshot backend.

import { parseServerCommand, type McpBridgeConfig } from '../bridge/mcp-client.js';
import {
  DEFAULT_SNAPSHOT_DIR, FileSnapshotStore, InMemorySnapshotStore, type SnapshotStore,
} from '../memory/snapshot-store.js';

export type SnapshotBackend = 'file' | 'memory';

export interface RuntimeEnvironment {
  anthropicApiKey: string | null;
  telegramBotToken: string | null;
  telegramChatId: string | null;
  dataServer: McpBridgeConfig | null;
  snapshotBackend: SnapshotBackend;
  snapshotDir: string;
}

function nonEmpty(value: string | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

function getSnapshotBackend(env: NodeJS.ProcessEnv): SnapshotBackend {
  return env.SIGNAL_DESK_SNAPSHOT_BACKEND?.toLowerCase() === 'memory' ? 'memory' : 'file';
}

export function loadRuntimeEnvironment(env: NodeJS.ProcessEnv = process.env): RuntimeEnvironment {
  const serverCommand = nonEmpty(env.SIGNAL_DESK_DATA_SERVER);
  return {
    anthropicApiKey: nonEmpty(env.ANTHROPIC_API_KEY),
    telegramBotToken: nonEmpty(env.TELEGRAM_BOT_TOKEN),
    telegramChatId: nonEmpty(env.TELEGRAM_CHAT_ID),
    dataServer: serverCommand ? parseServerCommand(serverCommand) : null,
    snapshotBackend: getSnapshotBackend(env),
    snapshotDir: nonEmpty(env.SIGNAL_DESK_SNAPSHOT_DIR) ?? DEFAULT_SNAPSHOT_DIR,
  };
}

/**
 * - `file`: one JSON file per entity under snapshotDir (default)
 * - `memory`: process-local, nothing survives the run
 */
export function createSnapshotStore(runtime: RuntimeEnvironment): SnapshotStore {
  switch (runtime.snapshotBackend) {
    case 'memory':
      return new InMemorySnapshotStore();
    case 'file':
    default:
      return new FileSnapshotStore(runtime.snapshotDir);
  }
}
