#!/usr/bin/env node
// signal-desk CLI
//
// Usage:
//   signal-desk analyze 7203                       # one entity, with change detection
//   signal-desk analyze 7203 --lang ja --notify    # Japanese reports, Telegram alert
//   signal-desk portfolio 7203 8306 4502           # batch, bounded concurrency
//   signal-desk check                              # data sources and credentials
//   signal-desk serve                              # MCP server on stdio
//   signal-desk --help                             # usage

import 'dotenv/config';
import { AnthropicProvider } from '../bridge/anthropic-provider.js';
import { McpBridge } from '../bridge/mcp-client.js';
import { McpDataFetcher, NullDataFetcher } from '../bridge/mcp-data-fetcher.js';
import { TelegramNotifier } from '../bridge/telegram-notifier.js';
import { createSnapshotStore, loadRuntimeEnvironment, type RuntimeEnvironment } from '../config/environment.js';
import { loadSettings, type PipelineSettings } from '../config/settings.js';
import type { SnapshotStore } from '../memory/snapshot-store.js';
import { analyze, analyzeMany, type BatchProgress } from '../orchestrator/index.js';
import type { DataFetcher } from '../types/data.js';
import type { DomainEventType } from '../types/events.js';
import type { GenerationProvider } from '../types/provider.js';
import type { AnalysisResult } from '../types/results.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { formatAnalysisMessage, formatPortfolioMessage } from '../utils/notification-format.js';
import { diffResults } from '../utils/snapshot-diff.js';
import { parseCliOptions, type CliOptions } from './cli-options.js';
import { renderAnalysisReport, renderPortfolioReport, type PaintColor } from './report.js';
import { startServer } from './server.js';

// ── ANSI helpers (no chalk dependency) ──────────────────────────────

const isTTY = process.stdout.isTTY ?? false;

const ansi: Record<PaintColor | 'reset', string> = {
  reset: isTTY ? '\x1b[0m' : '',
  bold: isTTY ? '\x1b[1m' : '',
  dim: isTTY ? '\x1b[2m' : '',
  cyan: isTTY ? '\x1b[36m' : '',
  green: isTTY ? '\x1b[32m' : '',
  yellow: isTTY ? '\x1b[33m' : '',
  red: isTTY ? '\x1b[31m' : '',
};

function c(color: PaintColor, text: string): string {
  return `${ansi[color]}${text}${ansi.reset}`;
}

// ── CLI class ───────────────────────────────────────────────────────

class SignalDeskCli {
  private bridge: McpBridge | null = null;
  private readonly runtime: RuntimeEnvironment = loadRuntimeEnvironment();

  async start(): Promise<void> {
    const rawArgs = process.argv.slice(2);

    if (rawArgs.length === 0 || rawArgs[0] === '--help' || rawArgs[0] === '-h') {
      this.printHelp();
      return;
    }

    const command = rawArgs[0];
    const rest = rawArgs.slice(1);

    switch (command) {
      case 'analyze':
        await this.withBridge(() => this.handleAnalyze(parseCliOptions(rest)));
        break;
      case 'portfolio':
        await this.withBridge(() => this.handlePortfolio(parseCliOptions(rest)));
        break;
      case 'check':
        await this.withBridge(() => this.handleCheck());
        break;
      case 'serve':
        await this.handleServe(parseCliOptions(rest));
        break;
      case 'help':
        this.printHelp();
        break;
      default:
        console.error(`Unknown command: ${command}\n`);
        this.printHelp();
        process.exit(1);
    }
  }

  private async withBridge(task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } finally {
      if (this.bridge) await this.bridge.disconnect();
      this.bridge = null;
    }
  }

  // ── Subcommand: analyze ─────────────────────────────────────────

  private async handleAnalyze(options: CliOptions): Promise<void> {
    if (options.help) {
      this.printAnalyzeHelp();
      return;
    }
    const entityId = options.positionals[0];
    if (!entityId) throw new ConfigError('No entity provided. Use "signal-desk analyze --help" for usage.');

    const settings = loadSettings(options.settings);
    const provider = this.createProvider(settings);
    const fetcher = await this.connectFetcher();
    const store = options.snapshot ? createSnapshotStore(this.runtime) : null;

    if (!options.json) {
      console.log(`\n  ${c('bold', 'signal-desk')}  Analysis: ${entityId}`);
      console.log(`  ${c('dim', `Model: ${settings.model} | Debate rounds: ${settings.debateRounds}`)}\n`);
    }

    const prior = store ? await store.load(entityId) : null;
    const result = await analyze(entityId, {
      provider,
      fetcher,
      settings,
      onEvent: options.json ? undefined : (event) => this.printPhase(event),
    });
    const changes = prior ? diffResults(prior, result) : [];
    if (store) await store.save(result);

    if (options.json) {
      console.log(JSON.stringify(result, null, 2));
    } else {
      console.log(`\n${renderAnalysisReport(result, changes, c)}\n`);
    }

    if (options.notify) await this.notify(formatAnalysisMessage(result, changes));
  }

  private printPhase(event: { type: DomainEventType; payload: unknown }): void {
    const payload = typeof event.payload === 'object' && event.payload !== null ? event.payload : {};
    const phase = 'phase' in payload ? String(payload.phase) : '';
    const duration = 'durationMs' in payload ? ` ${c('dim', `${String(payload.durationMs)}ms`)}` : '';
    if (event.type === 'PhaseCompleted') {
      process.stderr.write(`  ${c('green', '✓')} ${phase}${duration}\n`);
    } else if (event.type === 'PhaseFailed') {
      const error = 'error' in payload ? String(payload.error) : 'failed';
      process.stderr.write(`  ${c('red', '✗')} ${phase}${duration} ${c('red', error)}\n`);
    } else if (event.type === 'PhaseSkipped') {
      process.stderr.write(`  ${c('dim', `- ${phase} (skipped)`)}\n`);
    }
  }

  // ── Subcommand: portfolio ───────────────────────────────────────

  private async handlePortfolio(options: CliOptions): Promise<void> {
    if (options.help) {
      this.printPortfolioHelp();
      return;
    }
    const entityIds = [...new Set(options.positionals)];
    if (entityIds.length === 0) throw new ConfigError('No entities provided. Use "signal-desk portfolio --help" for usage.');

    const settings = loadSettings(options.settings);
    const provider = this.createProvider(settings);
    const fetcher = await this.connectFetcher();
    const store = options.snapshot ? createSnapshotStore(this.runtime) : null;

    const priors = new Map<string, AnalysisResult>();
    if (store) {
      for (const entityId of entityIds) {
        const prior = await store.load(entityId);
        if (prior) priors.set(entityId, prior);
      }
    }

    if (!options.json) {
      console.log(`\n  ${c('bold', 'signal-desk')}  Portfolio: ${entityIds.join(', ')}`);
      console.log(`  ${c('dim', `Model: ${settings.model} | Max concurrent: ${settings.maxConcurrent}`)}\n`);
    }

    const portfolio = await analyzeMany(
      entityIds,
      { provider, fetcher, settings },
      settings.maxConcurrent,
      options.json ? undefined : (progress) => this.printProgress(progress),
    );

    const changes: Record<string, string[]> = {};
    for (const result of portfolio.results) {
      const prior = priors.get(result.entityId);
      if (prior) changes[result.entityId] = diffResults(prior, result);
      if (store) await store.save(result);
    }

    if (options.json) {
      console.log(JSON.stringify(portfolio, null, 2));
    } else {
      console.log(`\n${renderPortfolioReport(portfolio, changes, c)}\n`);
    }

    if (options.notify) await this.notify(formatPortfolioMessage(portfolio, changes));
  }

  private printProgress(progress: BatchProgress): void {
    if (progress.status === 'running') return;
    const mark = progress.status === 'completed' ? c('green', '✓') : c('red', '✗');
    const detail = progress.error ? ` ${c('red', progress.error)}` : '';
    process.stderr.write(`  [${progress.completed}/${progress.total}] ${mark} ${progress.current}${detail}\n`);
  }

  // ── Subcommand: check ───────────────────────────────────────────

  private async handleCheck(): Promise<void> {
    const fetcher = await this.connectFetcher();
    const sources = await fetcher.checkSources();

    console.log(`\n  ${c('bold', 'Data sources')}`);
    if (!this.runtime.dataServer) {
      console.log(`  ${c('yellow', 'No data server configured.')} Set SIGNAL_DESK_DATA_SERVER to its launch command.`);
    }
    for (const source of sources) {
      const status = source.available ? c('green', 'available') : c('red', 'unavailable');
      console.log(`    ${source.source.padEnd(14)} ${c('dim', source.tool.padEnd(28))} ${status}`);
    }
    const available = sources.filter((s) => s.available).length;
    console.log(`\n  ${available}/${sources.length} data sources available`);

    console.log(`\n  ${c('bold', 'Credentials')}`);
    console.log(`    ANTHROPIC_API_KEY   ${this.runtime.anthropicApiKey ? c('green', 'set') : c('red', 'missing')}`);
    const telegram = this.runtime.telegramBotToken && this.runtime.telegramChatId;
    console.log(`    Telegram            ${telegram ? c('green', 'configured') : c('dim', 'not configured')}`);
    console.log();
  }

  // ── Subcommand: serve ───────────────────────────────────────────

  private async handleServe(options: CliOptions): Promise<void> {
    const settings = loadSettings(options.settings);
    // Left connected for the lifetime of the server process
    const fetcher = await this.connectFetcher();
    await startServer({
      fetcher,
      settings,
      createProvider: (effective) => this.createProvider(effective),
    });
  }

  // ── Collaborators ───────────────────────────────────────────────

  private createProvider(settings: PipelineSettings): GenerationProvider {
    const apiKey = this.runtime.anthropicApiKey;
    if (!apiKey) {
      throw new ConfigError('ANTHROPIC_API_KEY environment variable is required. Set it with: export ANTHROPIC_API_KEY=...');
    }
    return new AnthropicProvider({
      model: settings.model,
      temperature: settings.temperature,
      maxTokens: settings.maxTokens,
      apiKey,
    });
  }

  private async connectFetcher(): Promise<DataFetcher> {
    const server = this.runtime.dataServer;
    if (!server) return new NullDataFetcher();

    process.stderr.write(`  ${c('dim', 'Connecting to data server...')}\r`);
    const bridge = new McpBridge();
    await bridge.connect(server);
    this.bridge = bridge;
    // Clear the "Connecting..." line
    process.stderr.write('                                        \r');

    return new McpDataFetcher({
      callTool: (name, params) => bridge.callTool(name, params),
      listTools: () => bridge.listTools(),
    });
  }

  private async notify(text: string): Promise<void> {
    const notifier = new TelegramNotifier({
      botToken: this.runtime.telegramBotToken,
      chatId: this.runtime.telegramChatId,
    });
    if (!notifier.isConfigured) {
      console.log(`  ${c('yellow', 'Telegram not configured.')} Set TELEGRAM_BOT_TOKEN and TELEGRAM_CHAT_ID.`);
      return;
    }
    const sent = await notifier.send(text);
    console.log(sent ? `  ${c('green', 'Telegram alert sent.')}` : `  ${c('red', 'Telegram alert failed.')}`);
  }

  // ── Help screens ────────────────────────────────────────────────

  printHelp(): void {
    console.log(`
  ${c('bold', 'signal-desk')}: multi-agent equity research

  ${c('bold', 'Usage:')}
    signal-desk analyze <entity> [options]       Analyze one entity
    signal-desk portfolio <entity...> [options]  Analyze several entities in parallel
    signal-desk check                            Check data sources and credentials
    signal-desk serve                            Start the MCP server on stdio
    signal-desk --help                           Show this help

  ${c('bold', 'Examples:')}
    signal-desk analyze 7203
    signal-desk analyze 7203 --lang ja --debate-rounds 2 --notify
    signal-desk portfolio 7203 8306 4502 --max-concurrent 2
`);
  }

  private printAnalyzeHelp(): void {
    console.log(`
  ${c('bold', 'signal-desk analyze')}: run the research pipeline for one entity

  ${c('bold', 'Usage:')}
    signal-desk analyze <entity> [options]

  ${c('bold', 'Options:')}
    -m, --model <id>              Model identifier
    --debate-rounds <n>           Bull/bear debate rounds, 1-3 (default: 1)
    -l, --lang <en|ja>            Output language (default: en)
    --timeout <ms>                Per-agent timeout (default: 60000)
    --temperature <t>             Sampling temperature, 0-1 (default: 0.2)
    --json                        Print the result as JSON
    --notify                      Send the result to Telegram
    --no-snapshot                 Skip change detection against the last run
    -h, --help                    Show this help

  ${c('bold', 'Environment:')}
    ANTHROPIC_API_KEY             Required.
    SIGNAL_DESK_DATA_SERVER       Command that launches the market-data MCP server.
    SIGNAL_DESK_SNAPSHOT_DIR      Snapshot directory (default: ~/.signal-desk/snapshots).
    TELEGRAM_BOT_TOKEN            Telegram bot token, for --notify.
    TELEGRAM_CHAT_ID              Telegram chat id, for --notify.
`);
  }

  private printPortfolioHelp(): void {
    console.log(`
  ${c('bold', 'signal-desk portfolio')}: analyze several entities in parallel

  ${c('bold', 'Usage:')}
    signal-desk portfolio <entity...> [options]

  ${c('bold', 'Options:')}
    --max-concurrent <n>          Entities analyzed at once, 1-10 (default: 3)
    -m, --model <id>              Model identifier
    -l, --lang <en|ja>            Output language (default: en)
    --timeout <ms>                Per-agent timeout (default: 60000)
    --json                        Print the portfolio result as JSON
    --notify                      Send the summary to Telegram
    --no-snapshot                 Skip change detection against the last run
`);
  }
}

// ── Entry point ─────────────────────────────────────────────────────

const cli = new SignalDeskCli();
cli.start().catch((err) => {
  console.error(`${c('red', 'Error:')} ${errorMessage(err)}`);
  process.exit(1);
});
