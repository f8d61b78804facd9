// Uniform invocation for every agent descriptor. Text variants return a
// report; structured variants return a parsed value or the raw reply.

import type {
  AgentContext, AgentDeps, AgentDescriptor, Language, StructuredOutcome,
} from '../types/agents.js';
import type { AgentReport } from '../types/results.js';
import { ConfigError, MalformedOutputError } from '../utils/errors.js';
import { withTimeout } from '../utils/timeout.js';

const LANGUAGE_DIRECTIVES: Record<Language, string> = {
  en: 'Write all narrative text in English.',
  ja: 'Write all narrative text in Japanese. Keep numbers, tickers, JSON keys and source labels exactly as given.',
};

export function localizeInstructions(instructions: string, language: Language): string {
  return `${instructions}\n\n${LANGUAGE_DIRECTIVES[language]}`;
}

/** Free-text completion under the per-task timeout */
export function completeText(
  deps: AgentDeps,
  instructions: string,
  content: string,
  label: string,
): Promise<string> {
  return withTimeout(
    deps.provider.complete(localizeInstructions(instructions, deps.language), content),
    deps.timeoutMs,
    label,
  );
}

/**
 * Structured completion under the per-task timeout. Unrecoverable output is
 * reported as `{ ok: false, raw }`; provider errors and timeouts reject.
 */
export async function completeStructured(
  deps: AgentDeps,
  instructions: string,
  content: string,
  label: string,
): Promise<StructuredOutcome> {
  try {
    const value = await withTimeout(
      deps.provider.completeStructured(localizeInstructions(instructions, deps.language), content),
      deps.timeoutMs,
      label,
    );
    return { ok: true, value };
  } catch (err) {
    if (err instanceof MalformedOutputError) return { ok: false, raw: err.raw };
    throw err;
  }
}

export async function runAgent(
  descriptor: AgentDescriptor,
  ctx: AgentContext,
  deps: AgentDeps,
): Promise<AgentReport> {
  if (descriptor.structured) {
    throw new ConfigError(`${descriptor.kind} produces structured output; use runStructuredAgent`);
  }
  const content = await completeText(deps, descriptor.instructions, descriptor.project(ctx), descriptor.kind);
  return {
    agentKind: descriptor.kind,
    displayName: descriptor.displayName,
    content,
    dataSources: [...descriptor.dataSources],
  };
}

export function runStructuredAgent(
  descriptor: AgentDescriptor,
  ctx: AgentContext,
  deps: AgentDeps,
): Promise<StructuredOutcome> {
  if (!descriptor.structured) {
    return Promise.reject(new ConfigError(`${descriptor.kind} produces free text; use runAgent`));
  }
  return completeStructured(deps, descriptor.instructions, descriptor.project(ctx), descriptor.kind);
}

export function truncate(text: string, limit: number): string {
  return text.length > limit ? text.slice(0, limit) : text;
}

export function dataBlock(value: unknown): string {
  return value === null || value === undefined ? 'Data unavailable' : JSON.stringify(value, null, 2);
}
