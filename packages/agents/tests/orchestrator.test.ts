// End-to-end tests for the phase orchestrator with a scripted provider

import { describe, it, expect } from 'vitest';
import { Orchestrator, analyze } from '../orchestrator/index.js';
import type { OrchestratorConfig } from '../orchestrator/index.js';
import type { DomainEventType } from '../types/events.js';
import { ConfigError } from '../utils/errors.js';
import { isRecord } from '../utils/json.js';
import { DEFAULT_DECISION, FakeProvider } from './helpers/fake-provider.js';
import { FailingFetcher, StaticFetcher } from './helpers/fixtures.js';

interface RecordedEvent {
  type: DomainEventType;
  payload: unknown;
}

function setup(provider = new FakeProvider(), overrides: Partial<OrchestratorConfig> = {}) {
  const events: RecordedEvent[] = [];
  const orchestrator = new Orchestrator({
    provider,
    fetcher: new StaticFetcher(),
    settings: { model: 'test-model', taskTimeoutMs: 1000 },
    onEvent: (event) => events.push(event),
    ...overrides,
  });
  return { orchestrator, provider, events };
}

function phasesOf(events: RecordedEvent[], type: DomainEventType): unknown[] {
  return events.filter((e) => e.type === type).map((e) => (isRecord(e.payload) ? e.payload.phase : undefined));
}

const grounded = { fact: 'Close 1,000.00', source: 'PRICE 2026-10-16' };
const invented = { fact: 'GDP grew 3%', source: 'STATS' };

describe('Orchestrator', () => {
  it('runs every phase and assembles a clean result', async () => {
    const { orchestrator, provider, events } = setup();

    const result = await orchestrator.analyze('7203');

    expect(result.phaseErrors).toEqual({});
    expect(result.entityId).toBe('7203');
    expect(result.companyName).toBe('Example Motors');
    expect(result.analystReports).toHaveLength(5);
    expect(result.debate?.rounds).toBe(1);
    expect(result.decision?.action).toBe('BUY');
    expect(result.decision?.confidence).toBe(0.8);
    expect(result.riskReview?.approved).toBe(true);
    expect(result.sourcesUsed).toEqual(['statements', 'disclosures', 'stock_price', 'news', 'rates', 'fx']);
    expect(result.model).toBe('test-model');
    expect(result.rawData.stock_price).toEqual(expect.objectContaining({ close: 1000 }));

    const [traderCall] = provider.callsFor('trader');
    expect(traderCall.content).toContain('**Current Price: 1,000.00**');
    expect(traderCall.content).toContain('## Verified Data Summary');

    expect(events[0].type).toBe('AnalysisRequested');
    expect(events[events.length - 1].type).toBe('AnalysisCompleted');
    expect(phasesOf(events, 'PhaseCompleted')).toEqual(['data', 'analysts', 'debate', 'decision', 'verification', 'review']);
    expect(phasesOf(events, 'PhaseSkipped')).toEqual(['refine']);
  });

  it('continues with empty data when the fetch fails', async () => {
    const { orchestrator, provider } = setup(new FakeProvider(), { fetcher: new FailingFetcher() });

    const result = await orchestrator.analyze('7203');

    expect(result.phaseErrors).toEqual({ data: 'data server unreachable' });
    expect(result.sourcesUsed).toEqual([]);
    expect(result.companyName).toBeNull();
    expect(result.decision?.action).toBe('BUY');
    expect(provider.callsFor('fundamental')[0].content).toContain('Data unavailable');
  });

  it('records a partial analyst failure and keeps the other reports', async () => {
    const { orchestrator } = setup(new FakeProvider({ macro: new Error('rate limited') }));

    const result = await orchestrator.analyze('7203');

    expect(result.analystReports).toHaveLength(4);
    expect(result.phaseErrors).toEqual({ analysts: '1/5 agents failed' });
    expect(result.decision).not.toBeNull();
  });

  it('proceeds to a decision without a debate', async () => {
    const { orchestrator } = setup(new FakeProvider({ bull: new Error('overloaded') }));

    const result = await orchestrator.analyze('7203');

    expect(result.debate).toBeNull();
    expect(result.phaseErrors).toEqual({ debate: 'overloaded' });
    expect(result.decision?.action).toBe('BUY');
  });

  it('skips verification, refine and review when the decision fails', async () => {
    const { orchestrator, provider, events } = setup(new FakeProvider({ trader: new Error('quota exceeded') }));

    const result = await orchestrator.analyze('7203');

    expect(result.decision).toBeNull();
    expect(result.riskReview).toBeNull();
    expect(result.phaseErrors).toEqual({ decision: 'quota exceeded' });
    expect(provider.callsFor('risk')).toHaveLength(0);
    expect(phasesOf(events, 'PhaseSkipped')).toEqual(['verification', 'refine', 'review']);
  });

  it('treats unparseable trader output as a HOLD decision, not a phase error', async () => {
    const { orchestrator, provider } = setup(new FakeProvider({ trader: 'no json here' }));

    const result = await orchestrator.analyze('7203');

    expect(result.decision?.action).toBe('HOLD');
    expect(result.decision?.confidence).toBe(0);
    expect(result.decision?.reasoning).toBe('Parse error: no json here');
    expect(result.phaseErrors).toEqual({});
    expect(provider.callsFor('risk')).toHaveLength(1);
  });

  it('verifies facts, refines, and reviews the refined decision', async () => {
    const provider = new FakeProvider({
      trader: { ...DEFAULT_DECISION, key_facts: [grounded, invented] },
      verifier: { verified_facts: [grounded], corrections: [], removed: ['GDP grew 3%: not in the summary'] },
      refine: { thesis: 'Price sits mid-range with room to the 52-week high.' },
    });
    const { orchestrator } = setup(provider);

    const result = await orchestrator.analyze('7203');

    expect(result.phaseErrors).toEqual({});
    expect(result.decision?.keyFacts).toEqual([grounded]);
    expect(result.decision?.thesis).toBe('Price sits mid-range with room to the 52-week high.');
    expect(result.decision?.action).toBe('BUY');
    expect(provider.callsFor('risk')[0].content).toContain('Price sits mid-range with room to the 52-week high.');
  });

  it('keeps the raw decision when verification fails', async () => {
    const provider = new FakeProvider({
      trader: { ...DEFAULT_DECISION, key_facts: [grounded, invented] },
      verifier: new Error('checker down'),
    });
    const { orchestrator, events } = setup(provider);

    const result = await orchestrator.analyze('7203');

    expect(result.phaseErrors).toEqual({ verification: 'checker down' });
    expect(result.decision?.keyFacts).toEqual([grounded, invented]);
    expect(result.riskReview?.approved).toBe(true);
    expect(provider.callsFor('refine')).toHaveLength(0);
    expect(phasesOf(events, 'PhaseSkipped')).toEqual(['refine']);
  });

  it('keeps the verified decision when refine fails', async () => {
    const provider = new FakeProvider({
      trader: { ...DEFAULT_DECISION, key_facts: [grounded, invented] },
      verifier: { verified_facts: [grounded], removed: ['GDP grew 3%'] },
      refine: new Error('refine timeout'),
    });
    const { orchestrator } = setup(provider);

    const result = await orchestrator.analyze('7203');

    expect(result.phaseErrors).toEqual({ refine: 'refine timeout' });
    expect(result.decision?.keyFacts).toEqual([grounded]);
    expect(result.decision?.thesis).toBe(DEFAULT_DECISION.thesis);
  });

  it('records a review failure and keeps the decision', async () => {
    const { orchestrator } = setup(new FakeProvider({ risk: new Error('review failed') }));

    const result = await orchestrator.analyze('7203');

    expect(result.riskReview).toBeNull();
    expect(result.decision).not.toBeNull();
    expect(result.phaseErrors).toEqual({ review: 'review failed' });
  });

  it('runs only the configured analysts', async () => {
    const { orchestrator } = setup(new FakeProvider(), { analysts: ['technical_analyst'] });

    const result = await orchestrator.analyze('7203');

    expect(result.analystReports.map((r) => r.agentKind)).toEqual(['technical_analyst']);
  });

  it('runs the configured number of debate rounds', async () => {
    const { orchestrator, provider } = setup(new FakeProvider(), { settings: { debateRounds: 3 } });

    const result = await orchestrator.analyze('7203');

    expect(result.debate?.rounds).toBe(3);
    expect(provider.callsFor('bull')).toHaveLength(3);
    expect(provider.callsFor('bear')).toHaveLength(3);
  });

  it('rejects a blank entity id', async () => {
    const { orchestrator, provider } = setup();

    await expect(orchestrator.analyze('  ')).rejects.toBeInstanceOf(ConfigError);
    expect(provider.calls).toHaveLength(0);
  });
});

describe('analyze', () => {
  it('rejects invalid settings with a ConfigError', async () => {
    const config: OrchestratorConfig = {
      provider: new FakeProvider(),
      fetcher: new StaticFetcher(),
      settings: { debateRounds: 5 },
    };

    await expect(analyze('7203', config)).rejects.toThrow(/Invalid settings: debateRounds/);
  });

  it('returns a result for a valid entity', async () => {
    const result = await analyze('7203', { provider: new FakeProvider(), fetcher: new StaticFetcher() });

    expect(result.entityId).toBe('7203');
    expect(result.model).toBe('claude-haiku-4-5-20251001');
  });
});
