// Portfolio analysis: runs the single-entity pipeline for many entities
// under a concurrency limit and partitions the outcomes.

import pLimit from 'p-limit';
import type { AnalysisResult, PortfolioResult } from '../types/results.js';
import { ConfigError, errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('BatchAnalyzer');

export interface BatchOptions {
  /** Max concurrent entity runs (default: 3) */
  concurrency?: number;
  onProgress?: (progress: BatchProgress) => void;
}

export interface BatchProgress {
  completed: number;
  total: number;
  current: string;
  status: 'running' | 'completed' | 'failed';
  error?: string;
}

export type AnalyzeOne = (entityId: string) => Promise<AnalysisResult>;

export class BatchAnalyzer {
  constructor(
    private readonly analyzeOne: AnalyzeOne,
    private readonly model: string,
  ) {}

  /**
   * Each run holds a limiter slot from start to settlement. A run that
   * rejects lands in failedIds and leaves its siblings untouched, as does
   * a throwing progress callback. Both partitions keep the input order.
   */
  async analyze(entityIds: readonly string[], options: BatchOptions = {}): Promise<PortfolioResult> {
    const { concurrency = 3, onProgress } = options;
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new ConfigError(`concurrency must be a positive integer, got ${concurrency}`);
    }

    const limit = pLimit(concurrency);
    let completed = 0;
    const report = (progress: BatchProgress): void => {
      if (!onProgress) return;
      try {
        onProgress(progress);
      } catch (err) {
        log.warn('Progress callback threw', { entityId: progress.current, error: errorMessage(err) });
      }
    };

    const outcomes = await Promise.all(
      entityIds.map((entityId) =>
        limit(async (): Promise<AnalysisResult | null> => {
          report({ completed, total: entityIds.length, current: entityId, status: 'running' });
          try {
            const result = await this.analyzeOne(entityId);
            completed++;
            report({ completed, total: entityIds.length, current: entityId, status: 'completed' });
            return result;
          } catch (err) {
            const error = errorMessage(err);
            completed++;
            log.error('Entity analysis failed', { entityId, error });
            report({ completed, total: entityIds.length, current: entityId, status: 'failed', error });
            return null;
          }
        }),
      ),
    );

    const results: AnalysisResult[] = [];
    const failedIds: string[] = [];
    outcomes.forEach((outcome, i) => {
      if (outcome) results.push(outcome);
      else failedIds.push(entityIds[i]);
    });

    return {
      entityIds: [...entityIds],
      results,
      failedIds,
      timestamp: new Date().toISOString(),
      model: this.model,
    };
  }
}
