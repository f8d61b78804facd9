// Snapshot store: the last AnalysisResult per entity, used as the baseline
// for change detection on the next run. Both operations are best-effort.

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { AnalysisResultSchema } from '../schemas/results.js';
import type { AnalysisResult } from '../types/results.js';
import { errorMessage } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('SnapshotStore');

export const DEFAULT_SNAPSHOT_DIR = join(homedir(), '.signal-desk', 'snapshots');

export interface SnapshotStore {
  /** Overwrites any previous snapshot for the entity; failures are logged */
  save(result: AnalysisResult): Promise<void>;
  /** null when there is no readable snapshot */
  load(entityId: string): Promise<AnalysisResult | null>;
}

/** Reversible file name for an entity id: percent-encoded, '.' and '*' included */
export function snapshotFileName(entityId: string): string {
  const encoded = encodeURIComponent(entityId).replace(
    /[.*]/g,
    (ch) => `%${ch.charCodeAt(0).toString(16).toUpperCase()}`,
  );
  return `${encoded}.json`;
}

export class FileSnapshotStore implements SnapshotStore {
  constructor(readonly directory: string = DEFAULT_SNAPSHOT_DIR) {}

  pathFor(entityId: string): string {
    return join(this.directory, snapshotFileName(entityId));
  }

  async save(result: AnalysisResult): Promise<void> {
    const path = this.pathFor(result.entityId);
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(path, JSON.stringify(result, null, 2), 'utf-8');
      log.debug('Snapshot saved', { entityId: result.entityId, path });
    } catch (err) {
      log.warn('Failed to save snapshot', {
        entityId: result.entityId,
        error: errorMessage(err),
      });
    }
  }

  async load(entityId: string): Promise<AnalysisResult | null> {
    const path = this.pathFor(entityId);
    let text: string;
    try {
      text = await readFile(path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return null;
      log.warn('Failed to read snapshot', { entityId, error: errorMessage(err) });
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (err) {
      log.warn('Corrupt snapshot ignored', { entityId, error: errorMessage(err) });
      return null;
    }

    const parsed = AnalysisResultSchema.safeParse(json);
    if (!parsed.success) {
      log.warn('Snapshot failed validation', { entityId, issues: parsed.error.issues.length });
      return null;
    }
    // Case-insensitive file systems can still map two ids to one file.
    if (parsed.data.entityId !== entityId) {
      log.warn('Snapshot belongs to another entity', { entityId, stored: parsed.data.entityId });
      return null;
    }
    return parsed.data;
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class InMemorySnapshotStore implements SnapshotStore {
  private snapshots = new Map<string, AnalysisResult>();

  async save(result: AnalysisResult): Promise<void> {
    this.snapshots.set(result.entityId, result);
  }

  async load(entityId: string): Promise<AnalysisResult | null> {
    return this.snapshots.get(entityId) ?? null;
  }

  get size(): number {
    return this.snapshots.size;
  }
}
