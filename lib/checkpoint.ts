/**
 * Checkpoint Store
 *
 * One JSON snapshot per institution and phase: `<dir>/<institution>_<phase>.json`.
 * A missing or unreadable snapshot is reported as "no checkpoint".
 */

import { mkdir, readFile, rename, rm, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PIPELINE_PHASES, type CheckpointExtra, type CheckpointSnapshot, type FacultyRecord, type PipelinePhase } from '../types/faculty';
import { PIPELINE_VERSION } from './config';
import { getErrorMessage } from './errors';
import { logger } from './monitoring';
import { checkpointSnapshotSchema } from './schemas/faculty';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export function phaseIndex(phase: PipelinePhase): number {
  return PIPELINE_PHASES.indexOf(phase);
}

export class CheckpointStore {
  readonly institution: string;

  constructor(
    private readonly directory: string,
    institution: string
  ) {
    this.institution = institution.trim().toLowerCase().replace(/\s+/g, '_');
  }

  pathFor(phase: PipelinePhase): string {
    return join(this.directory, `${this.institution}_${phase}.json`);
  }

  async save(phase: PipelinePhase, records: FacultyRecord[], extra: CheckpointExtra = {}): Promise<string> {
    await mkdir(this.directory, { recursive: true });

    const snapshot = {
      phase,
      timestamp: new Date().toISOString(),
      institution: this.institution,
      version: PIPELINE_VERSION,
      count: records.length,
      records,
      extra,
    };

    const path = this.pathFor(phase);
    const tempPath = `${path}.tmp`;
    await writeFile(tempPath, JSON.stringify(snapshot, null, 2), 'utf-8');
    await rename(tempPath, path);

    logger.info('Checkpoint saved', { phase, records: records.length, path });
    return path;
  }

  /** Returns null when the snapshot is missing or cannot be parsed. */
  async load(phase: PipelinePhase): Promise<CheckpointSnapshot | null> {
    const path = this.pathFor(phase);

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) return null;
      logger.warn('Checkpoint unreadable, ignoring it', { phase, path, error: getErrorMessage(error) });
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      logger.warn('Checkpoint is not valid JSON, ignoring it', { phase, path, error: getErrorMessage(error) });
      return null;
    }

    const parsed = checkpointSnapshotSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('Checkpoint failed validation, ignoring it', {
        phase,
        path,
        issues: parsed.error.issues.slice(0, 3).map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
      return null;
    }
    if (parsed.data.phase !== phase) {
      logger.warn('Checkpoint phase does not match its file name, ignoring it', { phase, path });
      return null;
    }

    logger.info('Checkpoint loaded', { phase, records: parsed.data.records.length });
    return parsed.data;
  }

  async exists(phase: PipelinePhase): Promise<boolean> {
    try {
      await stat(this.pathFor(phase));
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  /** Most advanced phase with a snapshot file on disk. */
  async latestCompletedPhase(): Promise<PipelinePhase | null> {
    for (const phase of [...PIPELINE_PHASES].reverse()) {
      if (await this.exists(phase)) return phase;
    }
    return null;
  }

  /**
   * Most advanced snapshot that actually loads. A corrupt snapshot is skipped
   * in favour of the one before it.
   */
  async loadLatest(): Promise<CheckpointSnapshot | null> {
    for (const phase of [...PIPELINE_PHASES].reverse()) {
      if (!(await this.exists(phase))) continue;
      const snapshot = await this.load(phase);
      if (snapshot) return snapshot;
    }
    return null;
  }

  /** Delete every snapshot for this institution. Returns the number removed. */
  async clear(): Promise<number> {
    let removed = 0;
    for (const phase of PIPELINE_PHASES) {
      if (await this.exists(phase)) {
        await rm(this.pathFor(phase));
        removed++;
        logger.info('Deleted checkpoint', { phase });
      }
    }
    return removed;
  }
}
