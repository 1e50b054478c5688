import { promises as fs, type Dirent } from 'node:fs';
import path from 'node:path';
import { Ajv } from 'ajv';
import { createLogger, type Logger } from '../../logging/src/index.js';
import { atomicWriteJson, isMissingFileError, readJsonMaybe } from '../../state/src/atomic-json.js';
import { resolveTargetArtifactPath } from '../../state/src/paths.js';
import { StorageError, errorMessage } from './errors.js';
import { targetArtifactSchema } from './schemas.js';
import type { CollectionLog, CollectionResult, TargetRecord, TargetResult } from './types.js';

export interface TargetArtifact {
  savedAt: string;
  target: TargetRecord;
  result: TargetResult;
}

export interface MergedResultFile {
  runId: string;
  generatedAt: string;
  targets: Record<string, TargetResult>;
}

const ajv = new Ajv({ allErrors: true, strict: false, allowUnionTypes: true });
const isTargetArtifact = ajv.compile<TargetArtifact>(targetArtifactSchema);

export const RUN_LOG_FILE = 'collection-log.json';
export const MERGED_RESULT_FILE = 'collection-result.json';

/**
 * On-disk layout under `rootDir`:
 * `targets/[<group>/]<id>.json`, `collection-log.json`, `collection-result.json`.
 * Every file is written atomically; each target file is written only by the
 * worker that owns the target.
 */
export class OutputStore {
  private logger: Logger;

  constructor(
    readonly rootDir: string,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('store');
  }

  targetPath(target: TargetRecord): string {
    return resolveTargetArtifactPath({ outputDir: this.rootDir, targetId: target.id, group: target.group });
  }

  get runLogPath(): string {
    return path.join(this.rootDir, RUN_LOG_FILE);
  }

  get mergedResultPath(): string {
    return path.join(this.rootDir, MERGED_RESULT_FILE);
  }

  /** The stored artifact for a target, or null when absent or unusable. */
  async readTargetArtifact(target: TargetRecord): Promise<TargetArtifact | null> {
    const file = this.targetPath(target);
    let parsed: unknown;
    try {
      parsed = await readJsonMaybe(file);
    } catch (err) {
      this.logger.warn(`ignoring unreadable artifact ${file}: ${errorMessage(err)}`);
      return null;
    }
    if (parsed === null) return null;
    if (!isTargetArtifact(parsed) || parsed.result.targetId !== target.id) {
      this.logger.warn(`ignoring malformed artifact ${file}`);
      return null;
    }
    return parsed;
  }

  /** Artifacts with a complete or partial-timeout status are not harvested again. */
  async readResumable(target: TargetRecord): Promise<TargetArtifact | null> {
    const artifact = await this.readTargetArtifact(target);
    if (!artifact || artifact.result.status === 'failed') return null;
    return artifact;
  }

  async writeTargetResult(target: TargetRecord, result: TargetResult, savedAt = new Date()): Promise<string> {
    const file = this.targetPath(target);
    const artifact: TargetArtifact = { savedAt: savedAt.toISOString(), target, result };
    try {
      await atomicWriteJson(file, artifact);
    } catch (err) {
      throw new StorageError(`failed to write ${file}: ${errorMessage(err)}`, { cause: err });
    }
    return file;
  }

  async writeRunLog(log: CollectionLog): Promise<string> {
    await atomicWriteJson(this.runLogPath, log);
    return this.runLogPath;
  }

  async writeMergedResult(runId: string, result: CollectionResult, generatedAt = new Date()): Promise<string> {
    const payload: MergedResultFile = {
      runId,
      generatedAt: generatedAt.toISOString(),
      targets: Object.fromEntries(result),
    };
    await atomicWriteJson(this.mergedResultPath, payload);
    return this.mergedResultPath;
  }

  async readRunLog(): Promise<unknown> {
    return readJsonMaybe(this.runLogPath);
  }

  /** Every valid artifact under `targets/`, in path order. */
  async listArtifacts(): Promise<TargetArtifact[]> {
    const files = await this.collectJsonFiles(path.join(this.rootDir, 'targets'));
    const out: TargetArtifact[] = [];
    for (const file of files.sort()) {
      try {
        const parsed = await readJsonMaybe(file);
        if (isTargetArtifact(parsed)) out.push(parsed);
        else this.logger.warn(`skipping malformed artifact ${file}`);
      } catch (err) {
        this.logger.warn(`skipping unreadable artifact ${file}: ${errorMessage(err)}`);
      }
    }
    return out;
  }

  private async collectJsonFiles(dir: string): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (isMissingFileError(err)) return [];
      throw err;
    }
    const files: string[] = [];
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) files.push(...(await this.collectJsonFiles(full)));
      else if (entry.isFile() && entry.name.endsWith('.json')) files.push(full);
    }
    return files;
  }
}
