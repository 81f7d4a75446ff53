import { mkdir, readdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { BatchArtifactSchema } from '../../../application/dto/AnalysisArtifactDTO.js';
import type { BatchArtifactDTO } from '../../../application/dto/AnalysisArtifactDTO.js';
import type { ArtifactStoragePort } from '../../../application/ports/ArtifactStoragePort.js';

const BATCH_ID = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;
const SUFFIX = '.analysis.json';

const isNotFound = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/** One pretty-printed JSON file per batch: `<dir>/<batchId>.analysis.json`. */
export class FileArtifactStore implements ArtifactStoragePort {
  constructor(private readonly directory: string) {}

  private pathFor(batchId: string): string {
    if (!BATCH_ID.test(batchId)) {
      throw new Error(`Invalid batch id "${batchId}"`);
    }
    return path.join(this.directory, `${batchId}${SUFFIX}`);
  }

  async saveBatch(artifact: BatchArtifactDTO): Promise<void> {
    const target = this.pathFor(artifact.batch_id);
    await mkdir(this.directory, { recursive: true });

    const temporary = `${target}.tmp`;
    await writeFile(temporary, `${JSON.stringify(artifact, null, 2)}\n`, 'utf8');
    await rename(temporary, target);
  }

  async loadBatch(batchId: string): Promise<BatchArtifactDTO | null> {
    if (!BATCH_ID.test(batchId)) {
      return null;
    }

    let raw: string;
    try {
      raw = await readFile(this.pathFor(batchId), 'utf8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
    return BatchArtifactSchema.parse(JSON.parse(raw));
  }

  async listBatchIds(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw error;
    }
    return entries
      .filter((entry) => entry.endsWith(SUFFIX))
      .map((entry) => entry.slice(0, -SUFFIX.length))
      .sort();
  }
}
