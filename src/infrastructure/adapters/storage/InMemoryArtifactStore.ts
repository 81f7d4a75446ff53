import type { BatchArtifactDTO } from '../../../application/dto/AnalysisArtifactDTO.js';
import type { ArtifactStoragePort } from '../../../application/ports/ArtifactStoragePort.js';

export class InMemoryArtifactStore implements ArtifactStoragePort {
  private readonly batches = new Map<string, BatchArtifactDTO>();

  async saveBatch(artifact: BatchArtifactDTO): Promise<void> {
    this.batches.set(artifact.batch_id, artifact);
  }

  async loadBatch(batchId: string): Promise<BatchArtifactDTO | null> {
    return this.batches.get(batchId) ?? null;
  }

  async listBatchIds(): Promise<string[]> {
    return Array.from(this.batches.keys()).sort();
  }
}
