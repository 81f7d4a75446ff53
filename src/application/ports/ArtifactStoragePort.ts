import type { BatchArtifactDTO } from '../dto/AnalysisArtifactDTO.js';

export interface ArtifactStoragePort {
  saveBatch(artifact: BatchArtifactDTO): Promise<void>;
  loadBatch(batchId: string): Promise<BatchArtifactDTO | null>;
  listBatchIds(): Promise<string[]>;
}
