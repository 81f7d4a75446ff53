import path from 'node:path';
import type {
  DocumentExtractorPort,
  DocumentSource,
  ExtractedDocument,
} from '../../../application/ports/DocumentExtractorPort.js';
import { ExtractionError } from '../../../domain/errors.js';

/** Picks an extractor by file extension (`.pdf`, `.json`, ...). */
export class RoutingDocumentExtractor implements DocumentExtractorPort {
  private readonly routes: ReadonlyMap<string, DocumentExtractorPort>;

  constructor(routes: Record<string, DocumentExtractorPort>) {
    this.routes = new Map(Object.entries(routes).map(([extension, extractor]) => [extension.toLowerCase(), extractor]));
  }

  supports(fileName: string): boolean {
    return this.routes.has(path.extname(fileName).toLowerCase());
  }

  async extract(source: DocumentSource): Promise<ExtractedDocument> {
    const extension = path.extname(source.fileName).toLowerCase();
    const extractor = this.routes.get(extension);
    if (!extractor) {
      throw new ExtractionError(
        `No extractor for ${source.fileName}; supported: ${[...this.routes.keys()].join(', ')}`,
      );
    }
    return extractor.extract(source);
  }
}
