import { createRequire } from 'node:module';
import type {
  DocumentExtractorPort,
  DocumentSource,
  ExtractedDocument,
} from '../../../application/ports/DocumentExtractorPort.js';
import { ExtractionError } from '../../../domain/errors.js';

interface PdfParseResult {
  numpages: number;
  text: string;
}

const require = createRequire(import.meta.url);
// the package entry runs a debug self-test when loaded directly; the library file does not
const pdfParse: (data: Buffer) => Promise<PdfParseResult> = require('pdf-parse/lib/pdf-parse.js');

/** Plain text layer of a PDF. pdf-parse does not detect tables, so `tables` stays empty. */
export class PdfTextExtractor implements DocumentExtractorPort {
  async extract(source: DocumentSource): Promise<ExtractedDocument> {
    let result: PdfParseResult;
    try {
      result = await pdfParse(source.content);
    } catch (error) {
      throw new ExtractionError(
        `Failed to read PDF ${source.fileName}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        { cause: error },
      );
    }

    const text = result.text.trim();
    if (!text) {
      throw new ExtractionError(`PDF ${source.fileName} has no text layer`);
    }

    return { text, tables: [], pageCount: result.numpages };
  }
}
