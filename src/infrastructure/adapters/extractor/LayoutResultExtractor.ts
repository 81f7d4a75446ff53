import { z } from 'zod';
import type {
  DocumentExtractorPort,
  DocumentSource,
  ExtractedDocument,
} from '../../../application/ports/DocumentExtractorPort.js';
import { ExtractionError } from '../../../domain/errors.js';

const CellSchema = z
  .union([z.string(), z.number(), z.null()])
  .transform((cell) => (cell === null ? '' : String(cell)));

const LayoutResultSchema = z.object({
  text: z.string().default(''),
  tables: z
    .array(
      z.object({
        page: z.number().int().nullish(),
        data: z.array(z.array(CellSchema)),
      }),
    )
    .default([]),
  pages: z.array(z.unknown()).optional(),
  metadata: z.object({ page_count: z.number().int().nonnegative().optional() }).passthrough().default({}),
});

/**
 * Reads a layout result written by an earlier PDF layout pass:
 * `{ text, tables: [{ page, data }], metadata: { page_count } }`.
 */
export class LayoutResultExtractor implements DocumentExtractorPort {
  async extract(source: DocumentSource): Promise<ExtractedDocument> {
    let json: unknown;
    try {
      json = JSON.parse(source.content.toString('utf8'));
    } catch (error) {
      throw new ExtractionError(`${source.fileName} is not valid JSON`, { cause: error });
    }

    const parsed = LayoutResultSchema.safeParse(json);
    if (!parsed.success) {
      throw new ExtractionError(`${source.fileName} is not a layout result: ${parsed.error.message}`);
    }

    const layout = parsed.data;
    if (!layout.text.trim() && layout.tables.length === 0) {
      throw new ExtractionError(`${source.fileName} holds neither text nor tables`);
    }

    return {
      text: layout.text,
      tables: layout.tables.map((table) => ({ page: table.page ?? null, rows: table.data })),
      pageCount: layout.metadata.page_count ?? layout.pages?.length ?? 0,
    };
  }
}
