export interface DocumentSource {
  fileName: string;
  content: Buffer;
}

export interface ExtractedTable {
  page: number | null;
  rows: string[][];
}

export interface ExtractedDocument {
  text: string;
  tables: ExtractedTable[];
  pageCount: number;
}

export interface DocumentExtractorPort {
  extract(source: DocumentSource): Promise<ExtractedDocument>;
}
