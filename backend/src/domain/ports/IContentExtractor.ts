export interface ExtractedContent {
  text: string;
  importantFiles: number;
  sourceFiles: number;
  truncated: boolean;
}

export interface IContentExtractor {
  /**
   * Build a bounded text representation of a checked-out repository.
   * Throws ExtractionError when nothing readable is found.
   */
  extract(repositoryPath: string): Promise<ExtractedContent>;
}

export const CONTENT_EXTRACTOR = Symbol('IContentExtractor');
