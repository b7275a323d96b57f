export {
  RepositoryContentExtractor,
  ExtractorOptions,
  DEFAULT_MAX_SOURCE_FILES,
  DEFAULT_MAX_EXTRACTED_CHARS,
  TRUNCATION_MARKER,
} from './RepositoryContentExtractor';
