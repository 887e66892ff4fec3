/**
 * @frontport/types
 * frontportの共通型定義
 */

// Metadata values
export type { MetadataValue, MetadataMap, SourceMetadata } from './value.js';
export {
  UnexpectedShapeError,
  describeValue,
  isMetadataMap,
  toMetadataValue,
  hasKey,
  getString,
  getMap,
  getStringList,
} from './value.js';

// Document
export type {
  RawDocument,
  ExtractedFrontMatter,
  TargetMetadata,
  ConversionResult,
  ConversionSummary,
  Logger,
} from './document.js';

// Collaborators
export type {
  TextGenerationBackend,
  MetadataEnricher,
  DocumentWriter,
  RunConfig,
} from './collaborators.js';

// Config
export type {
  FrontportConfig,
  FilesConfig,
  EnrichmentConfig,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  validateConfig,
  type ResolveConfigOptions,
} from './config/index.js';
