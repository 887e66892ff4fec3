/**
 * @frontport/converter
 * Zola(TOML) → Astro(YAML) フロントマター変換
 */

export { extractFrontMatter } from './frontmatter/extractor.js';
export {
  parseFrontMatter,
  collapseBlankLines,
  type FrontMatterParseResult,
  type ParseFrontMatterOptions,
} from './frontmatter/toml-parser.js';
export { SchemaMapper, type SchemaMapperOptions, type MappingContext } from './mapper/schema-mapper.js';
export { reassembleDocument, serializeMetadata, YAML_DELIMITER } from './reassembler/yaml-reassembler.js';
export { parseDateFromFilename, cleanFilename, formatLocalDate } from './naming/post-filename.js';
export { FileDiscovery, type FileDiscoveryOptions } from './discovery/file-discovery.js';
export { DocumentConverter, type DocumentConverterOptions } from './pipeline/document-converter.js';
export { ConversionRunner, type ConversionRunnerOptions } from './pipeline/conversion-runner.js';
