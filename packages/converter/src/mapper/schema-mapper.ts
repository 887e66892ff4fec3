import {
  getMap,
  getString,
  getStringList,
  type Logger,
  type MetadataEnricher,
  type SourceMetadata,
  type TargetMetadata,
} from '@frontport/types';

export interface SchemaMapperOptions {
  /** メタデータ補完（補完しない場合はNoopEnricher） */
  enricher: MetadataEnricher;
  logger?: Logger;
}

export interface MappingContext {
  /** 公開日（YYYY-MM-DD） */
  pubDate: string;
  /** 著者名 */
  author: string;
  /** 本文（補完のプロンプトに使う） */
  body: string;
}

/**
 * Zola形式のフロントマターをAstro形式にマッピングするクラス
 */
export class SchemaMapper {
  private enricher: MetadataEnricher;
  private logger: Logger;

  constructor(options: SchemaMapperOptions) {
    this.enricher = options.enricher;
    this.logger = options.logger ?? console;
  }

  /**
   * マッピング
   * @throws UnexpectedShapeError 値の形が想定と異なる場合
   */
  async map(source: SourceMetadata, context: MappingContext): Promise<TargetMetadata> {
    // 必須フィールド（この順で出力される）
    const target: TargetMetadata = {
      title: getString(source, 'title') ?? '',
      pubDate: context.pubDate,
      author: context.author,
    };

    const description = await this.resolveDescription(source, target.title, context.body);
    if (description) {
      target.description = description;
    }

    const tags = await this.resolveTags(source, target.title, context.body);
    if (tags.length > 0) {
      target.tags = tags;
    }

    return target;
  }

  /**
   * description: extra.lead > description > 生成
   */
  private async resolveDescription(
    source: SourceMetadata,
    title: string,
    body: string
  ): Promise<string | undefined> {
    const extra = getMap(source, 'extra');
    const lead = extra ? getString(extra, 'lead', 'extra.lead') : undefined;
    const description = lead !== undefined ? lead : getString(source, 'description');

    if (description) {
      return description;
    }

    const generated = await this.enricher.suggestDescription(body, title);
    if (generated) {
      this.logger.log(`Generated description: ${generated}`);
      return generated;
    }

    return undefined;
  }

  /**
   * tags: taxonomies.tags ∪ taxonomies.categories、なければ生成。昇順・重複なし
   */
  private async resolveTags(source: SourceMetadata, title: string, body: string): Promise<string[]> {
    const tags = new Set<string>();

    const taxonomies = getMap(source, 'taxonomies');
    if (taxonomies) {
      for (const tag of getStringList(taxonomies, 'tags', 'taxonomies.tags') ?? []) {
        tags.add(tag);
      }
      for (const category of getStringList(taxonomies, 'categories', 'taxonomies.categories') ?? []) {
        tags.add(category);
      }
    }

    if (tags.size === 0) {
      const generated = await this.enricher.suggestTags(body, title);
      if (generated.length > 0) {
        generated.forEach((tag) => tags.add(tag));
        this.logger.log(`Generated tags: ${generated.join(', ')}`);
      }
    }

    return Array.from(tags).sort();
  }
}
