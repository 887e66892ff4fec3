import { readFile, access, realpath } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { FrontportConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { validateConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .frontport.json > frontport.json
 */
export const CONFIG_FILE_NAMES = ['.frontport.json', 'frontport.json'] as const;

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス
   * @returns 設定オブジェクト（ファイルがなければデフォルト設定）
   */
  static async load(configPath: string): Promise<FrontportConfig> {
    try {
      // ファイルの存在確認
      await access(configPath, constants.F_OK | constants.R_OK);

      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      // バリデーション
      const config = validateConfig(parsed);

      // デフォルト値とマージ
      return this.mergeWithDefaults(config);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return this.getDefaultConfig();
      }
      throw error;
    }
  }

  /**
   * 設定ファイルの探索と読み込み
   * 明示パス > 環境変数FRONTPORT_CONFIG > 自動探索 の順で解決
   */
  static async resolve(
    options: ResolveConfigOptions = {}
  ): Promise<{ config: FrontportConfig; configPath: string | null }> {
    const { configPath: explicitPath, traverseUp = true, cwd = process.cwd() } = options;

    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp);

    const config = configPath
      ? await this.load(configPath)
      : this.getDefaultConfig();

    return { config, configPath };
  }

  /**
   * デフォルト設定を取得
   */
  static getDefaultConfig(): FrontportConfig {
    return structuredClone(DEFAULT_CONFIG);
  }

  /**
   * 設定ファイルを探索
   */
  private static async findConfigFile(
    startDir: string,
    traverseUp: boolean
  ): Promise<string | null> {
    let currentDir = await this.normalizeDir(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          // 次の候補へ
          continue;
        }
      }

      if (!traverseUp || currentDir === root) {
        return null;
      }

      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean
  ): Promise<string | null> {
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    const envPath = process.env.FRONTPORT_CONFIG;
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * ディレクトリを絶対パスにしてシンボリックリンクを解決
   */
  private static async normalizeDir(dir: string): Promise<string> {
    const absolutePath = path.resolve(dir);

    try {
      return await realpath(absolutePath);
    } catch (_error) {
      // 存在しない場合は絶対パスをそのまま返す
      return absolutePath;
    }
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: Partial<FrontportConfig>): FrontportConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      author: config.author ?? DEFAULT_CONFIG.author,
      files: {
        include: config.files?.include ?? DEFAULT_CONFIG.files.include,
        exclude: config.files?.exclude ?? DEFAULT_CONFIG.files.exclude,
      },
      enrichment: {
        model: config.enrichment?.model ?? DEFAULT_CONFIG.enrichment.model,
        apiUrl: config.enrichment?.apiUrl ?? DEFAULT_CONFIG.enrichment.apiUrl,
        timeoutMs: config.enrichment?.timeoutMs ?? DEFAULT_CONFIG.enrichment.timeoutMs,
        delayMs: config.enrichment?.delayMs ?? DEFAULT_CONFIG.enrichment.delayMs,
        maxContentLength:
          config.enrichment?.maxContentLength ?? DEFAULT_CONFIG.enrichment.maxContentLength,
        descriptionMaxTokens:
          config.enrichment?.descriptionMaxTokens ?? DEFAULT_CONFIG.enrichment.descriptionMaxTokens,
        tagsMaxTokens:
          config.enrichment?.tagsMaxTokens ?? DEFAULT_CONFIG.enrichment.tagsMaxTokens,
      },
    };
  }
}
