/**
 * コマンド定義
 */

import { Command, Option } from 'commander';
import type { ConvertCommandOptions } from './commands/convert.js';
import type { ConfigInitOptions } from './commands/config/init.js';

/**
 * 各コマンドの実処理（テストでは差し替える）
 */
export interface ProgramActions {
  convert(inputDir: string, outputDir: string, options: ConvertCommandOptions): Promise<void>;
  configInit(options: ConfigInitOptions): Promise<void>;
}

export function createProgram(version: string, actions: ProgramActions): Command {
  // グローバルオプション（preSubcommandフックで設定）
  let globalConfigPath: string | undefined;

  const program = new Command();

  program
    .name('frontport')
    .description('Zola (TOML front matter) から Astro (YAML front matter) への変換ツール')
    .version(version)
    .addOption(
      new Option('-c, --config <path>', '設定ファイルのパス')
        .env('FRONTPORT_CONFIG')
    )
    .hook('preSubcommand', (thisCommand) => {
      const opts = thisCommand.opts<{ config?: string }>();
      globalConfigPath = opts.config;
    });

  // convert コマンド（サブコマンド省略時もこれを実行）
  program
    .command('convert', { isDefault: true })
    .description('ディレクトリ内のMarkdownを変換')
    .argument('<input-dir>', '入力ディレクトリ')
    .argument('<output-dir>', '出力ディレクトリ')
    .option('--author <name>', '著者名')
    .option('--anthropic-key <key>', 'Anthropic APIキー（デフォルト: ANTHROPIC_API_KEY）')
    .option('--generate-missing', '不足しているdescription・tagsを生成')
    .option('--dry-run', '変換対象を表示するだけで書き込まない')
    .action((inputDir: string, outputDir: string, options: ConvertCommandOptions) => {
      void actions.convert(inputDir, outputDir, { ...options, config: globalConfigPath });
    });

  // config コマンド
  const configCmd = program
    .command('config')
    .description('設定管理');

  configCmd
    .command('init')
    .description('設定ファイルを初期化')
    .option('--author <name>', 'デフォルトの著者名')
    .option('-f, --force', '既存ファイルを上書き')
    .action((options: ConfigInitOptions) => {
      void actions.configInit(options);
    });

  return program;
}
