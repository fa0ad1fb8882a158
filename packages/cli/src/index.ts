#!/usr/bin/env -S node --import tsx
/**
 * postpress CLI
 */

import { Command, Option } from 'commander';
import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';
import { CONFIG_ENV_VAR } from '@postpress/types';
import { executeBuild, type BuildCommandOptions } from './commands/build.js';
import { executeWatch, type WatchCommandOptions } from './commands/watch.js';
import { executeIndex, type IndexCommandOptions } from './commands/site-index.js';
import { executePostNew, type PostNewOptions } from './commands/post/new.js';
import { initConfig, type ConfigInitOptions } from './commands/config/init.js';

// package.jsonからバージョンを読み込む
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', 'package.json');
const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as {
  version: string;
};

/**
 * グローバル設定（preSubcommandフックで設定）
 */
let globalConfigPath: string | undefined;

const program = new Command();

program
  .name('postpress')
  .description('Markdownブログの静的サイトジェネレータ')
  .version(packageJson.version)
  .addOption(new Option('-c, --config <path>', '設定ファイルのパス').env(CONFIG_ENV_VAR))
  .hook('preSubcommand', (thisCommand) => {
    const opts = thisCommand.opts<{ config?: string }>();
    globalConfigPath = opts.config;
  });

// build コマンド
program
  .command('build')
  .description('サイトをビルド')
  .option('--drafts', '非公開記事（published: false）も出力')
  .option('--clean', '今回生成しなかったHTMLを削除')
  .option('--no-clean', '古いHTMLを残す')
  .option('-o, --output <dir>', '出力ディレクトリ')
  .action(async (options: BuildCommandOptions) => {
    await executeBuild({ ...options, config: globalConfigPath });
  });

// watch コマンド
program
  .command('watch')
  .description('ビルド後、変更を監視して再ビルド')
  .option('--drafts', '非公開記事も出力')
  .action(async (options: WatchCommandOptions) => {
    await executeWatch({ ...options, config: globalConfigPath });
  });

// index コマンド
program
  .command('index')
  .description('サイトインデックスを表示（ファイルは書き出さない）')
  .addOption(new Option('--format <format>', '出力形式').choices(['text', 'json']).default('text'))
  .option('--drafts', '非公開記事も含める')
  .action(async (options: IndexCommandOptions) => {
    await executeIndex({ ...options, config: globalConfigPath });
  });

// post コマンド
const postCmd = program.command('post').description('記事管理');

postCmd
  .command('new')
  .description('記事の雛形を作成')
  .argument('<title>', '記事タイトル')
  .option('--date <date>', '記事日付（YYYY-MM-DD、デフォルト: 今日）')
  .option('--categories <categories...>', 'カテゴリ')
  .option('--tags <tags...>', 'タグ')
  .option('--layout <name>', 'レイアウト名')
  .action(async (title: string, options: PostNewOptions) => {
    await executePostNew(title, { ...options, config: globalConfigPath });
  });

// config コマンド
const configCmd = program.command('config').description('設定管理');

configCmd
  .command('init')
  .description('設定ファイルを初期化')
  .option('--title <title>', 'サイトタイトル')
  .option('-f, --force', '既存ファイルを上書き')
  .action(async (options: ConfigInitOptions) => {
    try {
      await initConfig(options);
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
  });

// コマンドラインを解析
await program.parseAsync(process.argv);
