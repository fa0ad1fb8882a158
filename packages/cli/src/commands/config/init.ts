/**
 * config init コマンド
 * 設定ファイルを生成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigLoader, type PostpressConfig } from '@postpress/types';

export interface ConfigInitOptions {
  /** サイトタイトル（デフォルト: ディレクトリ名） */
  title?: string;
  /** 既存ファイルを上書き */
  force?: boolean;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * デフォルト設定オブジェクトを生成
 */
function createDefaultConfig(options: { title: string }): PostpressConfig {
  const config = ConfigLoader.getDefaultConfig();
  config.site.title = options.title;
  return config;
}

/**
 * config init コマンドを実行
 * @returns 作成したファイルのパス
 */
export async function initConfig(options: ConfigInitOptions = {}): Promise<string> {
  const cwd = options.cwd ?? process.cwd();
  const configPath = path.join(cwd, '.postpress.json');

  console.log('Initializing postpress configuration...\n');

  // 既存ファイルチェック
  const exists = await fs.access(configPath).then(
    () => true,
    () => false
  );
  if (exists) {
    if (!options.force) {
      throw new Error(
        `Configuration file already exists: ${configPath}\n` + 'Use --force to overwrite the existing file.'
      );
    }
    console.log('Overwriting existing configuration file...\n');
  }

  const config = createDefaultConfig({ title: options.title ?? path.basename(path.resolve(cwd)) });

  await fs.writeFile(configPath, JSON.stringify(config, null, 2) + '\n', 'utf-8');

  console.log('Configuration file created successfully!\n');
  console.log(`File:   ${configPath}`);
  console.log(`Title:  ${config.site.title}`);
  console.log(`Output: ${config.build.outputDir}\n`);
  console.log('Next steps:');
  console.log('  1. Review and customize .postpress.json');
  console.log(`  2. Add layouts under ${config.content.layoutsDir}/ (default, post, page, ${config.index.layout})`);
  console.log('  3. Write a post: postpress post new "My first post"');
  console.log('  4. Build the site: postpress build\n');

  return configPath;
}
