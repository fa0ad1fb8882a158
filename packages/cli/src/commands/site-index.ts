/**
 * index コマンド
 * ファイルを書き出さずにサイトインデックスを表示する
 */

import { ConfigLoader } from '@postpress/types';
import { SiteBuilder } from '@postpress/core';
import { formatDiagnostic, formatIndexAsJson, formatIndexAsText } from '../utils/output.js';

export interface IndexCommandOptions {
  config?: string;
  format?: 'text' | 'json';
  drafts?: boolean;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * index コマンドを実行
 */
export async function executeIndex(options: IndexCommandOptions): Promise<void> {
  try {
    const { config, projectRoot } = await ConfigLoader.resolve({
      configPath: options.config,
      cwd: options.cwd,
    });

    const builder = new SiteBuilder({ config, rootDir: projectRoot, quiet: true });
    const { index, diagnostics } = await builder.collectIndex({ drafts: options.drafts });

    for (const diagnostic of diagnostics) {
      if (diagnostic.severity !== 'info') {
        console.error(formatDiagnostic(diagnostic));
      }
    }

    console.log(options.format === 'json' ? formatIndexAsJson(index) : formatIndexAsText(index));
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}
