/**
 * build コマンド
 */

import { ConfigLoader, type BuildReport } from '@postpress/types';
import { SiteBuilder, assertOutputOutsideSource } from '@postpress/core';
import * as path from 'path';
import { formatBuildReport, hasErrors } from '../utils/output.js';

export interface BuildCommandOptions {
  config?: string;
  drafts?: boolean;
  clean?: boolean;
  /** 出力ディレクトリ（カレントディレクトリからの相対） */
  output?: string;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
}

/**
 * build コマンドを実行
 * エラーの診断があれば終了コード1
 */
export async function executeBuild(options: BuildCommandOptions): Promise<BuildReport | null> {
  try {
    const { config, projectRoot } = await ConfigLoader.resolve({
      configPath: options.config,
      cwd: options.cwd,
    });

    if (options.output) {
      // `--output`はカレントディレクトリ基準。ソースルートを含む出力先は拒否する
      const outputDir = path.resolve(options.cwd ?? process.cwd(), options.output);
      assertOutputOutsideSource(projectRoot, outputDir);
      config.build.outputDir = outputDir;
    }

    const builder = new SiteBuilder({ config, rootDir: projectRoot, quiet: true });
    const report = await builder.build({ drafts: options.drafts, clean: options.clean });

    console.log(formatBuildReport(report));
    if (hasErrors(report.diagnostics)) {
      process.exitCode = 1;
    }
    return report;
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
    return null;
  }
}
