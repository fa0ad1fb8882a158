/**
 * watch コマンド
 * ビルド後、変更のたびに再ビルドする（SIGINT/SIGTERMで終了）
 */

import { ConfigLoader, type BuildReport } from '@postpress/types';
import { SiteBuilder } from '@postpress/core';
import { formatBuildReport } from '../utils/output.js';

export interface WatchCommandOptions {
  config?: string;
  drafts?: boolean;
}

/**
 * watch コマンドを実行
 */
export async function executeWatch(options: WatchCommandOptions): Promise<void> {
  try {
    const { config, projectRoot } = await ConfigLoader.resolve({ configPath: options.config });

    const builder = new SiteBuilder({ config, rootDir: projectRoot, quiet: true });
    builder.on('build', (report: BuildReport) => {
      console.log(formatBuildReport(report));
    });

    const shutdown = () => {
      console.log('\nStopping watcher...');
      builder.stop().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('Error:', error instanceof Error ? error.message : String(error));
          process.exit(1);
        }
      );
    };

    process.on('SIGINT', shutdown);
    process.on('SIGTERM', shutdown);

    const report = await builder.watch({ drafts: options.drafts });
    console.log(formatBuildReport(report));
    console.log(`Watching ${projectRoot} (Ctrl+C to stop)`);
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exit(1);
  }
}
