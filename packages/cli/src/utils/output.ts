/**
 * 出力フォーマットユーティリティ
 */

import type { BuildDiagnostic, BuildReport, PostSummary } from '@postpress/types';

/**
 * ビルド結果の要約をテキストで出力
 */
export function formatBuildReport(report: BuildReport): string {
  const counts = countBySeverity(report.diagnostics);
  const lines = [
    `Built ${report.postsRendered} posts, ${report.pagesRendered} pages, ${report.indexPagesRendered} index pages (${report.durationMs}ms)`,
    `  Written: ${report.pagesWritten}  Removed: ${report.pagesRemoved}  Assets: ${report.assetsCopied}`,
  ];

  if (report.diagnostics.length > 0) {
    lines.push(`  Errors: ${counts.error}  Warnings: ${counts.warning}  Skipped: ${counts.info}`);
  }

  return lines.join('\n');
}

/**
 * 診断1件を1行で出力
 */
export function formatDiagnostic(diagnostic: BuildDiagnostic): string {
  return `${diagnostic.severity}: ${diagnostic.path}: ${diagnostic.message} [${diagnostic.code}]`;
}

/**
 * ビルドを失敗扱いにすべき診断があるか
 */
export function hasErrors(diagnostics: BuildDiagnostic[]): boolean {
  return diagnostics.some((diagnostic) => diagnostic.severity === 'error');
}

/**
 * サイトインデックスをテキストで出力（日付・URL・タイトル）
 */
export function formatIndexAsText(index: PostSummary[]): string {
  if (index.length === 0) {
    return 'No posts';
  }

  return index
    .map((summary) => `${summary.date.toISOString().slice(0, 10)}  ${summary.url}  ${summary.title}`)
    .join('\n');
}

/**
 * サイトインデックスをJSONで出力
 */
export function formatIndexAsJson(index: PostSummary[]): string {
  return JSON.stringify(
    index.map((summary) => ({
      title: summary.title,
      date: summary.date.toISOString().slice(0, 10),
      url: summary.url,
      path: summary.path,
      categories: summary.categories,
      tags: summary.tags,
    })),
    null,
    2
  );
}

function countBySeverity(diagnostics: BuildDiagnostic[]): Record<BuildDiagnostic['severity'], number> {
  const counts = { error: 0, warning: 0, info: 0 };
  for (const diagnostic of diagnostics) {
    counts[diagnostic.severity]++;
  }
  return counts;
}
