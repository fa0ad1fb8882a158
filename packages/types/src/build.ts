/**
 * ビルド結果・診断の型定義
 */

export type DiagnosticSeverity = 'error' | 'warning' | 'info';

export type DiagnosticCode =
  | 'MalformedFrontMatter'
  | 'UnresolvedAsset'
  | 'Unpublished'
  | 'DuplicateUrl';

export interface BuildDiagnostic {
  severity: DiagnosticSeverity;
  code: DiagnosticCode;
  /** 対象ファイル（サイトルートからの相対パス） */
  path: string;
  message: string;
}

export interface BuildOptions {
  /** 非公開記事（`published: false`）も出力するか */
  drafts?: boolean;
  /** 今回のビルドで生成しなかったHTMLを削除するか */
  clean?: boolean;
}

export interface BuildReport {
  postsRendered: number;
  pagesRendered: number;
  indexPagesRendered: number;
  /** 内容が変わって実際に書き込んだページ数 */
  pagesWritten: number;
  pagesRemoved: number;
  assetsCopied: number;
  diagnostics: BuildDiagnostic[];
  durationMs: number;
}
