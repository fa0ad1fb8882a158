/**
 * 出力ページの型定義
 */

export interface Page {
  /** サイト内URL（`/`始まり） */
  url: string;
  /** 出力ディレクトリからの相対パス */
  outputPath: string;
  /** レイアウト適用後のHTML */
  html: string;
  /** 元ファイルのパス。インデックスページなど生成ページはnull */
  sourcePath: string | null;
}
