/**
 * 記事データの型定義
 */

/** 記事の種別。postはサイトインデックスに載り、pageは単独ページとして出力される */
export type PostKind = 'post' | 'page';

/** パース済みのフロントマター（未知のキーもそのまま保持） */
export type FrontMatterData = Record<string, unknown>;

/**
 * 認識済みキーを正規化したフロントマター
 */
export interface RecognizedFrontMatter {
  /** レイアウト名。nullはレイアウトなし（`layout: none`） */
  layout?: string | null;
  title?: string;
  date?: Date;
  categories: string[];
  tags: string[];
  /** `header_image`キー */
  headerImage?: string;
  published: boolean;
  permalink?: string;
  /** 明示的な抜粋（Markdown） */
  excerpt?: string;
}

export interface Post {
  /** サイトルートからの相対パス（キー） */
  path: string;
  kind: PostKind;
  /** 日付プレフィックスと拡張子を除いたファイル名 */
  slug: string;
  title: string;
  /** 記事日付（UTC）。pageでは省略可 */
  date: Date | null;
  categories: string[];
  tags: string[];
  headerImage?: string;
  /** 適用するレイアウト名。nullはレイアウトなし */
  layout: string | null;
  published: boolean;
  permalink?: string;
  excerpt?: string;
  /** 元のフロントマター全体 */
  frontMatter: FrontMatterData;
  /** フロントマターを除いたMarkdown本文 */
  body: string;
}

/**
 * サイトインデックスの1エントリ
 */
export interface PostSummary {
  path: string;
  title: string;
  date: Date;
  url: string;
  /** 抜粋（HTML） */
  excerpt: string;
  categories: string[];
  tags: string[];
  headerImage?: string;
}
