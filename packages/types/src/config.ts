/**
 * 設定ファイルの型定義
 */

export interface PostpressConfig {
  version: string;
  site: SiteConfig;
  project: ProjectConfig;
  files: FilesConfig;
  content: ContentConfig;
  index: IndexConfig;
  build: BuildConfig;
  assets: AssetsConfig;
  watcher: WatcherConfig;
}

/**
 * テンプレートに`site`として渡されるサイト情報
 */
export interface SiteConfig {
  title: string;
  description: string;
  /** 公開URL（例: https://example.github.io） */
  url: string;
  /** サブパス（例: /blog）。末尾スラッシュなし */
  baseurl: string;
  author: string;
}

export interface ProjectConfig {
  /** ソースルート（設定ファイルからの相対パス） */
  root: string;
}

export interface FilesConfig {
  /** 含めるファイルパターン（glob） */
  include: string[];
  /** 除外するファイルパターン（glob） */
  exclude: string[];
  /** .gitignoreを尊重するか */
  ignoreGitignore: boolean;
}

export interface ContentConfig {
  /** 記事ディレクトリ。ここ以下のMarkdownがpostになる */
  postsDir: string;
  /** レイアウトディレクトリ */
  layoutsDir: string;
  /** `{% include %}`で読み込むパーシャルのディレクトリ */
  includesDir: string;
  /** 記事のパーマリンクパターン */
  permalink: string;
  /** 抜粋の区切り文字列 */
  excerptSeparator: string;
  /** フロントマターにlayoutがない場合のレイアウト */
  defaultLayouts: {
    post: string;
    page: string;
  };
}

export interface IndexConfig {
  /** 一覧ページのレイアウト */
  layout: string;
  /** 1ページあたりの記事数（0はページ分割なし） */
  perPage: number;
}

export interface BuildConfig {
  /** 出力ディレクトリ（ソースルートからの相対パス） */
  outputDir: string;
  /** ファイル単位の最大並行処理数 */
  concurrency: number;
  /** 古い出力HTMLを削除するか */
  clean: boolean;
  /** 非公開記事も出力するか */
  drafts: boolean;
}

export interface AssetsConfig {
  /** そのまま出力へコピーする静的ファイル（glob） */
  include: string[];
}

export interface WatcherConfig {
  /** ファイル監視を有効にするか */
  enabled: boolean;
  /** デバウンス時間（ミリ秒） */
  debounceMs: number;
}

/** デフォルト設定 */
export const DEFAULT_CONFIG: PostpressConfig = {
  version: '1.0',
  site: {
    title: '',
    description: '',
    url: '',
    baseurl: '',
    author: '',
  },
  project: {
    root: '.',
  },
  files: {
    include: ['**/*.md', '**/*.markdown'],
    exclude: ['**/node_modules/**', '**/.git/**', 'README.md'],
    ignoreGitignore: true,
  },
  content: {
    postsDir: '_posts',
    layoutsDir: '_layouts',
    includesDir: '_includes',
    permalink: '/:categories/:year/:month/:day/:title.html',
    excerptSeparator: '<!--more-->',
    defaultLayouts: {
      post: 'post',
      page: 'page',
    },
  },
  index: {
    layout: 'home',
    perPage: 0,
  },
  build: {
    outputDir: '_site',
    concurrency: 4,
    clean: true,
    drafts: false,
  },
  assets: {
    include: ['img/**', 'css/**', 'js/**', 'fonts/**', 'favicon.ico'],
  },
  watcher: {
    enabled: true,
    debounceMs: 300,
  },
};
