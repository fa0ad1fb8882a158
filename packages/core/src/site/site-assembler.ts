import * as path from 'path';
import type { Page, Post, PostSummary, PostpressConfig } from '@postpress/types';
import { MarkdownRenderer } from '../markdown/renderer.js';
import { LayoutRegistry } from './layouts.js';
import { TemplateEngine } from './template-engine.js';
import { buildPermalink, urlToOutputPath } from './permalink.js';

export interface SiteAssemblerOptions {
  config: PostpressConfig;
  /** ソースルート */
  rootDir: string;
  renderer?: MarkdownRenderer;
}

/**
 * テンプレートに`site`として渡す集約データ
 */
export interface SiteData {
  /** サイトインデックス（日付降順） */
  posts: PostSummary[];
  /** カテゴリ名 → 記事（日付降順） */
  categories: Record<string, PostSummary[]>;
  /** タグ名 → 記事（日付降順） */
  tags: Record<string, PostSummary[]>;
  /** ビルド時刻 */
  time: Date;
}

/**
 * jekyll-paginate互換のページャ
 */
export interface Paginator {
  posts: PostSummary[];
  page: number;
  per_page: number;
  total_posts: number;
  total_pages: number;
  previous_page: number | null;
  previous_page_path: string | null;
  next_page: number | null;
  next_page_path: string | null;
}

type TemplateScope = Record<string, unknown>;

/**
 * 記事へのレイアウト適用とサイトインデックスの組み立てを行うクラス
 */
export class SiteAssembler {
  readonly layouts: LayoutRegistry;
  private engine: TemplateEngine;
  private renderer: MarkdownRenderer;
  private config: PostpressConfig;

  constructor(options: SiteAssemblerOptions) {
    const rootDir = path.resolve(options.rootDir);
    this.config = options.config;
    this.renderer = options.renderer ?? new MarkdownRenderer();
    this.layouts = new LayoutRegistry({
      layoutsDir: path.join(rootDir, options.config.content.layoutsDir),
    });
    this.engine = new TemplateEngine({
      includesDir: path.join(rootDir, options.config.content.includesDir),
      site: options.config.site,
    });
  }

  /**
   * 記事のURL
   */
  urlFor(post: Post): string {
    return buildPermalink(post, this.config.content.permalink);
  }

  /**
   * 抜粋HTML（フロントマターの`excerpt`を優先）
   */
  excerptFor(post: Post): string {
    if (post.excerpt) {
      return this.renderer.render(post.excerpt);
    }
    return this.renderer.excerpt(post.body, this.config.content.excerptSeparator).html;
  }

  /**
   * サイトインデックスを組み立てる
   * postのみを対象に日付降順（同日はパス昇順）で並べる
   */
  buildIndex(posts: Post[]): PostSummary[] {
    const summaries: PostSummary[] = [];

    for (const post of posts) {
      if (post.kind !== 'post' || post.date === null) {
        continue;
      }
      summaries.push({
        path: post.path,
        title: post.title,
        date: post.date,
        url: this.urlFor(post),
        excerpt: this.excerptFor(post),
        categories: post.categories,
        tags: post.tags,
        headerImage: post.headerImage,
      });
    }

    return summaries.sort(compareSummaries);
  }

  /**
   * インデックスからテンプレート用の集約データを作る
   */
  siteData(index: PostSummary[], time: Date = new Date()): SiteData {
    return {
      posts: index,
      categories: groupBy(index, (summary) => summary.categories),
      tags: groupBy(index, (summary) => summary.tags),
      time,
    };
  }

  /**
   * 記事をHTMLページにする
   * 本文をMarkdownとして変換し、レイアウトチェーンを内側から順に適用する
   */
  async renderPage(post: Post, site: SiteData): Promise<Page> {
    const url = this.urlFor(post);
    const content = this.renderer.render(post.body);

    const page: TemplateScope = {
      ...post.frontMatter,
      title: post.title,
      date: post.date,
      categories: post.categories,
      tags: post.tags,
      header_image: post.headerImage,
      layout: post.layout,
      url,
      path: post.path,
      slug: post.slug,
      kind: post.kind,
      excerpt: this.excerptFor(post),
    };

    const html = await this.applyLayouts(
      post.layout,
      content,
      { site: this.siteScope(site), page },
      post.path
    );

    return { url, outputPath: urlToOutputPath(url), html, sourcePath: post.path };
  }

  /**
   * 一覧ページを描画する
   * `index.perPage`が0なら1ページ、そうでなければ`/page<n>/`に分割する
   */
  async renderIndexPages(site: SiteData): Promise<Page[]> {
    const { layout, perPage } = this.config.index;
    const posts = site.posts;
    const size = perPage > 0 ? perPage : Math.max(posts.length, 1);
    const totalPages = Math.max(1, Math.ceil(posts.length / size));
    const pages: Page[] = [];

    for (let n = 1; n <= totalPages; n++) {
      const url = indexPageUrl(n);
      const paginator: Paginator = {
        posts: posts.slice((n - 1) * size, n * size),
        page: n,
        per_page: perPage,
        total_posts: posts.length,
        total_pages: totalPages,
        previous_page: n > 1 ? n - 1 : null,
        previous_page_path: n > 1 ? indexPageUrl(n - 1) : null,
        next_page: n < totalPages ? n + 1 : null,
        next_page_path: n < totalPages ? indexPageUrl(n + 1) : null,
      };

      const html = await this.applyLayouts(
        layout,
        '',
        {
          site: this.siteScope(site),
          page: { title: this.config.site.title, url, kind: 'index' },
          paginator,
        },
        n === 1 ? 'index' : `index page ${n}`
      );

      pages.push({ url, outputPath: urlToOutputPath(url), html, sourcePath: null });
    }

    return pages;
  }

  /**
   * レイアウトとテンプレートのキャッシュを破棄（再ビルド用）
   */
  clearCache(): void {
    this.layouts.clear();
    this.engine.clear();
  }

  private async applyLayouts(
    layoutName: string | null,
    content: string,
    scope: TemplateScope,
    requestedBy: string
  ): Promise<string> {
    if (layoutName === null) {
      return content;
    }

    const chain = await this.layouts.resolveChain(layoutName, requestedBy);
    let html = content;
    for (const layout of chain) {
      html = await this.engine.render(`layout:${layout.name}`, layout.template, {
        ...scope,
        layout: layout.data,
        content: html,
      });
    }
    return html;
  }

  private siteScope(site: SiteData): TemplateScope {
    return {
      ...this.config.site,
      posts: site.posts,
      categories: site.categories,
      tags: site.tags,
      time: site.time,
    };
  }
}

function indexPageUrl(n: number): string {
  return n === 1 ? '/' : `/page${n}/`;
}

function compareSummaries(a: PostSummary, b: PostSummary): number {
  const byDate = b.date.getTime() - a.date.getTime();
  if (byDate !== 0) {
    return byDate;
  }
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

function groupBy(
  summaries: PostSummary[],
  keys: (summary: PostSummary) => string[]
): Record<string, PostSummary[]> {
  const groups: Record<string, PostSummary[]> = {};
  for (const summary of summaries) {
    for (const key of keys(summary)) {
      (groups[key] ??= []).push(summary);
    }
  }
  return groups;
}
