import { readFile } from 'fs/promises';
import * as path from 'path';
import {
  MalformedFrontMatterError,
  type BuildDiagnostic,
  type ContentConfig,
  type Post,
  type PostKind,
} from '@postpress/types';
import { parseFrontMatter, normalizeFrontMatter } from './front-matter.js';
import { mapWithConcurrency } from '../utils/concurrency.js';

export interface PostLoaderOptions {
  /** ソースルート */
  rootDir: string;
  content: ContentConfig;
}

export interface LoadResult {
  /** 読み込みに成功した記事（入力順） */
  posts: Post[];
  /** フロントマター不正で読み込めなかったファイルの診断 */
  diagnostics: BuildDiagnostic[];
}

/** `YYYY-MM-DD-slug`形式のファイル名 */
const DATED_FILE_NAME = /^(\d{4})-(\d{2})-(\d{2})-(.+)$/;

/**
 * Markdownファイルを読み込んでPostを組み立てるクラス
 */
export class PostLoader {
  private rootDir: string;
  private content: ContentConfig;

  constructor(options: PostLoaderOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.content = options.content;
  }

  /**
   * ファイルを読み込む
   * @param relativePath ソースルートからの相対パス
   */
  async load(relativePath: string): Promise<Post> {
    const raw = await readFile(path.join(this.rootDir, relativePath), 'utf-8');
    return this.parse(relativePath, raw);
  }

  /**
   * 複数ファイルを並行して読み込む
   * フロントマター不正のファイルは診断に記録し、他のファイルの処理を続ける
   */
  async loadAll(relativePaths: string[], concurrency: number): Promise<LoadResult> {
    const diagnostics: BuildDiagnostic[] = [];

    const loaded = await mapWithConcurrency(relativePaths, concurrency, async (relativePath) => {
      try {
        return await this.load(relativePath);
      } catch (error) {
        if (error instanceof MalformedFrontMatterError) {
          diagnostics.push({
            severity: 'error',
            code: 'MalformedFrontMatter',
            path: relativePath,
            message: error.message,
          });
          return null;
        }
        throw error;
      }
    });

    return {
      posts: loaded.filter((post): post is Post => post !== null),
      diagnostics: diagnostics.sort((a, b) => a.path.localeCompare(b.path)),
    };
  }

  /**
   * ファイル内容からPostを組み立てる
   */
  parse(relativePath: string, raw: string): Post {
    const postPath = relativePath.replace(/\\/g, '/');
    const { data, body } = parseFrontMatter(raw, postPath);
    const fm = normalizeFrontMatter(data, postPath);

    const kind = this.classify(postPath);
    const baseName = path.posix.basename(postPath, path.posix.extname(postPath));
    const dated = parseDatedFileName(baseName);
    const slug = dated?.slug ?? baseName;

    const date = fm.date ?? dated?.date ?? null;
    if (kind === 'post' && date === null) {
      throw new MalformedFrontMatterError(
        postPath,
        'post has no date: add a "date" key or a YYYY-MM-DD- file name prefix'
      );
    }

    const categories = [...this.directoryCategories(postPath)];
    for (const category of fm.categories) {
      if (!categories.includes(category)) {
        categories.push(category);
      }
    }

    return {
      path: postPath,
      kind,
      slug,
      title: fm.title ?? titleize(slug),
      date,
      categories,
      tags: fm.tags,
      headerImage: fm.headerImage,
      layout: fm.layout === undefined ? this.content.defaultLayouts[kind] : fm.layout,
      published: fm.published,
      permalink: fm.permalink,
      excerpt: fm.excerpt,
      frontMatter: data,
      body,
    };
  }

  /**
   * postsDir配下ならpost、それ以外はpage
   */
  private classify(postPath: string): PostKind {
    const segments = postPath.split('/');
    return segments.slice(0, -1).includes(this.content.postsDir) ? 'post' : 'page';
  }

  /**
   * `swift/_posts/x.md`のようにpostsDirより上のディレクトリをカテゴリとして扱う
   */
  private directoryCategories(postPath: string): string[] {
    const segments = postPath.split('/');
    const index = segments.indexOf(this.content.postsDir);
    return index > 0 ? segments.slice(0, index) : [];
  }
}

function parseDatedFileName(baseName: string): { date: Date; slug: string } | null {
  const match = DATED_FILE_NAME.exec(baseName);
  if (!match) {
    return null;
  }

  const [, year, month, day, slug] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));

  // 2024-02-30のような存在しない日付は無視
  if (date.getUTCMonth() !== Number(month) - 1 || date.getUTCDate() !== Number(day)) {
    return null;
  }

  return { date, slug };
}

/**
 * slugからタイトルを生成（`async-await` → `Async Await`）
 */
function titleize(slug: string): string {
  return slug
    .split(/[-_\s]+/)
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
