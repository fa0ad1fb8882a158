import * as path from 'path';
import type { Post } from '@postpress/types';

/**
 * URL用のslugに変換
 * 英数字以外の連続を`-`に置き換え、前後の`-`を除く
 */
export function slugify(text: string): string {
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * 記事のURLを組み立てる
 *
 * パターンで使えるトークン: `:year` `:month` `:day` `:title` `:slug` `:categories`
 * フロントマターの`permalink`があればそれを優先する
 */
export function buildPermalink(post: Post, pattern: string): string {
  if (post.permalink) {
    return normalizeUrl(post.permalink);
  }

  if (post.kind === 'page') {
    return pageUrl(post.path);
  }

  const date = post.date ?? new Date(0);
  const tokens: Record<string, string> = {
    year: String(date.getUTCFullYear()),
    month: String(date.getUTCMonth() + 1).padStart(2, '0'),
    day: String(date.getUTCDate()).padStart(2, '0'),
    title: slugify(post.slug) || post.slug,
    slug: slugify(post.slug) || post.slug,
    categories: post.categories.map(slugify).filter(Boolean).join('/'),
  };

  const url = pattern.replace(/:(year|month|day|title|slug|categories)/g, (_match, name: string) => tokens[name] ?? '');

  return normalizeUrl(url);
}

/**
 * URLを出力ファイルパスに変換
 * `/`で終わるURLは`index.html`を補い、拡張子のないURLは`.html`を付ける
 */
export function urlToOutputPath(url: string): string {
  const relative = url.replace(/^\/+/, '');
  if (relative === '' || relative.endsWith('/')) {
    return `${relative}index.html`;
  }
  if (!path.posix.basename(relative).includes('.')) {
    return `${relative}.html`;
  }
  return relative;
}

/**
 * pageのURL（`about.md` → `/about.html`、`docs/index.md` → `/docs/index.html`）
 */
function pageUrl(sourcePath: string): string {
  const parsed = path.posix.parse(sourcePath);
  const dir = parsed.dir ? `/${parsed.dir}` : '';
  return `${dir}/${parsed.name}.html`;
}

/**
 * 連続スラッシュをまとめ、先頭スラッシュを補う
 */
function normalizeUrl(url: string): string {
  const collapsed = url.replace(/\/{2,}/g, '/');
  return collapsed.startsWith('/') ? collapsed : `/${collapsed}`;
}
