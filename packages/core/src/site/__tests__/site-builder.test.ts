import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { ConfigLoader, TemplateNotFoundError, type PostpressConfig } from '@postpress/types';
import { SiteBuilder } from '../site-builder.js';

const FILES: Record<string, string> = {
  '_layouts/default.html': '<html>{{ content }}</html>',
  '_layouts/post.html': '---\nlayout: default\n---\n<article>{{ content }}</article>',
  '_layouts/page.html': '---\nlayout: default\n---\n<main>{{ content }}</main>',
  '_layouts/home.html':
    '---\nlayout: default\n---\n<ul>{% for post in site.posts %}<li>{{ post.title }}</li>{% endfor %}</ul>',
  '_posts/2024-01-01-first.md': '---\ntitle: First\nheader_image: /img/missing.png\n---\nOne.',
  '_posts/2024-02-01-second.md': '---\ntitle: Second\ncategories: swift\n---\nTwo.',
  '_posts/2024-03-01-draft.md': '---\ntitle: Draft\npublished: false\n---\nWIP.',
  '_posts/broken.md': '---\ntitle: x\n',
  'about.md': '---\ntitle: About\n---\nMe.',
  'README.md': '# readme',
  'img/header.png': 'png',
  '_site/stale.html': 'old',
};

describe('SiteBuilder', () => {
  let tmpDir: string;
  let config: PostpressConfig;

  const write = async (relativePath: string, content: string): Promise<void> => {
    const filePath = path.join(tmpDir, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  };

  const read = (relativePath: string): Promise<string> => fs.readFile(path.join(tmpDir, relativePath), 'utf-8');

  beforeEach(async () => {
    tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'postpress-builder-test-')));
    for (const [relativePath, content] of Object.entries(FILES)) {
      await write(relativePath, content);
    }
    config = ConfigLoader.getDefaultConfig();
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('記事・ページ・一覧を出力する', async () => {
    const builder = new SiteBuilder({ config, rootDir: tmpDir, quiet: true });
    const report = await builder.build();

    expect(report).toMatchObject({
      postsRendered: 2,
      pagesRendered: 1,
      indexPagesRendered: 1,
      pagesWritten: 4,
      pagesRemoved: 1,
      assetsCopied: 1,
    });

    expect(await read('_site/2024/01/01/first.html')).toBe('<html><article><p>One.</p>\n</article></html>');
    expect(await read('_site/swift/2024/02/01/second.html')).toBe('<html><article><p>Two.</p>\n</article></html>');
    expect(await read('_site/about.html')).toBe('<html><main><p>Me.</p>\n</main></html>');
    expect(await read('_site/index.html')).toBe('<html><ul><li>Second</li><li>First</li></ul></html>');
    expect(await read('_site/img/header.png')).toBe('png');
    await expect(fs.access(path.join(tmpDir, '_site', 'stale.html'))).rejects.toThrow();
    await expect(fs.access(path.join(tmpDir, '_site', 'README.html'))).rejects.toThrow();
  });

  it('不正なファイル・非公開記事・画像不足を診断に記録する', async () => {
    const builder = new SiteBuilder({ config, rootDir: tmpDir, quiet: true });
    const report = await builder.build();

    expect(report.diagnostics).toEqual([
      {
        severity: 'error',
        code: 'MalformedFrontMatter',
        path: '_posts/broken.md',
        message: 'Malformed front matter in _posts/broken.md: opening "---" has no matching closing "---"',
      },
      {
        severity: 'info',
        code: 'Unpublished',
        path: '_posts/2024-03-01-draft.md',
        message: 'skipped: published is false',
      },
      {
        severity: 'warning',
        code: 'UnresolvedAsset',
        path: '_posts/2024-01-01-first.md',
        message: 'header_image "/img/missing.png" not found',
      },
    ]);
    expect(console.error).toHaveBeenCalledWith(
      '[SiteBuilder] _posts/broken.md: Malformed front matter in _posts/broken.md: opening "---" has no matching closing "---"'
    );
    expect(console.warn).toHaveBeenCalledWith('[SiteBuilder] _posts/2024-01-01-first.md: header_image "/img/missing.png" not found');
  });

  it('内容が変わらなければ再ビルドで書き込まない', async () => {
    const builder = new SiteBuilder({ config, rootDir: tmpDir, quiet: true });
    await builder.build();
    const second = await builder.build();

    expect(second.pagesWritten).toBe(0);
    expect(second.pagesRemoved).toBe(0);
  });

  it('draftsを指定すると非公開記事も出力する', async () => {
    const builder = new SiteBuilder({ config, rootDir: tmpDir, quiet: true });
    const report = await builder.build({ drafts: true });

    expect(report.postsRendered).toBe(3);
    expect(await read('_site/index.html')).toBe('<html><ul><li>Draft</li><li>Second</li><li>First</li></ul></html>');
  });

  it('clean: falseなら古いHTMLを残す', async () => {
    const builder = new SiteBuilder({ config, rootDir: tmpDir, quiet: true });
    const report = await builder.build({ clean: false });

    expect(report.pagesRemoved).toBe(0);
    expect(await read('_site/stale.html')).toBe('old');
  });

  it('出力パスの重複はパス順で後のファイルを落とす', async () => {
    await write('me.md', '---\ntitle: Me\npermalink: /about.html\n---\nDuplicate.');

    const builder = new SiteBuilder({ config, rootDir: tmpDir, quiet: true });
    const report = await builder.build();

    expect(report.pagesRendered).toBe(1);
    expect(report.diagnostics).toContainEqual({
      severity: 'error',
      code: 'DuplicateUrl',
      path: 'me.md',
      message: '/about.html is already produced by about.md',
    });
    expect(await read('_site/about.html')).toBe('<html><main><p>Me.</p>\n</main></html>');
  });

  it('拡張子のないpermalinkは.htmlファイルとして出力し、cleanの対象にする', async () => {
    await write('contact.md', '---\ntitle: Contact\npermalink: /contact\n---\nMail.');
    const builder = new SiteBuilder({ config, rootDir: tmpDir, quiet: true });
    await builder.build();

    expect(await read('_site/contact.html')).toBe('<html><main><p>Mail.</p>\n</main></html>');

    await fs.rm(path.join(tmpDir, 'contact.md'));
    const report = await builder.build();

    expect(report.pagesRemoved).toBe(1);
    await expect(fs.access(path.join(tmpDir, '_site', 'contact.html'))).rejects.toThrow();
  });

  it('一覧ページと同じURLの記事は落とす', async () => {
    await write('index.md', '---\ntitle: Home\n---\nHome.');

    const builder = new SiteBuilder({ config, rootDir: tmpDir, quiet: true });
    const report = await builder.build();

    expect(report.diagnostics).toContainEqual({
      severity: 'error',
      code: 'DuplicateUrl',
      path: 'index.md',
      message: '/index.html is already produced by the post index',
    });
  });

  it('出力先がソースルートかその祖先なら作成時にエラー', async () => {
    config.build.outputDir = '..';
    expect(() => new SiteBuilder({ config, rootDir: tmpDir, quiet: true })).toThrow(
      `Output directory must not be the source root or contain it: ${path.dirname(tmpDir)}`
    );

    config.build.outputDir = '.';
    expect(() => new SiteBuilder({ config, rootDir: tmpDir, quiet: true })).toThrow(
      `Output directory must not be the source root or contain it: ${tmpDir}`
    );

    expect(await read('_layouts/home.html')).toBe(FILES['_layouts/home.html']);
  });

  it('ソースルートの外の出力先は使える', async () => {
    const outside = `${tmpDir}-out`;
    config.build.outputDir = outside;

    try {
      const builder = new SiteBuilder({ config, rootDir: tmpDir, quiet: true });
      await builder.build();

      expect(await fs.readFile(path.join(outside, 'about.html'), 'utf-8')).toBe('<html><main><p>Me.</p>\n</main></html>');
      expect(await read('_layouts/default.html')).toBe('<html>{{ content }}</html>');
    } finally {
      await fs.rm(outside, { recursive: true, force: true });
    }
  });

  it('レイアウトがなければビルド全体が失敗する', async () => {
    await write('_posts/2024-04-01-odd.md', '---\nlayout: nope\n---\nOdd.');

    const builder = new SiteBuilder({ config, rootDir: tmpDir, quiet: true });
    await expect(builder.build()).rejects.toThrow(TemplateNotFoundError);
  });

  it('collectIndexはファイルを書き出さずにインデックスを返す', async () => {
    const builder = new SiteBuilder({ config, rootDir: tmpDir, quiet: true });
    const { index, diagnostics } = await builder.collectIndex();

    expect(index.map((summary) => [summary.title, summary.url])).toEqual([
      ['Second', '/swift/2024/02/01/second.html'],
      ['First', '/2024/01/01/first.html'],
    ]);
    expect(diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['MalformedFrontMatter', 'Unpublished']);
    await expect(fs.access(path.join(tmpDir, '_site', 'index.html'))).rejects.toThrow();
  });

  it('ウォッチが無効なら開始しない', async () => {
    config.watcher.enabled = false;
    const builder = new SiteBuilder({ config, rootDir: tmpDir, quiet: true });

    await expect(builder.watch()).rejects.toThrow('File watching is disabled (config.watcher.enabled is false)');
  });

  it('変更を検出して再ビルドする', async () => {
    config.watcher.debounceMs = 50;
    const builder = new SiteBuilder({ config, rootDir: tmpDir, quiet: true });
    await builder.watch();

    try {
      const rebuilt = new Promise((resolve) => builder.once('build', resolve));
      await write('_posts/2024-05-01-new.md', '---\ntitle: New\n---\nFresh.');
      await rebuilt;

      expect(await read('_site/index.html')).toBe(
        '<html><ul><li>New</li><li>Second</li><li>First</li></ul></html>'
      );
    } finally {
      await builder.stop();
    }
  });
});
