import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { executeBuild } from '../build.js';
import { executeIndex } from '../site-index.js';

const SITE: Record<string, string> = {
  '.postpress.json': JSON.stringify({ site: { title: 'Test Blog' } }),
  '_layouts/default.html': '<html>{{ site.title }}:{{ content }}</html>',
  '_layouts/post.html': '---\nlayout: default\n---\n<article>{{ content }}</article>',
  '_layouts/page.html': '---\nlayout: default\n---\n{{ content }}',
  '_layouts/home.html': '---\nlayout: default\n---\n{{ site.posts.size }} posts',
  '_posts/2024-01-01-hello.md': '---\ntitle: Hello\n---\nHi.',
};

describe('build / index コマンド', () => {
  let testDir: string;

  const write = async (relativePath: string, content: string): Promise<void> => {
    const filePath = path.join(testDir, relativePath);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content);
  };

  beforeEach(async () => {
    testDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'postpress-cli-build-')));
    for (const [relativePath, content] of Object.entries(SITE)) {
      await write(relativePath, content);
    }
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('設定ファイルに従ってサイトを出力する', async () => {
    const report = await executeBuild({ cwd: testDir });

    expect(report?.postsRendered).toBe(1);
    expect(process.exitCode).toBeUndefined();
    expect(await fs.readFile(path.join(testDir, '_site', '2024', '01', '01', 'hello.html'), 'utf-8')).toBe(
      '<html>Test Blog:<article><p>Hi.</p>\n</article></html>'
    );
    expect(await fs.readFile(path.join(testDir, '_site', 'index.html'), 'utf-8')).toBe(
      '<html>Test Blog:1 posts</html>'
    );
  });

  it('--outputで出力先を変更できる', async () => {
    await executeBuild({ cwd: testDir, output: 'public' });

    expect(await fs.readFile(path.join(testDir, 'public', 'index.html'), 'utf-8')).toBe('<html>Test Blog:1 posts</html>');
  });

  it('--outputにソースルートを含むディレクトリは指定できない', async () => {
    const report = await executeBuild({ cwd: testDir, output: '..' });

    expect(report).toBeNull();
    expect(process.exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      'Error:',
      `Output directory must not be the source root or contain it: ${path.dirname(testDir)}`
    );
    expect(await fs.readFile(path.join(testDir, '_layouts', 'post.html'), 'utf-8')).toBe(SITE['_layouts/post.html']);
  });

  it('エラーの診断があれば終了コード1', async () => {
    await write('_posts/broken.md', '---\ntitle: x\n');

    const report = await executeBuild({ cwd: testDir });

    expect(report?.postsRendered).toBe(1);
    expect(process.exitCode).toBe(1);
  });

  it('ビルドが失敗したらエラーを表示して終了コード1', async () => {
    await write('_posts/2024-01-02-odd.md', '---\nlayout: nope\n---\nOdd.');

    const report = await executeBuild({ cwd: testDir });

    expect(report).toBeNull();
    expect(process.exitCode).toBe(1);
    expect(console.error).toHaveBeenCalledWith(
      'Error:',
      'Layout "nope" not found (requested by _posts/2024-01-02-odd.md)'
    );
  });

  it('indexはJSONでインデックスを表示する', async () => {
    await executeIndex({ cwd: testDir, format: 'json' });

    expect(console.log).toHaveBeenCalledWith(
      JSON.stringify(
        [
          {
            title: 'Hello',
            date: '2024-01-01',
            url: '/2024/01/01/hello.html',
            path: '_posts/2024-01-01-hello.md',
            categories: [],
            tags: [],
          },
        ],
        null,
        2
      )
    );
  });
});
