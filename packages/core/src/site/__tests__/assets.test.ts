import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import type { Post } from '@postpress/types';
import { AssetResolver } from '../assets.js';

function createPost(headerImage?: string): Post {
  return {
    path: '_posts/2024-01-01-a.md',
    kind: 'post',
    slug: 'a',
    title: 'A',
    date: new Date(Date.UTC(2024, 0, 1)),
    categories: [],
    tags: [],
    headerImage,
    layout: 'post',
    published: true,
    frontMatter: {},
    body: '',
  };
}

describe('AssetResolver', () => {
  let tmpDir: string;
  let resolver: AssetResolver;

  beforeAll(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'postpress-assets-test-'));
    await fs.mkdir(path.join(tmpDir, 'img'), { recursive: true });
    await fs.mkdir(path.join(tmpDir, 'css'), { recursive: true });
    await fs.mkdir(path.join(tmpDir, '_site', 'img'), { recursive: true });
    await fs.writeFile(path.join(tmpDir, 'img', 'header image.png'), 'png');
    await fs.writeFile(path.join(tmpDir, 'css', 'site.css'), 'body {}');
    await fs.writeFile(path.join(tmpDir, 'notes.txt'), 'not an asset');

    resolver = new AssetResolver({
      rootDir: tmpDir,
      outputDir: path.join(tmpDir, '_site'),
      assets: { include: ['img/**', 'css/**', 'favicon.ico'] },
      baseurl: '/blog',
    });
  });

  afterAll(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('check', () => {
    it('存在する画像は診断なし', async () => {
      expect(await resolver.check(createPost('/blog/img/header%20image.png'))).toBeNull();
      expect(await resolver.check(createPost('img/header image.png'))).toBeNull();
    });

    it('header_imageがなければ診断なし', async () => {
      expect(await resolver.check(createPost())).toBeNull();
    });

    it('外部URLは確認しない', async () => {
      expect(await resolver.check(createPost('https://cdn.example.com/a.png'))).toBeNull();
      expect(await resolver.check(createPost('//cdn.example.com/a.png'))).toBeNull();
    });

    it('見つからない画像は警告を返す', async () => {
      expect(await resolver.check(createPost('/img/missing.png'))).toEqual({
        severity: 'warning',
        code: 'UnresolvedAsset',
        path: '_posts/2024-01-01-a.md',
        message: 'header_image "/img/missing.png" not found',
      });
    });

    it('ディレクトリは画像とみなさない', async () => {
      const diagnostic = await resolver.check(createPost('/img'));
      expect(diagnostic?.code).toBe('UnresolvedAsset');
    });
  });

  describe('copyStatic', () => {
    it('assets.includeのファイルを出力ディレクトリへコピーする', async () => {
      const copied = await resolver.copyStatic();

      expect(copied).toEqual(['css/site.css', 'img/header image.png']);
      expect(await fs.readFile(path.join(tmpDir, '_site', 'css', 'site.css'), 'utf-8')).toBe('body {}');
      await expect(fs.access(path.join(tmpDir, '_site', 'notes.txt'))).rejects.toThrow();
    });
  });
});
