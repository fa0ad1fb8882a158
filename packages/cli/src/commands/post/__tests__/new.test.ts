import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { parseFrontMatter } from '@postpress/core';
import { createPost } from '../new.js';

describe('post new', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'postpress-post-new-')));
    await fs.writeFile(path.join(testDir, '.postpress.json'), JSON.stringify({ content: { postsDir: '_articles' } }));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('日付とslugからファイルを作成する', async () => {
    const filePath = await createPost('Hello, World!', {
      cwd: testDir,
      date: '2024-05-01',
      categories: ['swift'],
      tags: ['a', 'b'],
      layout: 'post',
    });

    expect(filePath).toBe(path.join(testDir, '_articles', '2024-05-01-hello-world.md'));

    const { data } = parseFrontMatter(await fs.readFile(filePath, 'utf-8'));
    expect(data).toEqual({
      layout: 'post',
      title: 'Hello, World!',
      date: new Date('2024-05-01T00:00:00.000Z'),
      categories: ['swift'],
      tags: ['a', 'b'],
    });
  });

  it('未指定のキーは書き出さない', async () => {
    const filePath = await createPost('Minimal', { cwd: testDir, date: '2024-05-02' });

    const { data } = parseFrontMatter(await fs.readFile(filePath, 'utf-8'));
    expect(data).toEqual({ title: 'Minimal', date: new Date('2024-05-02T00:00:00.000Z') });
  });

  it('日付を省略すると今日（UTC）を使う', async () => {
    const filePath = await createPost('Today', { cwd: testDir, now: new Date('2024-06-15T23:30:00.000Z') });

    expect(path.basename(filePath)).toBe('2024-06-15-today.md');
  });

  it('slugにできないタイトルはuntitledにする', async () => {
    const filePath = await createPost('非同期処理', { cwd: testDir, date: '2024-05-03' });

    expect(path.basename(filePath)).toBe('2024-05-03-untitled.md');
  });

  it('既存の記事は上書きしない', async () => {
    const filePath = await createPost('Twice', { cwd: testDir, date: '2024-05-04' });

    await expect(createPost('Twice', { cwd: testDir, date: '2024-05-04' })).rejects.toThrow(
      `Post already exists: ${filePath}`
    );
  });

  it('不正な日付はエラー', async () => {
    await expect(createPost('Bad', { cwd: testDir, date: '2024-02-30' })).rejects.toThrow(
      '--date must be a valid YYYY-MM-DD date: 2024-02-30'
    );
  });
});
