/**
 * config init コマンドのテスト
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { ConfigLoader } from '@postpress/types';
import { initConfig } from '../init.js';

describe('config init', () => {
  let testDir: string;
  let configPath: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'postpress-config-init-'));
    configPath = path.join(testDir, '.postpress.json');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  it('設定ファイルを生成できる', async () => {
    const created = await initConfig({ cwd: testDir });

    expect(created).toBe(configPath);
    const config = JSON.parse(await fs.readFile(configPath, 'utf-8'));

    expect(config.version).toBe('1.0');
    expect(config.site.title).toBe(path.basename(testDir));
    expect(config.build.outputDir).toBe('_site');
    expect(config.content.postsDir).toBe('_posts');
  });

  it('サイトタイトルを指定できる', async () => {
    await initConfig({ cwd: testDir, title: 'Tech Notes' });

    const config = JSON.parse(await fs.readFile(configPath, 'utf-8'));
    expect(config.site.title).toBe('Tech Notes');
  });

  it('既存ファイルがある場合はエラーを投げる', async () => {
    await initConfig({ cwd: testDir });

    await expect(initConfig({ cwd: testDir })).rejects.toThrow('Configuration file already exists');
  });

  it('--forceオプションで既存ファイルを上書きできる', async () => {
    await initConfig({ cwd: testDir, title: 'First' });
    await initConfig({ cwd: testDir, title: 'Second', force: true });

    const config = JSON.parse(await fs.readFile(configPath, 'utf-8'));
    expect(config.site.title).toBe('Second');
  });

  it('生成したファイルはそのまま読み込める', async () => {
    await initConfig({ cwd: testDir, title: 'Blog' });

    const expected = ConfigLoader.getDefaultConfig();
    expected.site.title = 'Blog';
    expect(await ConfigLoader.load(configPath)).toEqual(expected);
  });
});
