/**
 * post new コマンド
 * `_posts/YYYY-MM-DD-<slug>.md`を雛形付きで作成する
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { ConfigLoader, type FrontMatterData } from '@postpress/types';
import { serializeFrontMatter, slugify } from '@postpress/core';

export interface PostNewOptions {
  config?: string;
  /** 記事日付（YYYY-MM-DD、デフォルト: 今日） */
  date?: string;
  categories?: string[];
  tags?: string[];
  layout?: string;
  /** カレントワーキングディレクトリ（テスト用、デフォルト: process.cwd()） */
  cwd?: string;
  /** 現在時刻（テスト用） */
  now?: Date;
}

/**
 * 記事ファイルを作成
 * @returns 作成したファイルの絶対パス
 */
export async function createPost(title: string, options: PostNewOptions = {}): Promise<string> {
  const { config, projectRoot } = await ConfigLoader.resolve({
    configPath: options.config,
    cwd: options.cwd,
  });

  const date = options.date ? parseDateOption(options.date) : startOfUtcDay(options.now ?? new Date());
  const fileName = `${date.toISOString().slice(0, 10)}-${slugify(title) || 'untitled'}.md`;
  const filePath = path.join(projectRoot, config.content.postsDir, fileName);

  const data: FrontMatterData = {
    layout: options.layout,
    title,
    date,
    categories: options.categories?.length ? options.categories : undefined,
    tags: options.tags?.length ? options.tags : undefined,
  };

  await fs.mkdir(path.dirname(filePath), { recursive: true });
  try {
    // wxで既存ファイルを上書きしない
    await fs.writeFile(filePath, serializeFrontMatter(data, ''), { encoding: 'utf-8', flag: 'wx' });
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'EEXIST') {
      throw new Error(`Post already exists: ${filePath}`);
    }
    throw error;
  }

  return filePath;
}

/**
 * post new コマンドを実行
 */
export async function executePostNew(title: string, options: PostNewOptions): Promise<void> {
  try {
    const filePath = await createPost(title, options);
    console.log(`Created ${filePath}`);
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}

function parseDateOption(value: string): Date {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  const date = match ? new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]))) : null;
  if (!match || !date || date.getUTCDate() !== Number(match[3]) || date.getUTCMonth() !== Number(match[2]) - 1) {
    throw new Error(`--date must be a valid YYYY-MM-DD date: ${value}`);
  }
  return date;
}

function startOfUtcDay(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate()));
}
