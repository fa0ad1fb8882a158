/**
 * ファイルベースのPageStorage実装
 */

import { promises as fs } from 'node:fs';
import { join, dirname, normalize, resolve, sep } from 'node:path';
import { createHash } from 'node:crypto';
import type { Page, PageStorage } from '@postpress/types';

export interface FileStorageOptions {
  /** 出力先のベースディレクトリ */
  basePath: string;
}

/**
 * 出力ディレクトリにHTMLページを書き出すPageStorage
 */
export class FileStorage implements PageStorage {
  private basePath: string;

  constructor(options: FileStorageOptions) {
    this.basePath = resolve(normalize(options.basePath));
  }

  /**
   * ページを保存
   * 既存ファイルと内容が同じ場合は書き込まない
   */
  async save(path: string, page: Page): Promise<boolean> {
    const filePath = this.getFilePath(path);

    const existing = await this.readIfExists(filePath);
    if (existing !== null && this.calculateHash(existing) === this.calculateHash(page.html)) {
      return false;
    }

    await fs.mkdir(dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, page.html, 'utf-8');
    return true;
  }

  /**
   * 保存済みHTMLを取得
   */
  async get(path: string): Promise<string | null> {
    return this.readIfExists(this.getFilePath(path));
  }

  /**
   * ページを削除
   */
  async delete(path: string): Promise<void> {
    const filePath = this.getFilePath(path);

    try {
      await fs.unlink(filePath);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        // 既に存在しない場合はエラーにしない
        return;
      }
      throw error;
    }
  }

  /**
   * すべてのHTMLページのパスを取得（ベースパスからの相対、`/`区切り）
   */
  async list(): Promise<string[]> {
    const paths: string[] = [];

    const walk = async (dir: string): Promise<void> => {
      try {
        const entries = await fs.readdir(dir, { withFileTypes: true });

        for (const entry of entries) {
          const fullPath = join(dir, entry.name);

          if (entry.isDirectory()) {
            await walk(fullPath);
          } else if (entry.isFile() && entry.name.endsWith('.html')) {
            const relativePath = fullPath.slice(this.basePath.length + 1).replace(/\\/g, '/');
            paths.push(relativePath);
          }
        }
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
          return;
        }
        throw error;
      }
    };

    await walk(this.basePath);
    return paths.sort();
  }

  /**
   * ページの存在確認
   */
  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(this.getFilePath(path));
      return true;
    } catch {
      return false;
    }
  }

  /**
   * 相対パスを出力先の絶対パスに変換
   * ベースディレクトリの外を指すパスは拒否する
   */
  private getFilePath(path: string): string {
    const normalizedPath = normalize(path.replace(/\\/g, '/')).replace(/^[/\\]+/, '');
    const filePath = resolve(this.basePath, normalizedPath);

    if (filePath !== this.basePath && !filePath.startsWith(this.basePath + sep)) {
      throw new Error(`Path escapes output directory: ${path}`);
    }

    return filePath;
  }

  private async readIfExists(filePath: string): Promise<string | null> {
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }
  }

  /**
   * 内容のハッシュを計算
   */
  private calculateHash(content: string): string {
    return createHash('sha256').update(content).digest('hex');
  }
}
