import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import { minimatch } from 'minimatch';
import type { Ignore } from 'ignore';
import type { FilesConfig } from '@postpress/types';

// ignoreパッケージのファクトリ関数をdynamic importで使用
let ignoreFactory: (() => Ignore) | null = null;

export interface FileDiscoveryOptions {
  /** ソースルート */
  rootDir: string;
  /** ファイル検索設定 */
  config: FilesConfig;
  /** 追加で除外するディレクトリ（ソースルートからの相対パス。出力先など） */
  excludeDirs?: string[];
}

/**
 * コンテンツファイルの検索クラス
 * Globパターンと.gitignoreを使用してMarkdownファイルを検索
 */
export class FileDiscovery {
  private rootDir: string;
  private config: FilesConfig;
  private exclude: string[];
  private ignoreFilter: Ignore | null = null;

  constructor(options: FileDiscoveryOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.config = options.config;
    this.exclude = [
      ...options.config.exclude,
      ...(options.excludeDirs ?? [])
        .map((dir) => dir.replace(/\\/g, '/').replace(/^\.?\/+|\/+$/g, ''))
        .filter((dir) => dir !== '' && !dir.startsWith('..'))
        .map((dir) => `${dir}/**`),
    ];
  }

  /**
   * ファイルを検索
   * @returns 見つかったファイルのパス一覧（ソースルートからの相対パス、昇順）
   */
  async findFiles(): Promise<string[]> {
    if (this.config.ignoreGitignore) {
      await this.loadGitignore();
    }

    const files = await fg(this.config.include, {
      cwd: this.rootDir,
      ignore: this.exclude,
      absolute: false,
      onlyFiles: true,
      dot: false,
    });

    const filter = this.ignoreFilter;
    const visible = filter ? files.filter((file) => !filter.ignores(file)) : files;
    return visible.sort();
  }

  /**
   * パスがinclude/excludeパターンに合致するか判定
   * @param filePath ファイルパス（相対パス）
   */
  matchesPattern(filePath: string): boolean {
    if (!this.config.include.some((pattern) => matchGlob(filePath, pattern))) {
      return false;
    }
    return !this.exclude.some((pattern) => matchGlob(filePath, pattern));
  }

  /**
   * パスを除外すべきか判定
   * @param filePath ファイルパス（相対パス）
   */
  shouldIgnore(filePath: string): boolean {
    if (this.config.ignoreGitignore && this.ignoreFilter?.ignores(filePath)) {
      return true;
    }
    return !this.matchesPattern(filePath);
  }

  /**
   * .gitignoreを読み込む
   */
  private async loadGitignore(): Promise<void> {
    // 削除・編集された.gitignoreを反映するため毎回読み直す
    this.ignoreFilter = null;
    try {
      if (!ignoreFactory) {
        const ignoreModule = await import('ignore');
        ignoreFactory = ignoreModule.default as unknown as () => Ignore;
      }

      const content = await fs.readFile(path.join(this.rootDir, '.gitignore'), 'utf-8');
      this.ignoreFilter = ignoreFactory().add(content);
    } catch (error) {
      // .gitignoreが存在しない場合は無視
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }
  }
}

/**
 * minimatchはfast-globと異なり`**\/pattern`がルートレベルにマッチしないので両方を確認する
 */
export function matchGlob(filePath: string, pattern: string): boolean {
  if (pattern.startsWith('**/')) {
    return minimatch(filePath, pattern) || minimatch(filePath, pattern.slice(3));
  }
  return minimatch(filePath, pattern);
}
