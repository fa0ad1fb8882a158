import * as watcher from '@parcel/watcher';
import { EventEmitter } from 'events';
import * as path from 'path';
import type { WatcherConfig } from '@postpress/types';
import { matchGlob, type FileDiscovery } from './file-discovery.js';

export interface FileWatcherOptions {
  /** ソースルート */
  rootDir: string;
  /** コンテンツファイルの判定に使う（include/exclude・.gitignore） */
  discovery: FileDiscovery;
  /** ファイル監視設定 */
  watcherConfig: WatcherConfig;
  /** 配下のどのファイルが変わっても通知するディレクトリ（レイアウト・インクルード） */
  templateDirs?: string[];
  /** 通知する静的ファイル（glob） */
  assetPatterns?: string[];
  /** 監視しないディレクトリ（出力先など、ソースルートからの相対パス） */
  ignoreDirs?: string[];
}

export interface FileChangeEvent {
  type: 'add' | 'change' | 'unlink';
  /** ソースルートからの相対パス */
  path: string;
  timestamp: Date;
}

const COMMON_IGNORES = ['**/node_modules/**', '**/.git/**', '**/.cache/**'];

/**
 * ファイル監視クラス
 * @parcel/watcherを使用してコンテンツとレイアウトの変更を監視
 */
export class FileWatcher extends EventEmitter {
  private subscription: watcher.AsyncSubscription | null = null;
  private debounceTimers = new Map<string, NodeJS.Timeout>();
  private rootDir: string;
  private discovery: FileDiscovery;
  private watcherConfig: WatcherConfig;
  private templateDirs: string[];
  private assetPatterns: string[];
  private ignoreDirs: string[];

  constructor(options: FileWatcherOptions) {
    super();
    this.rootDir = path.resolve(options.rootDir);
    this.discovery = options.discovery;
    this.watcherConfig = options.watcherConfig;
    this.templateDirs = (options.templateDirs ?? []).map(normalizeDir).filter(Boolean);
    this.assetPatterns = options.assetPatterns ?? [];
    this.ignoreDirs = (options.ignoreDirs ?? []).map(normalizeDir).filter(Boolean);
  }

  /**
   * 監視を開始
   */
  async start(): Promise<void> {
    this.subscription = await watcher.subscribe(
      this.rootDir,
      (err, events) => {
        if (err) {
          this.emit('error', err);
          return;
        }

        for (const event of events) {
          const relativePath = path.relative(this.rootDir, event.path).split(path.sep).join('/');
          if (!this.shouldProcessFile(relativePath)) {
            continue;
          }
          this.handleFileEvent(this.convertEventType(event.type), relativePath);
        }
      },
      {
        ignore: this.buildIgnorePatterns(),
      }
    );

    this.emit('ready');
  }

  /**
   * 監視を停止
   */
  async stop(): Promise<void> {
    for (const timer of this.debounceTimers.values()) {
      clearTimeout(timer);
    }
    this.debounceTimers.clear();

    if (this.subscription) {
      await this.subscription.unsubscribe();
      this.subscription = null;
    }
  }

  /**
   * 通知対象のファイルか判定
   * @param relativePath ソースルートからの相対パス
   */
  shouldProcessFile(relativePath: string): boolean {
    if (relativePath.startsWith('..') || this.isUnder(relativePath, this.ignoreDirs)) {
      return false;
    }
    if (
      relativePath === '.gitignore' ||
      this.isUnder(relativePath, this.templateDirs) ||
      this.assetPatterns.some((pattern) => matchGlob(relativePath, pattern))
    ) {
      return true;
    }
    return !this.discovery.shouldIgnore(relativePath);
  }

  private buildIgnorePatterns(): string[] {
    return [...COMMON_IGNORES, ...this.ignoreDirs.map((dir) => `${dir}/**`)];
  }

  private isUnder(relativePath: string, dirs: string[]): boolean {
    return dirs.some((dir) => relativePath === dir || relativePath.startsWith(`${dir}/`));
  }

  /**
   * @parcel/watcherのイベントタイプを変換
   */
  private convertEventType(type: watcher.EventType): FileChangeEvent['type'] {
    switch (type) {
      case 'create':
        return 'add';
      case 'delete':
        return 'unlink';
      default:
        return 'change';
    }
  }

  /**
   * ファイルイベントを処理（デバウンス付き）
   */
  private handleFileEvent(type: FileChangeEvent['type'], relativePath: string): void {
    const existingTimer = this.debounceTimers.get(relativePath);
    if (existingTimer) {
      clearTimeout(existingTimer);
    }

    const timer = setTimeout(() => {
      this.debounceTimers.delete(relativePath);

      const event: FileChangeEvent = {
        type,
        path: relativePath,
        timestamp: new Date(),
      };

      this.emit('change', event);
    }, this.watcherConfig.debounceMs);

    this.debounceTimers.set(relativePath, timer);
  }
}

function normalizeDir(dir: string): string {
  return dir.replace(/\\/g, '/').replace(/^\.?\/+|\/+$/g, '');
}
