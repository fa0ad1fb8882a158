import { EventEmitter } from 'events';
import * as path from 'path';
import type {
  BuildDiagnostic,
  BuildOptions,
  BuildReport,
  Page,
  PageStorage,
  Post,
  PostSummary,
  PostpressConfig,
} from '@postpress/types';
import { FileStorage } from '@postpress/storage';
import { FileDiscovery } from '../discovery/file-discovery.js';
import { FileWatcher, type FileChangeEvent } from '../discovery/file-watcher.js';
import { PostLoader } from '../content/post-loader.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import { AssetResolver } from './assets.js';
import { SiteAssembler } from './site-assembler.js';

export interface SiteBuilderOptions {
  config: PostpressConfig;
  /** ソースルート */
  rootDir: string;
  /** 出力先（省略時は`build.outputDir`へのFileStorage） */
  storage?: PageStorage;
  /** 進捗ログを出さない */
  quiet?: boolean;
}

export interface IndexResult {
  index: PostSummary[];
  diagnostics: BuildDiagnostic[];
}

interface CollectResult {
  posts: Post[];
  diagnostics: BuildDiagnostic[];
}

/**
 * ソースツリーから静的サイトを生成するクラス
 *
 * イベント:
 * - `build` (report): ウォッチ中の再ビルド完了
 * - `buildError` (error): ウォッチ中の再ビルド失敗
 */
export class SiteBuilder extends EventEmitter {
  private config: PostpressConfig;
  private rootDir: string;
  private outputDir: string;
  private storage: PageStorage;
  private quiet: boolean;
  private discovery: FileDiscovery;
  private loader: PostLoader;
  private assembler: SiteAssembler;
  private assets: AssetResolver;
  private watcher: FileWatcher | null = null;
  private rebuilding: Promise<void> | null = null;
  private rebuildPending = false;

  constructor(options: SiteBuilderOptions) {
    super();
    const { config } = options;
    this.config = config;
    this.rootDir = path.resolve(options.rootDir);
    this.outputDir = path.resolve(this.rootDir, config.build.outputDir);
    assertOutputOutsideSource(this.rootDir, this.outputDir);
    this.storage = options.storage ?? new FileStorage({ basePath: this.outputDir });
    this.quiet = options.quiet ?? false;

    this.discovery = new FileDiscovery({
      rootDir: this.rootDir,
      config: config.files,
      excludeDirs: [
        this.outputRelative(),
        config.content.layoutsDir,
        config.content.includesDir,
        'node_modules',
      ],
    });
    this.loader = new PostLoader({ rootDir: this.rootDir, content: config.content });
    this.assembler = new SiteAssembler({ config, rootDir: this.rootDir });
    this.assets = new AssetResolver({
      rootDir: this.rootDir,
      outputDir: this.outputDir,
      assets: config.assets,
      baseurl: config.site.baseurl,
    });
  }

  /**
   * サイトを1回ビルド
   * レイアウト未検出・循環はビルド全体を失敗させる
   */
  async build(options: BuildOptions = {}): Promise<BuildReport> {
    const startedAt = Date.now();
    const clean = options.clean ?? this.config.build.clean;
    this.assembler.clearCache();

    const { posts, diagnostics } = await this.collect(options.drafts ?? this.config.build.drafts);

    for (const post of posts) {
      const diagnostic = await this.assets.check(post);
      if (diagnostic) {
        diagnostics.push(diagnostic);
      }
    }

    // インデックスは描画前に一度だけ作り、全レイアウトから`site.posts`として参照させる
    const site = this.assembler.siteData(this.assembler.buildIndex(posts));

    const rendered = await mapWithConcurrency(posts, this.config.build.concurrency, async (post) => ({
      post,
      page: await this.assembler.renderPage(post, site),
    }));
    const indexPages = await this.assembler.renderIndexPages(site);

    const claimed = new Map<string, Page>();
    for (const page of indexPages) {
      claimed.set(page.outputPath, page);
    }

    let postsRendered = 0;
    let pagesRendered = 0;
    for (const { post, page } of rendered) {
      const existing = claimed.get(page.outputPath);
      if (existing) {
        diagnostics.push({
          severity: 'error',
          code: 'DuplicateUrl',
          path: post.path,
          message: `${page.url} is already produced by ${existing.sourcePath ?? 'the post index'}`,
        });
        continue;
      }
      claimed.set(page.outputPath, page);
      if (post.kind === 'post') {
        postsRendered++;
      } else {
        pagesRendered++;
      }
    }

    let pagesWritten = 0;
    for (const [outputPath, page] of claimed) {
      if (await this.storage.save(outputPath, page)) {
        pagesWritten++;
      }
    }

    const copied = await this.assets.copyStatic();

    let pagesRemoved = 0;
    if (clean) {
      const keep = new Set([...claimed.keys(), ...copied]);
      for (const stale of await this.storage.list()) {
        if (!keep.has(stale)) {
          await this.storage.delete(stale);
          pagesRemoved++;
        }
      }
    }

    const report: BuildReport = {
      postsRendered,
      pagesRendered,
      indexPagesRendered: indexPages.length,
      pagesWritten,
      pagesRemoved,
      assetsCopied: copied.length,
      diagnostics,
      durationMs: Date.now() - startedAt,
    };

    this.logReport(report);
    return report;
  }

  /**
   * ファイルを書き出さずにサイトインデックスだけを作る
   */
  async collectIndex(options: BuildOptions = {}): Promise<IndexResult> {
    const { posts, diagnostics } = await this.collect(options.drafts ?? this.config.build.drafts);
    return { index: this.assembler.buildIndex(posts), diagnostics };
  }

  /**
   * ビルド後、変更を監視して再ビルドする
   * @returns 初回ビルドの結果
   */
  async watch(options: BuildOptions = {}): Promise<BuildReport> {
    if (!this.config.watcher.enabled) {
      throw new Error('File watching is disabled (config.watcher.enabled is false)');
    }

    const report = await this.build(options);

    this.watcher = new FileWatcher({
      rootDir: this.rootDir,
      discovery: this.discovery,
      watcherConfig: this.config.watcher,
      templateDirs: [this.config.content.layoutsDir, this.config.content.includesDir],
      assetPatterns: this.config.assets.include,
      ignoreDirs: [this.outputRelative()],
    });

    this.watcher.on('change', (event: FileChangeEvent) => {
      this.log(`File ${event.type}: ${event.path}`);
      this.scheduleRebuild(options);
    });

    this.watcher.on('error', (error: Error) => {
      console.error('[SiteBuilder] File watcher error:', error);
    });

    await this.watcher.start();
    this.log(`Watching ${this.rootDir}`);

    return report;
  }

  /**
   * 監視を停止（実行中の再ビルドは完了を待つ）
   */
  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.stop();
      this.watcher = null;
    }
    this.rebuildPending = false;
    if (this.rebuilding) {
      await this.rebuilding;
    }
  }

  /**
   * 探索・読み込み・非公開記事の除外
   */
  private async collect(drafts: boolean): Promise<CollectResult> {
    const files = await this.discovery.findFiles();
    const { posts, diagnostics } = await this.loader.loadAll(files, this.config.build.concurrency);

    const visible: Post[] = [];
    for (const post of posts) {
      if (!post.published && !drafts) {
        diagnostics.push({
          severity: 'info',
          code: 'Unpublished',
          path: post.path,
          message: 'skipped: published is false',
        });
        continue;
      }
      visible.push(post);
    }

    return { posts: visible, diagnostics };
  }

  /**
   * 再ビルド中の変更は1回の追加ビルドにまとめる
   */
  private scheduleRebuild(options: BuildOptions): void {
    if (this.rebuilding) {
      this.rebuildPending = true;
      return;
    }
    this.rebuilding = this.runRebuilds(options).finally(() => {
      this.rebuilding = null;
    });
  }

  private async runRebuilds(options: BuildOptions): Promise<void> {
    do {
      this.rebuildPending = false;
      try {
        const report = await this.build(options);
        this.emit('build', report);
      } catch (error) {
        console.error('[SiteBuilder] Rebuild failed:', error instanceof Error ? error.message : error);
        this.emit('buildError', error);
      }
    } while (this.rebuildPending);
  }

  private logReport(report: BuildReport): void {
    for (const diagnostic of report.diagnostics) {
      const line = `[SiteBuilder] ${diagnostic.path}: ${diagnostic.message}`;
      if (diagnostic.severity === 'error') {
        console.error(line);
      } else if (diagnostic.severity === 'warning') {
        console.warn(line);
      } else {
        this.log(`${diagnostic.path}: ${diagnostic.message}`);
      }
    }

    this.log(
      `Built ${report.postsRendered} posts, ${report.pagesRendered} pages and ` +
        `${report.indexPagesRendered} index pages in ${report.durationMs}ms ` +
        `(${report.pagesWritten} written, ${report.pagesRemoved} removed, ${report.assetsCopied} assets)`
    );
  }

  private log(message: string): void {
    if (!this.quiet) {
      console.log(`[SiteBuilder] ${message}`);
    }
  }

  private outputRelative(): string {
    return path.relative(this.rootDir, this.outputDir).split(path.sep).join('/');
  }
}

/**
 * 出力先がソースルート自身かその祖先なら例外
 * cleanが出力先の`.html`を削除するため、ソースを含むディレクトリは出力先にできない
 */
export function assertOutputOutsideSource(rootDir: string, outputDir: string): void {
  const fromOutput = path.relative(path.resolve(outputDir), path.resolve(rootDir));
  const outside = fromOutput === '..' || fromOutput.startsWith(`..${path.sep}`) || path.isAbsolute(fromOutput);
  if (!outside) {
    throw new Error(`Output directory must not be the source root or contain it: ${path.resolve(outputDir)}`);
  }
}
