import { readFile, access, realpath } from 'fs/promises';
import { constants } from 'fs';
import * as path from 'path';
import type { PostpressConfig } from '../config.js';
import { DEFAULT_CONFIG } from '../config.js';
import { validateConfig } from './validator.js';

/**
 * Config解決オプション
 */
export interface ResolveConfigOptions {
  /** 明示的に指定された設定ファイルパス */
  configPath?: string;
  /** 親ディレクトリを遡って探索するか（デフォルト: true） */
  traverseUp?: boolean;
  /** カレントワーキングディレクトリ（デフォルト: process.cwd()） */
  cwd?: string;
}

export interface ResolvedConfig {
  config: PostpressConfig;
  configPath: string | null;
  /** ソースルート（絶対パス） */
  projectRoot: string;
}

/**
 * 設定ファイル名の候補
 * 優先順位: .postpress.json > postpress.json
 */
export const CONFIG_FILE_NAMES = ['.postpress.json', 'postpress.json'] as const;

/** 設定ファイルパスを指定する環境変数 */
export const CONFIG_ENV_VAR = 'POSTPRESS_CONFIG';

export class ConfigLoader {
  /**
   * 設定ファイルを読み込む
   * @param configPath 設定ファイルのパス
   * @returns デフォルト値とマージした設定
   */
  static async load(configPath: string = './.postpress.json'): Promise<PostpressConfig> {
    try {
      await access(configPath, constants.F_OK | constants.R_OK);

      const content = await readFile(configPath, 'utf-8');
      const parsed: unknown = JSON.parse(content);

      const config = validateConfig(parsed);

      return this.mergeWithDefaults(config);
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        // ファイルが存在しない場合はデフォルト設定を返す
        return this.getDefaultConfig();
      }
      throw error;
    }
  }

  /**
   * 統一されたConfig解決
   * - 設定ファイルの自動探索
   * - 設定の読み込み
   * - ソースルートの決定（project.rootは設定ファイルからの相対）
   */
  static async resolve(options: ResolveConfigOptions = {}): Promise<ResolvedConfig> {
    const { configPath: explicitPath, traverseUp = true, cwd = process.cwd() } = options;

    const configPath = await this.resolveConfigPath(explicitPath, cwd, traverseUp);

    const config = configPath ? await this.load(configPath) : this.getDefaultConfig();
    const baseDir = configPath ? path.dirname(path.resolve(configPath)) : path.resolve(cwd);
    const projectRoot = await this.normalizeProjectRoot(path.resolve(baseDir, config.project.root));

    return { config, configPath, projectRoot };
  }

  /**
   * デフォルト設定を取得（呼び出し側での変更が共有されないようコピーを返す）
   */
  static getDefaultConfig(): PostpressConfig {
    return this.mergeWithDefaults({});
  }

  /**
   * 設定ファイルを探索
   */
  private static async findConfigFile(startDir: string, traverseUp: boolean): Promise<string | null> {
    let currentDir = path.resolve(startDir);
    const root = path.parse(currentDir).root;

    while (true) {
      for (const fileName of CONFIG_FILE_NAMES) {
        const configPath = path.join(currentDir, fileName);

        try {
          await access(configPath);
          return configPath;
        } catch {
          // ファイルが存在しない、次を試す
          continue;
        }
      }

      if (!traverseUp || currentDir === root) {
        return null;
      }

      currentDir = path.dirname(currentDir);
    }
  }

  /**
   * 設定ファイルパスを解決
   * 1. 明示的に指定されたパス
   * 2. 環境変数 POSTPRESS_CONFIG
   * 3. 自動探索
   */
  private static async resolveConfigPath(
    explicitPath: string | undefined,
    cwd: string,
    traverseUp: boolean
  ): Promise<string | null> {
    if (explicitPath) {
      return path.resolve(cwd, explicitPath);
    }

    const envPath = process.env[CONFIG_ENV_VAR];
    if (envPath) {
      return path.resolve(cwd, envPath);
    }

    return await this.findConfigFile(cwd, traverseUp);
  }

  /**
   * プロジェクトルートを正規化
   * - シンボリックリンクを解決
   * - 末尾のスラッシュを削除
   */
  private static async normalizeProjectRoot(root: string): Promise<string> {
    try {
      const realPath = await realpath(root);
      return realPath.replace(/\/$/, '');
    } catch (_error) {
      // ディレクトリが存在しない場合は絶対パスをそのまま返す
      return root.replace(/\/$/, '');
    }
  }

  /**
   * 設定とデフォルト値をマージ
   */
  private static mergeWithDefaults(config: Partial<PostpressConfig>): PostpressConfig {
    return {
      version: config.version ?? DEFAULT_CONFIG.version,
      site: {
        title: config.site?.title ?? DEFAULT_CONFIG.site.title,
        description: config.site?.description ?? DEFAULT_CONFIG.site.description,
        url: config.site?.url ?? DEFAULT_CONFIG.site.url,
        baseurl: config.site?.baseurl ?? DEFAULT_CONFIG.site.baseurl,
        author: config.site?.author ?? DEFAULT_CONFIG.site.author,
      },
      project: {
        root: config.project?.root ?? DEFAULT_CONFIG.project.root,
      },
      files: {
        include: [...(config.files?.include ?? DEFAULT_CONFIG.files.include)],
        exclude: [...(config.files?.exclude ?? DEFAULT_CONFIG.files.exclude)],
        ignoreGitignore: config.files?.ignoreGitignore ?? DEFAULT_CONFIG.files.ignoreGitignore,
      },
      content: {
        postsDir: config.content?.postsDir ?? DEFAULT_CONFIG.content.postsDir,
        layoutsDir: config.content?.layoutsDir ?? DEFAULT_CONFIG.content.layoutsDir,
        includesDir: config.content?.includesDir ?? DEFAULT_CONFIG.content.includesDir,
        permalink: config.content?.permalink ?? DEFAULT_CONFIG.content.permalink,
        excerptSeparator: config.content?.excerptSeparator ?? DEFAULT_CONFIG.content.excerptSeparator,
        defaultLayouts: {
          post: config.content?.defaultLayouts?.post ?? DEFAULT_CONFIG.content.defaultLayouts.post,
          page: config.content?.defaultLayouts?.page ?? DEFAULT_CONFIG.content.defaultLayouts.page,
        },
      },
      index: {
        layout: config.index?.layout ?? DEFAULT_CONFIG.index.layout,
        perPage: config.index?.perPage ?? DEFAULT_CONFIG.index.perPage,
      },
      build: {
        outputDir: config.build?.outputDir ?? DEFAULT_CONFIG.build.outputDir,
        concurrency: config.build?.concurrency ?? DEFAULT_CONFIG.build.concurrency,
        clean: config.build?.clean ?? DEFAULT_CONFIG.build.clean,
        drafts: config.build?.drafts ?? DEFAULT_CONFIG.build.drafts,
      },
      assets: {
        include: [...(config.assets?.include ?? DEFAULT_CONFIG.assets.include)],
      },
      watcher: {
        enabled: config.watcher?.enabled ?? DEFAULT_CONFIG.watcher.enabled,
        debounceMs: config.watcher?.debounceMs ?? DEFAULT_CONFIG.watcher.debounceMs,
      },
    };
  }
}
