import fg from 'fast-glob';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { AssetsConfig, BuildDiagnostic, Post } from '@postpress/types';

export interface AssetResolverOptions {
  /** ソースルート */
  rootDir: string;
  /** 出力ディレクトリ（絶対パス） */
  outputDir: string;
  assets: AssetsConfig;
  /** サイトのbaseurl（`/blog`など）。参照パスの先頭から取り除く */
  baseurl: string;
}

/**
 * 記事が参照する静的ファイルの確認と、静的ファイルのコピーを行うクラス
 */
export class AssetResolver {
  private rootDir: string;
  private outputDir: string;
  private assets: AssetsConfig;
  private baseurl: string;

  constructor(options: AssetResolverOptions) {
    this.rootDir = path.resolve(options.rootDir);
    this.outputDir = path.resolve(options.outputDir);
    this.assets = options.assets;
    this.baseurl = options.baseurl;
  }

  /**
   * header_imageがソースツリーに存在するか確認
   * 見つからなければ警告の診断を返す（ビルドは続行）
   */
  async check(post: Post): Promise<BuildDiagnostic | null> {
    const ref = post.headerImage;
    if (!ref || isRemote(ref)) {
      return null;
    }

    const filePath = path.join(this.rootDir, this.stripBase(ref));
    try {
      const stat = await fs.stat(filePath);
      if (stat.isFile()) {
        return null;
      }
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw error;
      }
    }

    return {
      severity: 'warning',
      code: 'UnresolvedAsset',
      path: post.path,
      message: `header_image "${ref}" not found`,
    };
  }

  /**
   * 静的ファイルを出力ディレクトリへコピー
   * @returns コピーしたファイルの相対パス
   */
  async copyStatic(): Promise<string[]> {
    if (this.assets.include.length === 0) {
      return [];
    }

    const ignore = ['**/node_modules/**'];
    const outputRelative = path.relative(this.rootDir, this.outputDir);
    if (outputRelative && !outputRelative.startsWith('..')) {
      ignore.push(`${outputRelative.replace(/\\/g, '/')}/**`);
    }

    const files = await fg(this.assets.include, {
      cwd: this.rootDir,
      ignore,
      onlyFiles: true,
      dot: false,
    });
    files.sort();

    for (const file of files) {
      const target = path.join(this.outputDir, file);
      await fs.mkdir(path.dirname(target), { recursive: true });
      await fs.copyFile(path.join(this.rootDir, file), target);
    }

    return files;
  }

  /**
   * `/blog/img/a.png` → `img/a.png`
   */
  private stripBase(ref: string): string {
    let stripped = ref.split(/[?#]/)[0];
    if (this.baseurl && (stripped === this.baseurl || stripped.startsWith(`${this.baseurl}/`))) {
      stripped = stripped.slice(this.baseurl.length);
    }
    const relative = stripped.replace(/^\/+/, '');
    try {
      return decodeURI(relative);
    } catch {
      // `%`単体など不正なエスケープはそのままのパスで確認する
      return relative;
    }
  }
}

function isRemote(ref: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(ref) || ref.startsWith('//');
}
