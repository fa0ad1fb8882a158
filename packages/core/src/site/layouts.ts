import { readFile } from 'fs/promises';
import * as path from 'path';
import {
  LayoutCycleError,
  TemplateNotFoundError,
  type FrontMatterData,
} from '@postpress/types';
import { parseFrontMatter } from '../content/front-matter.js';

export interface Layout {
  name: string;
  /** フロントマターを除いたテンプレート本体 */
  template: string;
  /** 親レイアウト名（レイアウト自身のフロントマターの`layout`） */
  parent: string | null;
  /** レイアウトのフロントマター（テンプレートに`layout`として渡す） */
  data: FrontMatterData;
}

export interface LayoutRegistryOptions {
  /** レイアウトディレクトリ（絶対パス） */
  layoutsDir: string;
  /** レイアウトファイルの拡張子（デフォルト: .html） */
  extname?: string;
}

/**
 * `_layouts/<name>.html`を読み込んで管理するクラス
 */
export class LayoutRegistry {
  private layoutsDir: string;
  private extname: string;
  private cache = new Map<string, Promise<Layout>>();

  constructor(options: LayoutRegistryOptions) {
    this.layoutsDir = path.resolve(options.layoutsDir);
    this.extname = options.extname ?? '.html';
  }

  /**
   * レイアウトを取得
   * @param name レイアウト名
   * @param requestedBy エラーメッセージ用の要求元ファイル
   */
  get(name: string, requestedBy?: string): Promise<Layout> {
    let layout = this.cache.get(name);
    if (!layout) {
      layout = this.read(name, requestedBy);
      this.cache.set(name, layout);
    }
    return layout;
  }

  /**
   * レイアウトの継承チェーンを解決（内側から外側の順）
   * `post` → `default` のように親がなくなるまで辿る
   */
  async resolveChain(name: string, requestedBy?: string): Promise<Layout[]> {
    const chain: Layout[] = [];
    const seen: string[] = [];
    let current: string | null = name;
    let requester = requestedBy;

    while (current !== null) {
      if (seen.includes(current)) {
        throw new LayoutCycleError([...seen, current]);
      }
      seen.push(current);

      const layout = await this.get(current, requester);
      chain.push(layout);
      requester = this.layoutPath(current);
      current = layout.parent;
    }

    return chain;
  }

  /**
   * キャッシュを破棄（ウォッチ時の再ビルド用）
   */
  clear(): void {
    this.cache.clear();
  }

  private async read(name: string, requestedBy?: string): Promise<Layout> {
    // レイアウト名はlayoutsDirの中だけを指せる
    const filePath = path.resolve(this.layoutsDir, `${name}${this.extname}`);
    if (!filePath.startsWith(`${path.resolve(this.layoutsDir)}${path.sep}`)) {
      throw new TemplateNotFoundError(name, requestedBy);
    }

    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new TemplateNotFoundError(name, requestedBy);
      }
      throw error;
    }

    const { data, body } = parseFrontMatter(raw, this.layoutPath(name));
    const parent = typeof data.layout === 'string' && data.layout !== 'none' ? data.layout : null;

    return { name, template: body, parent, data };
  }

  private layoutPath(name: string): string {
    return `${path.basename(this.layoutsDir)}/${name}${this.extname}`;
  }
}
