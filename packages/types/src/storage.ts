/**
 * PageStorageインターフェイス
 */

import type { Page } from './page.js';

export interface PageStorage {
  /**
   * ページを保存
   * @returns 書き込みが発生した場合true（内容が同一ならfalse）
   */
  save(path: string, page: Page): Promise<boolean>;

  /**
   * 保存済みHTMLを取得
   */
  get(path: string): Promise<string | null>;

  /**
   * ページを削除
   */
  delete(path: string): Promise<void>;

  /**
   * すべてのページパスを取得
   */
  list(): Promise<string[]>;

  /**
   * ページの存在確認
   */
  exists(path: string): Promise<boolean>;
}
