/**
 * ビルドエラーの定義
 */

export type PostpressErrorCode = 'MalformedFrontMatter' | 'TemplateNotFound' | 'LayoutCycle';

/**
 * postpressのエラー基底クラス
 */
export class PostpressError extends Error {
  constructor(
    message: string,
    public readonly code: PostpressErrorCode,
    public readonly path?: string
  ) {
    super(message);
    this.name = 'PostpressError';
  }
}

/**
 * フロントマターが不正（ファイル単位で回復可能）
 */
export class MalformedFrontMatterError extends PostpressError {
  constructor(
    path: string | undefined,
    public readonly reason: string
  ) {
    super(`Malformed front matter${path ? ` in ${path}` : ''}: ${reason}`, 'MalformedFrontMatter', path);
    this.name = 'MalformedFrontMatterError';
  }
}

/**
 * レイアウトが存在しない（ビルド全体を中断する）
 */
export class TemplateNotFoundError extends PostpressError {
  constructor(
    public readonly layout: string,
    requestedBy?: string
  ) {
    super(
      `Layout "${layout}" not found${requestedBy ? ` (requested by ${requestedBy})` : ''}`,
      'TemplateNotFound',
      requestedBy
    );
    this.name = 'TemplateNotFoundError';
  }
}

/**
 * レイアウトの継承が循環している
 */
export class LayoutCycleError extends PostpressError {
  constructor(public readonly chain: string[]) {
    super(`Layout cycle detected: ${chain.join(' -> ')}`, 'LayoutCycle');
    this.name = 'LayoutCycleError';
  }
}
