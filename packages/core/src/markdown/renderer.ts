import { Marked, type Token } from 'marked';

export interface MarkdownRendererOptions {
  /** GitHub Flavored Markdown（テーブル・打ち消し線・自動リンク）を有効にするか */
  gfm?: boolean;
}

export interface Excerpt {
  /** 抜粋のMarkdown */
  markdown: string;
  /** 抜粋のHTML（抜粋がなければ空文字） */
  html: string;
}

/**
 * MarkdownをHTMLに変換するクラス
 *
 * コードブロックは内容を解釈せず、エスケープして
 * `<pre><code class="language-xxx">`で包むだけ。
 * 言語ヒントのクラスはテーマ側のハイライタが使う。
 */
export class MarkdownRenderer {
  private marked: Marked;

  constructor(options: MarkdownRendererOptions = {}) {
    // グローバルなmarkedの設定を汚さないよう専用インスタンスを使う
    this.marked = new Marked({ gfm: options.gfm ?? true });
  }

  /**
   * MarkdownをHTMLに変換
   */
  render(markdown: string): string {
    return this.marked.parser(this.lex(markdown));
  }

  /**
   * 抜粋を取り出す
   * 区切り文字列があればその手前まで、なければ最初の段落
   */
  excerpt(markdown: string, separator: string): Excerpt {
    const index = markdown.indexOf(separator);
    if (index !== -1) {
      const head = markdown.slice(0, index).trim();
      return { markdown: head, html: head ? this.render(head) : '' };
    }

    const paragraph = this.lex(markdown).find((token) => token.type === 'paragraph');
    if (!paragraph) {
      return { markdown: '', html: '' };
    }

    return {
      markdown: paragraph.raw.trim(),
      html: this.marked.parser([paragraph]),
    };
  }

  private lex(markdown: string): Token[] {
    return this.marked.lexer(markdown);
  }
}

const HTML_ENTITIES: Record<string, string> = {
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&amp;': '&',
};

const CODE_BLOCK = /<pre><code(?: class="language-[^"]*")?>([\s\S]*?)<\/code><\/pre>/g;

/**
 * レンダリング済みHTMLからコードブロックの元テキストを取り出す
 * （ラッパーを外してエスケープを戻し、レンダラが付けた末尾の改行を除く）
 */
export function extractCodeBlocks(html: string): string[] {
  const blocks: string[] = [];
  for (const match of html.matchAll(CODE_BLOCK)) {
    const text = match[1].replace(/&(?:lt|gt|quot|#39|amp);/g, (entity) => HTML_ENTITIES[entity] ?? entity);
    blocks.push(text.replace(/\n$/, ''));
  }
  return blocks;
}
