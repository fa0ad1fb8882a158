import { Liquid, type Template } from 'liquidjs';
import type { SiteConfig } from '@postpress/types';
import { slugify } from './permalink.js';

export interface TemplateEngineOptions {
  /** `{% include %}`で読み込むパーシャルのディレクトリ（絶対パス） */
  includesDir: string;
  site: SiteConfig;
}

const XML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

/**
 * LiquidJSのラッパー
 * Jekyll互換の`{% include file.html %}`と、URL・日付用のフィルタを追加する
 */
export class TemplateEngine {
  private readonly liquid: Liquid;
  private parsed = new Map<string, Template[]>();

  constructor(private options: TemplateEngineOptions) {
    this.liquid = new Liquid({
      root: [options.includesDir],
      partials: [options.includesDir],
      extname: '.html',
      jekyllInclude: true,
      dynamicPartials: false,
      // 記事日付はUTCで保持しているので`date`フィルタもUTCで書式化する
      timezoneOffset: 0,
    });

    this.liquid.registerFilter('relative_url', (input: unknown) => this.relativeUrl(String(input ?? '')));
    this.liquid.registerFilter('absolute_url', (input: unknown) => this.absoluteUrl(String(input ?? '')));
    this.liquid.registerFilter('slugify', (input: unknown) => slugify(String(input ?? '')));
    this.liquid.registerFilter('date_to_xmlschema', (input: unknown) => toXmlSchema(input));
    this.liquid.registerFilter('xml_escape', (input: unknown) =>
      String(input ?? '').replace(/[&<>"']/g, (ch) => XML_ESCAPES[ch] ?? ch)
    );
  }

  /**
   * テンプレートを描画
   * @param key パース結果のキャッシュキー（レイアウト名など）
   */
  async render(key: string, template: string, scope: object): Promise<string> {
    let templates = this.parsed.get(key);
    if (!templates) {
      templates = this.liquid.parse(template, key);
      this.parsed.set(key, templates);
    }

    const output: string = await this.liquid.render(templates, scope);
    return output;
  }

  /**
   * パース結果のキャッシュを破棄（パーシャルは毎回読み込まれる）
   */
  clear(): void {
    this.parsed.clear();
  }

  /**
   * baseurlを前置したサイト内URL
   */
  relativeUrl(input: string): string {
    if (isExternalUrl(input)) {
      return input;
    }
    const pathPart = input.startsWith('/') ? input : `/${input}`;
    return `${this.options.site.baseurl}${pathPart}`;
  }

  /**
   * site.urlとbaseurlを前置した絶対URL
   */
  absoluteUrl(input: string): string {
    if (isExternalUrl(input)) {
      return input;
    }
    return `${this.options.site.url.replace(/\/+$/, '')}${this.relativeUrl(input)}`;
  }
}

function isExternalUrl(input: string): boolean {
  return /^[a-z][a-z0-9+.-]*:/i.test(input) || input.startsWith('//');
}

function toXmlSchema(input: unknown): string {
  const date = input instanceof Date ? input : new Date(String(input));
  return Number.isNaN(date.getTime()) ? String(input) : date.toISOString();
}
