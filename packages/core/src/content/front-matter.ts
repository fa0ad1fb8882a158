import matter from 'gray-matter';
import { z } from 'zod';
import { MalformedFrontMatterError, type FrontMatterData, type RecognizedFrontMatter } from '@postpress/types';

export interface ParsedFrontMatter {
  /** フロントマター（なければ空） */
  data: FrontMatterData;
  /** フロントマター以降の本文 */
  body: string;
}

const DELIMITER = '---';

const labelSchema = z.union([z.string(), z.number()]);
const labelListSchema = z.union([labelSchema, z.array(labelSchema)]).nullish();

/**
 * 認識済みキーのスキーマ
 * 未知のキーは検証せずそのまま残す
 */
const recognizedSchema = z.object({
  layout: z.union([z.string(), z.literal(false)]).nullish(),
  title: labelSchema.nullish(),
  date: z.union([z.date(), z.string()]).nullish(),
  categories: labelListSchema,
  tags: labelListSchema,
  header_image: z.string().nullish(),
  published: z.boolean().nullish(),
  permalink: z.string().nullish(),
  excerpt: z.string().nullish(),
});

/**
 * フロントマターをパース
 *
 * - 先頭が`---`（直後が`-`でない）ならフロントマターの開始
 * - 閉じ区切りがなければMalformedFrontMatterError
 * - フロントマターがなければ空のマッピングとファイル全体を本文として返す
 */
export function parseFrontMatter(raw: string, sourcePath?: string): ParsedFrontMatter {
  const text = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;

  if (!hasOpeningDelimiter(text)) {
    return { data: {}, body: text };
  }

  if (text.indexOf(`\n${DELIMITER}`, DELIMITER.length) === -1) {
    throw new MalformedFrontMatterError(sourcePath, 'opening "---" has no matching closing "---"');
  }

  let file: matter.GrayMatterFile<string>;
  try {
    // optionsを渡すとgray-matterのキャッシュを使わない
    file = matter(text, { excerpt: false });
  } catch (error) {
    const reason = error instanceof Error ? error.message.split('\n')[0] : String(error);
    throw new MalformedFrontMatterError(sourcePath, reason);
  }

  const data: unknown = file.data;
  if (!isPlainObject(data)) {
    throw new MalformedFrontMatterError(sourcePath, 'front matter must be a key-value mapping');
  }

  return { data: { ...data }, body: file.content };
}

/**
 * フロントマターと本文を文字列に戻す
 * undefinedの値は出力しない
 */
export function serializeFrontMatter(data: FrontMatterData, body: string): string {
  const cleaned: FrontMatterData = {};
  for (const [key, value] of Object.entries(data)) {
    if (value !== undefined) {
      cleaned[key] = value;
    }
  }
  return matter.stringify(body, cleaned);
}

/**
 * 認識済みキーを検証して正規化
 */
export function normalizeFrontMatter(data: FrontMatterData, sourcePath?: string): RecognizedFrontMatter {
  const result = recognizedSchema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new MalformedFrontMatterError(sourcePath, `${issue.path.join('.')}: ${issue.message}`);
  }

  const fm = result.data;
  const normalized: RecognizedFrontMatter = {
    categories: toLabels(fm.categories),
    tags: toLabels(fm.tags),
    published: fm.published ?? true,
  };

  if (fm.layout !== undefined) {
    normalized.layout = fm.layout === null || fm.layout === false || fm.layout === 'none' ? null : fm.layout;
  }

  if (fm.title !== undefined && fm.title !== null) {
    normalized.title = String(fm.title);
  }

  if (fm.date !== undefined && fm.date !== null) {
    const date = fm.date instanceof Date ? fm.date : parseDateString(fm.date);
    if (date === null || Number.isNaN(date.getTime())) {
      throw new MalformedFrontMatterError(sourcePath, `date: "${String(fm.date)}" is not a valid date`);
    }
    normalized.date = date;
  }

  if (fm.header_image) {
    normalized.headerImage = fm.header_image;
  }

  if (fm.permalink) {
    normalized.permalink = fm.permalink;
  }

  if (fm.excerpt) {
    normalized.excerpt = fm.excerpt;
  }

  return normalized;
}

/**
 * `YYYY-MM-DD[ T]HH:MM[:SS[.sss]][Z|±HH:MM]`
 * タイムゾーンのない日時はUTCとして扱い、実行環境のTZに依存させない
 */
const DATE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/;

function parseDateString(text: string): Date | null {
  const match = DATE_PATTERN.exec(text.trim());
  if (!match) {
    return null;
  }

  const [, year, month, day, hour = '0', minute = '0', second = '0', millis = '0', zone] = match;
  const local = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
    Number(millis.padEnd(3, '0'))
  );

  const check = new Date(local);
  if (
    check.getUTCMonth() !== Number(month) - 1 ||
    check.getUTCDate() !== Number(day) ||
    check.getUTCHours() !== Number(hour) ||
    check.getUTCMinutes() !== Number(minute) ||
    check.getUTCSeconds() !== Number(second)
  ) {
    return null;
  }

  return new Date(local - zoneOffsetMinutes(zone) * 60_000);
}

function zoneOffsetMinutes(zone: string | undefined): number {
  if (zone === undefined || zone === 'Z') {
    return 0;
  }
  const digits = zone.slice(1).replace(':', '');
  const minutes = Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2));
  return zone.startsWith('-') ? -minutes : minutes;
}

function hasOpeningDelimiter(text: string): boolean {
  return text.startsWith(DELIMITER) && text.charAt(DELIMITER.length) !== '-';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * categories/tagsを文字列配列に変換
 * 文字列は空白区切りのリストとして扱う
 */
function toLabels(value: string | number | Array<string | number> | null | undefined): string[] {
  if (value === undefined || value === null) {
    return [];
  }

  const items = Array.isArray(value) ? value.map(String) : String(value).split(/\s+/);
  const labels: string[] = [];
  for (const item of items) {
    const label = item.trim();
    if (label && !labels.includes(label)) {
      labels.push(label);
    }
  }
  return labels;
}
