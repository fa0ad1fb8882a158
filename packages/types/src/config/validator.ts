import type { PostpressConfig } from '../config.js';

type ConfigSection = Record<string, unknown>;

/**
 * 設定オブジェクトをバリデーション
 */
export function validateConfig(config: unknown): Partial<PostpressConfig> {
  if (typeof config !== 'object' || config === null || Array.isArray(config)) {
    throw new Error('Config must be an object');
  }

  const cfg = config as ConfigSection;

  // バージョンのチェック
  if (cfg.version !== undefined && typeof cfg.version !== 'string') {
    throw new Error('config.version must be a string');
  }

  if (cfg.site !== undefined) {
    validateSiteConfig(cfg.site);
  }

  if (cfg.project !== undefined) {
    validateProjectConfig(cfg.project);
  }

  if (cfg.files !== undefined) {
    validateFilesConfig(cfg.files);
  }

  if (cfg.content !== undefined) {
    validateContentConfig(cfg.content);
  }

  if (cfg.index !== undefined) {
    validateIndexConfig(cfg.index);
  }

  if (cfg.build !== undefined) {
    validateBuildConfig(cfg.build);
  }

  if (cfg.assets !== undefined) {
    validateAssetsConfig(cfg.assets);
  }

  if (cfg.watcher !== undefined) {
    validateWatcherConfig(cfg.watcher);
  }

  return cfg as Partial<PostpressConfig>;
}

function expectSection(value: unknown, name: string): ConfigSection {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new Error(`config.${name} must be an object`);
  }
  return value as ConfigSection;
}

function expectOptionalString(section: ConfigSection, key: string, name: string): void {
  if (section[key] !== undefined && typeof section[key] !== 'string') {
    throw new Error(`config.${name}.${key} must be a string`);
  }
}

function expectOptionalBoolean(section: ConfigSection, key: string, name: string): void {
  if (section[key] !== undefined && typeof section[key] !== 'boolean') {
    throw new Error(`config.${name}.${key} must be a boolean`);
  }
}

function expectOptionalStringArray(section: ConfigSection, key: string, name: string): void {
  const value = section[key];
  if (value === undefined) {
    return;
  }

  if (!Array.isArray(value)) {
    throw new Error(`config.${name}.${key} must be an array`);
  }

  if (!value.every((item) => typeof item === 'string')) {
    throw new Error(`config.${name}.${key} must be an array of strings`);
  }
}

function validateSiteConfig(site: unknown): void {
  const s = expectSection(site, 'site');

  for (const key of ['title', 'description', 'url', 'baseurl', 'author']) {
    expectOptionalString(s, key, 'site');
  }

  // baseurlは空文字か`/`始まりで、末尾スラッシュなし
  if (typeof s.baseurl === 'string' && s.baseurl !== '') {
    if (!s.baseurl.startsWith('/') || s.baseurl.endsWith('/')) {
      throw new Error('config.site.baseurl must start with "/" and must not end with "/"');
    }
  }
}

function validateProjectConfig(project: unknown): void {
  const prj = expectSection(project, 'project');

  expectOptionalString(prj, 'root', 'project');
}

function validateFilesConfig(files: unknown): void {
  const f = expectSection(files, 'files');

  expectOptionalStringArray(f, 'include', 'files');
  expectOptionalStringArray(f, 'exclude', 'files');
  expectOptionalBoolean(f, 'ignoreGitignore', 'files');
}

function validateContentConfig(content: unknown): void {
  const c = expectSection(content, 'content');

  for (const key of ['postsDir', 'layoutsDir', 'includesDir', 'permalink', 'excerptSeparator']) {
    expectOptionalString(c, key, 'content');
  }

  if (typeof c.permalink === 'string' && !c.permalink.startsWith('/')) {
    throw new Error('config.content.permalink must start with "/"');
  }

  if (c.excerptSeparator === '') {
    throw new Error('config.content.excerptSeparator must not be empty');
  }

  if (c.defaultLayouts !== undefined) {
    const layouts = expectSection(c.defaultLayouts, 'content.defaultLayouts');
    expectOptionalString(layouts, 'post', 'content.defaultLayouts');
    expectOptionalString(layouts, 'page', 'content.defaultLayouts');
  }
}

function validateIndexConfig(index: unknown): void {
  const idx = expectSection(index, 'index');

  expectOptionalString(idx, 'layout', 'index');

  if (idx.perPage !== undefined && typeof idx.perPage !== 'number') {
    throw new Error('config.index.perPage must be a number');
  }

  if (typeof idx.perPage === 'number' && (idx.perPage < 0 || !Number.isInteger(idx.perPage))) {
    throw new Error('config.index.perPage must be a non-negative integer');
  }
}

function validateBuildConfig(build: unknown): void {
  const b = expectSection(build, 'build');

  expectOptionalString(b, 'outputDir', 'build');
  expectOptionalBoolean(b, 'clean', 'build');
  expectOptionalBoolean(b, 'drafts', 'build');

  // `.`・`..`だけからなるパスはソースルートかその祖先
  if (typeof b.outputDir === 'string' && /^(\.{1,2}([/\\]+|$))*$/.test(b.outputDir)) {
    throw new Error('config.build.outputDir must not be the source root or an ancestor of it');
  }

  if (b.concurrency !== undefined && typeof b.concurrency !== 'number') {
    throw new Error('config.build.concurrency must be a number');
  }

  if (typeof b.concurrency === 'number' && b.concurrency <= 0) {
    throw new Error('config.build.concurrency must be positive');
  }
}

function validateAssetsConfig(assets: unknown): void {
  const a = expectSection(assets, 'assets');

  expectOptionalStringArray(a, 'include', 'assets');
}

function validateWatcherConfig(watcher: unknown): void {
  const wtc = expectSection(watcher, 'watcher');

  expectOptionalBoolean(wtc, 'enabled', 'watcher');

  if (wtc.debounceMs !== undefined && typeof wtc.debounceMs !== 'number') {
    throw new Error('config.watcher.debounceMs must be a number');
  }

  if (typeof wtc.debounceMs === 'number' && wtc.debounceMs < 0) {
    throw new Error('config.watcher.debounceMs must be non-negative');
  }
}
