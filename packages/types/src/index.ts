/**
 * @postpress/types
 * postpressの共通型定義
 */

// Post
export type { Post, PostKind, PostSummary, FrontMatterData, RecognizedFrontMatter } from './post.js';

// Page
export type { Page } from './page.js';

// Build
export type {
  BuildDiagnostic,
  BuildOptions,
  BuildReport,
  DiagnosticCode,
  DiagnosticSeverity,
} from './build.js';

// Errors
export {
  PostpressError,
  MalformedFrontMatterError,
  TemplateNotFoundError,
  LayoutCycleError,
  type PostpressErrorCode,
} from './errors.js';

// Config
export type {
  PostpressConfig,
  SiteConfig,
  ProjectConfig,
  FilesConfig,
  ContentConfig,
  IndexConfig,
  BuildConfig,
  AssetsConfig,
  WatcherConfig,
} from './config.js';
export { DEFAULT_CONFIG } from './config.js';
export {
  ConfigLoader,
  CONFIG_FILE_NAMES,
  CONFIG_ENV_VAR,
  validateConfig,
  type ResolveConfigOptions,
  type ResolvedConfig,
} from './config/index.js';

// Storage
export type { PageStorage } from './storage.js';
