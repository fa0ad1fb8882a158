/**
 * @postpress/core
 *
 * Markdownからの静的サイト生成
 */

export { SiteBuilder, assertOutputOutsideSource, type SiteBuilderOptions, type IndexResult } from './site/site-builder.js';
export { SiteAssembler, type SiteData, type Paginator } from './site/site-assembler.js';
export { LayoutRegistry, type Layout } from './site/layouts.js';
export { TemplateEngine } from './site/template-engine.js';
export { AssetResolver } from './site/assets.js';
export { buildPermalink, slugify, urlToOutputPath } from './site/permalink.js';
export { PostLoader, type LoadResult } from './content/post-loader.js';
export {
  parseFrontMatter,
  serializeFrontMatter,
  normalizeFrontMatter,
  type ParsedFrontMatter,
} from './content/front-matter.js';
export { MarkdownRenderer, extractCodeBlocks, type Excerpt } from './markdown/renderer.js';
export { FileDiscovery } from './discovery/file-discovery.js';
export { FileWatcher, type FileChangeEvent } from './discovery/file-watcher.js';
