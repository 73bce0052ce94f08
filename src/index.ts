export { classify, initialParseState } from './classifier.js';
export { renderInline, escapeHtml, escapeAttribute } from './inline.js';
export { renderDocument, renderMarkdown, GRAPHICS_BASE } from './renderer.js';
export { embedLinks, assertSiblingNames, articleName } from './links.js';
export { loadTemplate, renderPage, needsMath, titleFromFileName, DEFAULT_TEMPLATE_PATH } from './template.js';
export { scanDirectory, isValidHomepageDir } from './loader.js';
export { generateSite, convertFile } from './site.js';
export type { SiteOptions } from './site.js';
export { loadConfig } from './config.js';
export type { SiteConfig } from './config.js';
export { createApp } from './server.js';
export { InvalidSiblingLinksError, TemplateError, ConfigError } from './errors.js';
export type {
  ParseState,
  LineKind,
  Classification,
  RenderResult,
  SiblingLinks,
  GeneratedPage,
  SiteReport
} from './types.js';
