import fs from 'fs-extra';
import * as path from 'node:path';
import { embedLinks } from './links.js';
import { DirectoryScan, README_FILE, readMarkdown, scanDirectory } from './loader.js';
import { renderDocument } from './renderer.js';
import { loadTemplate, needsMath, renderPage, titleCase, titleFromFileName } from './template.js';
import { GeneratedPage, RenderResult, SiteReport } from './types.js';

/**
 * Options for generating a whole site
 */
export interface SiteOptions {
  /** Directory holding the markdown sources */
  rootDir: string;
  /** Directory the HTML pages are written to, mirroring rootDir */
  outDir: string;
  /** Page template contents (see loadTemplate) */
  template: string;
}

interface GenerationContext extends SiteOptions {
  report: SiteReport;
}

function toPosix(p: string): string {
  return p.split(path.sep).join('/');
}

function relativeSource(ctx: GenerationContext, filePath: string): string {
  return toPosix(path.relative(ctx.rootDir, filePath));
}

/**
 * Read and render one source file, recording any failure in the report
 */
function renderSource(ctx: GenerationContext, filePath: string): { markdown: string; result: RenderResult } | null {
  const source = relativeSource(ctx, filePath);
  let markdown: string;
  try {
    markdown = readMarkdown(filePath);
  } catch (err) {
    ctx.report.errors.push(`Failed to read ${source}: ${err}`);
    return null;
  }

  const result = renderDocument(markdown);
  for (const warning of result.warnings) {
    ctx.report.errors.push(`${source}: ${warning}`);
  }
  return { markdown, result };
}

function writePage(ctx: GenerationContext, page: GeneratedPage, html: string): void {
  try {
    fs.outputFileSync(path.join(ctx.outDir, page.output), html, 'utf-8');
    ctx.report.pages.push(page);
  } catch (err) {
    ctx.report.errors.push(`Failed to write ${page.output}: ${err}`);
  }
}

/**
 * Write the index page of a homepage directory: its README followed by
 * links to the homepages and articles found beside it.
 */
function writeHomepage(ctx: GenerationContext, dir: string, scan: DirectoryScan): void {
  const readmePath = path.join(dir, README_FILE);
  const rendered = renderSource(ctx, readmePath);
  if (!rendered) return;

  const relDir = path.relative(ctx.rootDir, dir);
  const title = titleCase(path.basename(path.resolve(dir)));
  const body = embedLinks(rendered.result.html, scan.homepageDirs, scan.terminalSites);

  writePage(ctx, {
    kind: 'homepage',
    source: relativeSource(ctx, readmePath),
    output: toPosix(path.join(relDir, 'index.html')),
    title
  }, renderPage(ctx.template, { title, body, includeMath: needsMath(rendered.markdown) }));
}

/**
 * Generate the article pages for markdown files in a directory
 */
function generateSingletons(ctx: GenerationContext, dir: string, terminalSites: readonly string[]): void {
  const relDir = path.relative(ctx.rootDir, dir);

  for (const fileName of terminalSites) {
    const rendered = renderSource(ctx, path.join(dir, fileName));
    if (!rendered) continue;

    const title = titleFromFileName(fileName);
    const output = toPosix(path.join(relDir, `${path.basename(fileName, path.extname(fileName))}.html`));
    writePage(ctx, {
      kind: 'singleton',
      source: relativeSource(ctx, path.join(dir, fileName)),
      output,
      title
    }, renderPage(ctx.template, { title, body: rendered.result.html, includeMath: needsMath(rendered.markdown) }));
  }
}

/**
 * Generate homepage directories below `dir`, deepest pages first
 */
function generateHomepages(ctx: GenerationContext, dir: string, homepageDirs: readonly string[]): void {
  for (const name of homepageDirs) {
    const subdir = path.join(dir, name);

    let scan: DirectoryScan;
    try {
      scan = scanDirectory(subdir);
    } catch (err) {
      ctx.report.errors.push(`Failed to scan ${relativeSource(ctx, subdir)}: ${err}`);
      continue;
    }

    generateHomepages(ctx, subdir, scan.homepageDirs);
    generateSingletons(ctx, subdir, scan.terminalSites);
    writeHomepage(ctx, subdir, scan);
  }
}

/**
 * Generate every page of a site rooted at `rootDir`.
 *
 * The root becomes a homepage of its own when it has a README.md. Problems
 * with individual documents end up in `errors`; only an unreadable root
 * throws.
 */
export function generateSite(options: SiteOptions): SiteReport {
  const ctx: GenerationContext = { ...options, report: { pages: [], errors: [] } };
  const scan = scanDirectory(options.rootDir);

  generateHomepages(ctx, options.rootDir, scan.homepageDirs);
  generateSingletons(ctx, options.rootDir, scan.terminalSites);
  if (fs.existsSync(path.join(options.rootDir, README_FILE))) {
    writeHomepage(ctx, options.rootDir, scan);
  }

  return ctx.report;
}

/**
 * Convert a single markdown file into a standalone article page.
 * The page is written beside the input unless `outputPath` is given.
 */
export function convertFile(
  inputPath: string,
  outputPath?: string,
  template: string = loadTemplate()
): { outputPath: string; title: string; warnings: string[] } {
  const markdown = readMarkdown(inputPath);
  const result = renderDocument(markdown);
  const target = outputPath ?? path.join(path.dirname(inputPath), `${path.basename(inputPath, path.extname(inputPath))}.html`);
  const title = titleFromFileName(inputPath);

  fs.outputFileSync(target, renderPage(template, { title, body: result.html, includeMath: needsMath(markdown) }), 'utf-8');
  return { outputPath: target, title, warnings: result.warnings };
}
