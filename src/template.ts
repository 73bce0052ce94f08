import fs from 'fs-extra';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { TemplateError } from './errors.js';
import { escapeHtml } from './inline.js';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/** Bundled template, one level up from src/ or dist/ */
export const DEFAULT_TEMPLATE_PATH = path.join(__dirname, '..', 'templates', 'index.html');

export const PLACEMENT_MARKER = '<div id="placement"></div>';
const TITLE_MARKER = '{{title}}';
const MATH_MARKER = '<!-- math-scripts -->';

const MATH_SCRIPTS = [
  '<script src="https://polyfill.io/v3/polyfill.min.js?features=es6"></script>',
  '<script id="MathJax-script" async src="https://cdn.jsdelivr.net/npm/mathjax@3/es5/tex-mml-chtml.js"></script>'
].join('\n');

// $$ blocks, \( ... \) spans, or $...$ with no space just inside either
// dollar and no digit right after the closing one ("$5 and $6" is not math)
const MATH_PATTERN = /\$\$|\\\(|\$[^$\s](?:[^$\n]*[^$\s])?\$(?!\d)/;

/**
 * Options for wrapping a body fragment into a full page
 */
export interface PageOptions {
  title: string;
  body: string;
  /** Add the MathJax script tags to the page head */
  includeMath?: boolean;
}

/**
 * Load an HTML page template and check it has somewhere to put the body
 */
export function loadTemplate(templatePath: string = DEFAULT_TEMPLATE_PATH): string {
  let template: string;
  try {
    template = fs.readFileSync(templatePath, 'utf-8');
  } catch (err) {
    throw new TemplateError(`Failed to read template ${templatePath}: ${err}`);
  }
  if (!template.includes(PLACEMENT_MARKER)) {
    throw new TemplateError(`Template ${templatePath} has no ${PLACEMENT_MARKER} marker`);
  }
  return template;
}

/**
 * Whether a markdown document needs the math rendering scripts
 */
export function needsMath(markdown: string): boolean {
  return MATH_PATTERN.test(markdown);
}

/**
 * Turn a file or directory name into a title: "data_pipeline" -> "Data Pipeline"
 */
export function titleCase(name: string): string {
  return name
    .replace(/_/g, ' ')
    .split(' ')
    .map(word => (word ? word[0].toUpperCase() + word.slice(1).toLowerCase() : word))
    .join(' ');
}

export function titleFromFileName(fileName: string): string {
  return titleCase(path.basename(fileName, path.extname(fileName)));
}

/**
 * Put a rendered body into the page template.
 * Replacements use functions so that "$" in the body is never read as a
 * replacement pattern.
 */
export function renderPage(template: string, options: PageOptions): string {
  const { title, body, includeMath = false } = options;
  return template
    .split(TITLE_MARKER).join(escapeHtml(title))
    .replace(MATH_MARKER, () => (includeMath ? MATH_SCRIPTS : ''))
    .replace(PLACEMENT_MARKER, () => `<div id="placement">${body}</div>`);
}
