import { InvalidSiblingLinksError } from './errors.js';
import { escapeAttribute, escapeHtml } from './inline.js';

const MARKDOWN_EXTENSION = /\.md$/i;

/**
 * Check that a sibling collection handed over by a caller is a list of names.
 * Used for values that arrive untyped (request bodies, config).
 */
export function assertSiblingNames(value: unknown, label: string): asserts value is readonly string[] {
  if (!Array.isArray(value)) {
    throw new InvalidSiblingLinksError(`${label} must be a list of names, got ${value === null ? 'null' : typeof value}`);
  }
  const items: unknown[] = value;
  const badIndex = items.findIndex(item => typeof item !== 'string');
  if (badIndex !== -1) {
    throw new InvalidSiblingLinksError(`${label}[${badIndex}] must be a string, got ${typeof items[badIndex]}`);
  }
}

/**
 * Article name without its markdown extension
 */
export function articleName(identifier: string): string {
  return identifier.replace(MARKDOWN_EXTENSION, '');
}

/**
 * URL-encode each segment of a relative link target ("C# notes/index.html" -> "C%23%20notes/index.html")
 */
function encodeTarget(target: string): string {
  return target.split('/').map(encodeURIComponent).join('/');
}

function linkItem(href: string, text: string): string {
  return `<li><a href="${escapeAttribute(encodeTarget(href))}">${escapeHtml(text)}</a></li>`;
}

/**
 * Append navigation links to a rendered homepage body.
 *
 * Homepage directories come first, then singleton articles, each group in
 * the order given. Nothing is appended when both groups are empty.
 */
export function embedLinks(
  body: string,
  homepageDirs: readonly string[],
  singletonArticles: readonly string[]
): string {
  assertSiblingNames(homepageDirs, 'homepageDirs');
  assertSiblingNames(singletonArticles, 'singletonArticles');

  if (homepageDirs.length === 0 && singletonArticles.length === 0) {
    return body;
  }

  const parts: string[] = ['<hr>'];

  if (homepageDirs.length > 0) {
    parts.push('<ul class="homepage-links">');
    for (const dir of homepageDirs) {
      parts.push(linkItem(`${dir}/index.html`, dir));
    }
    parts.push('</ul>');
  }

  if (singletonArticles.length > 0) {
    parts.push('<ul class="article-links">');
    for (const article of singletonArticles) {
      const name = articleName(article);
      parts.push(linkItem(`${name}.html`, name));
    }
    parts.push('</ul>');
  }

  return body === '' ? parts.join('\n') : `${body}\n${parts.join('\n')}`;
}
