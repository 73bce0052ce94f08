import { classify, initialParseState } from './classifier.js';
import { escapeAttribute, escapeHtml, renderInline } from './inline.js';
import { RenderResult } from './types.js';

/** Images are resolved against this fixed path relative to the page */
export const GRAPHICS_BASE = '../graphics/';

/**
 * A fenced code block being collected
 */
interface OpenCodeBlock {
  language: string | null;
  startLine: number;
  lines: string[];
}

function codeBlockHtml(block: OpenCodeBlock, index: number): string {
  const id = `code-block-${index}`;
  const languageClass = block.language ? ` class="language-${escapeAttribute(block.language)}"` : '';
  return (
    '<div class="code-block">' +
    `<button class="copy" data-target="${id}" onclick="copyCode(this)">Copy</button>` +
    `<pre><code id="${id}"${languageClass}>${block.lines.join('\n')}</code></pre>` +
    '</div>'
  );
}

/**
 * Split markdown into lines. A trailing newline does not start another line.
 */
function splitLines(markdown: string): string[] {
  // Normalize line endings (handle Windows \r\n)
  const lines = markdown.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Render a markdown document to an HTML body fragment.
 *
 * Every line is classified on its own and emits at most one fragment;
 * fenced code blocks are collected and emitted once closed. Input that
 * leaves a block open is recovered and reported in `warnings`, never thrown.
 */
export function renderDocument(markdown: string): RenderResult {
  const lines = splitLines(markdown);
  const fragments: string[] = [];
  const warnings: string[] = [];
  let state = initialParseState();
  let codeBlock: OpenCodeBlock | null = null;
  let codeBlocks = 0;

  for (let i = 0; i < lines.length; i++) {
    const lineNum = i + 1;
    const result = classify(lines[i], state);
    state = result.state;
    const line = result.kind;

    switch (line.kind) {
      case 'frontMatterDelimiter':
      case 'metadata':
      case 'blank':
        break;

      case 'fenceBoundary':
        if (line.opening) {
          codeBlock = { language: line.language, startLine: lineNum, lines: [] };
        } else if (codeBlock) {
          codeBlocks++;
          fragments.push(codeBlockHtml(codeBlock, codeBlocks));
          codeBlock = null;
        }
        break;

      case 'code':
        // Quotes are escaped too, as in attribute values
        codeBlock?.lines.push(escapeAttribute(line.text));
        break;

      case 'header':
        fragments.push(`<h${line.level}>${renderInline(escapeHtml(line.text))}</h${line.level}>`);
        break;

      case 'imageDirective': {
        const name = escapeAttribute(line.filename);
        fragments.push(`<img src="${GRAPHICS_BASE}${name}" alt="${name}">`);
        break;
      }

      case 'plainText':
        fragments.push(`<p>${renderInline(escapeHtml(line.text))}</p>`);
        break;
    }
  }

  if (codeBlock) {
    warnings.push(`Unterminated code fence opened on line ${codeBlock.startLine}`);
    codeBlocks++;
    fragments.push(codeBlockHtml(codeBlock, codeBlocks));
  }
  if (state.frontMatter === 'open') {
    warnings.push('Front matter opened on line 1 is never closed');
  }

  return { html: fragments.join('\n'), warnings, codeBlocks };
}

/**
 * Render markdown to an HTML body fragment
 */
export function renderMarkdown(markdown: string): string {
  return renderDocument(markdown).html;
}
