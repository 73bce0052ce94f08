/**
 * Where the scan stands with respect to the front matter block.
 * `pending` only holds before the first line has been seen.
 */
export type FrontMatterPhase = 'pending' | 'open' | 'closed';

/**
 * Whether the scan is inside a fenced code block.
 */
export type FencePhase = 'outside' | 'inside';

/**
 * Parse state carried from one line to the next during a single render.
 */
export interface ParseState {
  frontMatter: FrontMatterPhase;
  fence: FencePhase;
  /** Language token of the open fence, if any */
  fenceLanguage: string | null;
}

/**
 * The construct a single input line belongs to.
 */
export type LineKind =
  | { kind: 'frontMatterDelimiter' }
  | { kind: 'metadata'; text: string }
  | { kind: 'blank' }
  | { kind: 'fenceBoundary'; opening: boolean; language: string | null }
  | { kind: 'code'; text: string }
  | { kind: 'header'; level: HeaderLevel; text: string }
  | { kind: 'imageDirective'; filename: string }
  | { kind: 'plainText'; text: string };

export type HeaderLevel = 1 | 2 | 3 | 4 | 5 | 6;

/**
 * Classification of one line together with the state for the next line.
 */
export interface Classification {
  kind: LineKind;
  state: ParseState;
}

/**
 * Result of rendering a markdown document body.
 */
export interface RenderResult {
  /** The rendered HTML body fragment */
  html: string;
  /** Recoverable problems found in the input (unclosed blocks) */
  warnings: string[];
  /** Number of fenced code blocks emitted */
  codeBlocks: number;
}

/**
 * Sibling documents a homepage links to.
 */
export interface SiblingLinks {
  /** Homepage directory names, in link order */
  homepageDirs: readonly string[];
  /** Singleton article names, in link order */
  singletonArticles: readonly string[];
}

export type PageKind = 'homepage' | 'singleton';

/**
 * A page written during site generation.
 */
export interface GeneratedPage {
  kind: PageKind;
  /** Source markdown file, relative to the root directory */
  source: string;
  /** Output HTML file, relative to the output directory */
  output: string;
  title: string;
}

/**
 * Outcome of a site generation run.
 */
export interface SiteReport {
  pages: GeneratedPage[];
  /** Per-document problems; generation carries on past them */
  errors: string[];
}
