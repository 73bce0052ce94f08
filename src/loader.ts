import fs from 'fs-extra';
import * as path from 'node:path';

export const README_FILE = 'README.md';

/**
 * What a directory contributes to the site
 */
export interface DirectoryScan {
  /** Markdown files other than the README, by file name */
  terminalSites: string[];
  /** Subdirectories that are homepages themselves */
  homepageDirs: string[];
}

function isReadme(fileName: string): boolean {
  return fileName.toLowerCase() === README_FILE.toLowerCase();
}

function isHidden(name: string): boolean {
  return name.startsWith('.');
}

/**
 * A directory is a homepage when it holds a README.md and is not hidden
 */
export function isValidHomepageDir(dir: string): boolean {
  if (isHidden(path.basename(dir))) {
    return false;
  }
  try {
    return fs.statSync(dir).isDirectory() && fs.existsSync(path.join(dir, README_FILE));
  } catch {
    // Vanished or unreadable entries are simply not homepages
    return false;
  }
}

/**
 * Find the singleton articles and homepage subdirectories of a directory.
 * Both lists are sorted by name so output does not depend on readdir order.
 */
export function scanDirectory(dir: string): DirectoryScan {
  const terminalSites: string[] = [];
  const homepageDirs: string[] = [];

  const entries = fs.readdirSync(dir, { withFileTypes: true });
  for (const entry of entries) {
    if (entry.isFile() && entry.name.endsWith('.md') && !isReadme(entry.name)) {
      terminalSites.push(entry.name);
    } else if (entry.isDirectory() && isValidHomepageDir(path.join(dir, entry.name))) {
      homepageDirs.push(entry.name);
    }
  }

  terminalSites.sort();
  homepageDirs.sort();
  return { terminalSites, homepageDirs };
}

/**
 * Read a markdown source file
 */
export function readMarkdown(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}
