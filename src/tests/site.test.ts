import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as url from 'node:url';
import * as os from 'node:os';
import { convertFile, generateSite } from '../site.js';

const { describe, it, beforeEach, afterEach } = test;
const __dirname = path.dirname(url.fileURLToPath(import.meta.url));

const TEMPLATE = '<title>{{title}}</title><!-- math-scripts --><div id="placement"></div>';

describe('generateSite', () => {
  let rootDir: string;
  let outDir: string;

  beforeEach(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mdfolio-root-'));
    outDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mdfolio-out-'));

    fs.writeFileSync(path.join(rootDir, 'README.md'), '# Home\n');
    fs.writeFileSync(path.join(rootDir, 'intro.md'), 'Hello *world*\n');
    fs.mkdirSync(path.join(rootDir, 'Projects', 'Deep'), { recursive: true });
    fs.writeFileSync(path.join(rootDir, 'Projects', 'README.md'), '---\ntitle: p\n---\n# Projects\n');
    fs.writeFileSync(path.join(rootDir, 'Projects', 'alpha.md'), '```\nunclosed\n');
    fs.writeFileSync(path.join(rootDir, 'Projects', 'Deep', 'README.md'), 'Deep page\n');
  });

  afterEach(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
    fs.rmSync(outDir, { recursive: true, force: true });
  });

  it('should write child pages before their homepage', () => {
    const report = generateSite({ rootDir, outDir, template: TEMPLATE });

    assert.deepStrictEqual(report.pages.map(p => p.output), [
      'Projects/Deep/index.html',
      'Projects/alpha.html',
      'Projects/index.html',
      'intro.html',
      'index.html'
    ]);
    assert.deepStrictEqual(report.pages.map(p => p.kind), [
      'homepage',
      'singleton',
      'homepage',
      'singleton',
      'homepage'
    ]);
  });

  it('should record renderer warnings against their source', () => {
    const report = generateSite({ rootDir, outDir, template: TEMPLATE });

    assert.deepStrictEqual(report.errors, ['Projects/alpha.md: Unterminated code fence opened on line 1']);
  });

  it('should append sibling links to a homepage', () => {
    generateSite({ rootDir, outDir, template: TEMPLATE });
    const html = fs.readFileSync(path.join(outDir, 'Projects', 'index.html'), 'utf-8');

    assert.strictEqual(html, '<title>Projects</title><div id="placement">' + [
      '<h1>Projects</h1>',
      '<hr>',
      '<ul class="homepage-links">',
      '<li><a href="Deep/index.html">Deep</a></li>',
      '</ul>',
      '<ul class="article-links">',
      '<li><a href="alpha.html">alpha</a></li>',
      '</ul>'
    ].join('\n') + '</div>');
  });

  it('should write articles without links', () => {
    const report = generateSite({ rootDir, outDir, template: TEMPLATE });
    const html = fs.readFileSync(path.join(outDir, 'intro.html'), 'utf-8');

    assert.strictEqual(html, '<title>Intro</title><div id="placement"><p>Hello <em>world</em></p></div>');
    const intro = report.pages.find(p => p.output === 'intro.html');
    assert.deepStrictEqual(intro, { kind: 'singleton', source: 'intro.md', output: 'intro.html', title: 'Intro' });
  });

  it('should make the root a homepage when it has a README', () => {
    generateSite({ rootDir, outDir, template: TEMPLATE });
    const html = fs.readFileSync(path.join(outDir, 'index.html'), 'utf-8');

    assert.ok(html.includes('<h1>Home</h1>\n<hr>\n<ul class="homepage-links">\n<li><a href="Projects/index.html">Projects</a></li>\n</ul>'));
    assert.ok(html.includes('<li><a href="intro.html">intro</a></li>'));
  });

  it('should skip the root homepage when there is no README', () => {
    fs.rmSync(path.join(rootDir, 'README.md'));
    const report = generateSite({ rootDir, outDir, template: TEMPLATE });

    assert.ok(!report.pages.some(p => p.output === 'index.html'));
    assert.ok(!fs.existsSync(path.join(outDir, 'index.html')));
  });

  it('should throw when the root does not exist', () => {
    assert.throws(() => generateSite({ rootDir: path.join(rootDir, 'missing'), outDir, template: TEMPLATE }));
  });
});

describe('generateSite with the sample fixture', () => {
  let outDir: string;

  beforeEach(() => {
    outDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mdfolio-out-'));
  });

  afterEach(() => {
    fs.rmSync(outDir, { recursive: true, force: true });
  });

  it('should generate every page of the sample vault', () => {
    const rootDir = path.join(__dirname, 'fixtures', 'sample');
    const report = generateSite({ rootDir, outDir, template: TEMPLATE });

    assert.deepStrictEqual(report.errors, []);
    assert.deepStrictEqual(report.pages.map(p => p.source), [
      'Projects/Deep/README.md',
      'Projects/roadmap.md',
      'Projects/README.md',
      'pipeline_notes.md',
      'README.md'
    ]);
    assert.deepStrictEqual(report.pages.map(p => p.title), [
      'Deep',
      'Roadmap',
      'Projects',
      'Pipeline Notes',
      'Sample'
    ]);
  });
});

describe('convertFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mdfolio-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should write the page beside the input', () => {
    const inputPath = path.join(tempDir, 'my_notes.md');
    fs.writeFileSync(inputPath, '# Notes\nPlain text\n');

    const result = convertFile(inputPath, undefined, TEMPLATE);

    assert.strictEqual(result.outputPath, path.join(tempDir, 'my_notes.html'));
    assert.strictEqual(result.title, 'My Notes');
    assert.deepStrictEqual(result.warnings, []);
    assert.strictEqual(
      fs.readFileSync(result.outputPath, 'utf-8'),
      '<title>My Notes</title><div id="placement"><h1>Notes</h1>\n<p>Plain text</p></div>'
    );
  });

  it('should include math scripts for documents with math', () => {
    const inputPath = path.join(tempDir, 'calc.md');
    const outputPath = path.join(tempDir, 'out', 'calc.html');
    fs.writeFileSync(inputPath, 'Area is $r^2$ times pi\n');

    convertFile(inputPath, outputPath, TEMPLATE);

    assert.ok(fs.readFileSync(outputPath, 'utf-8').includes('MathJax-script'));
  });
});
