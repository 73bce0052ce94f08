import * as test from 'node:test';
import * as assert from 'node:assert';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import request from 'supertest';
import { createApp } from '../server.js';
import { SiteReport } from '../types.js';

const { describe, it, before, after } = test;

describe('preview server', () => {
  let rootDir: string;
  let outDir: string;

  const report: SiteReport = {
    pages: [
      { kind: 'homepage', source: 'README.md', output: 'index.html', title: 'Home' },
      { kind: 'singleton', source: 'guide.md', output: 'guide.html', title: 'Guide' }
    ],
    errors: ['guide.md: Unterminated code fence opened on line 9']
  };

  before(() => {
    rootDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mdfolio-root-'));
    outDir = fs.mkdtempSync(path.join(os.tmpdir(), 'mdfolio-out-'));
    fs.writeFileSync(path.join(rootDir, 'guide.md'), '# Guide\nText\n');
    fs.writeFileSync(path.join(outDir, 'index.html'), 'generated home');
  });

  after(() => {
    fs.rmSync(rootDir, { recursive: true, force: true });
    fs.rmSync(outDir, { recursive: true, force: true });
  });

  function app() {
    return createApp({ rootDir, report }, { outDir, logRequests: false });
  }

  it('should report health', async () => {
    const res = await request(app()).get('/health');
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, { status: 'ok', pages: 2 });
  });

  it('should list pages filtered by kind', async () => {
    const res = await request(app()).get('/api/pages?kind=singleton');
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, [report.pages[1]]);
  });

  it('should list generation errors', async () => {
    const res = await request(app()).get('/api/errors');
    assert.deepStrictEqual(res.body, report.errors);
  });

  it('should render a source file under the root', async () => {
    const res = await request(app()).get('/api/render?path=guide.md');
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, { html: '<h1>Guide</h1>\n<p>Text</p>', warnings: [] });
  });

  it('should refuse paths outside the root', async () => {
    const res = await request(app()).get('/api/render?path=../secret.md');
    assert.strictEqual(res.status, 400);
  });

  it('should answer 404 for a missing source file', async () => {
    const res = await request(app()).get('/api/render?path=missing.md');
    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(res.body, { error: 'Document not found: missing.md' });
  });

  it('should answer 404 for a directory named like a markdown file', async () => {
    fs.mkdirSync(path.join(rootDir, 'folder.md'));

    const res = await request(app()).get('/api/render?path=folder.md');
    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(res.body, { error: 'Document not found: folder.md' });
  });

  it('should require a path', async () => {
    const res = await request(app()).get('/api/render');
    assert.strictEqual(res.status, 400);
  });

  it('should render posted markdown', async () => {
    const res = await request(app()).post('/api/render').send({ markdown: 'Hi *there*' });
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, { html: '<p>Hi <em>there</em></p>', warnings: [] });
  });

  it('should render posted markdown as a homepage with sibling links', async () => {
    const res = await request(app())
      .post('/api/render')
      .send({ markdown: 'Hi', homepageDirs: ['Projects'], singletonArticles: ['About'] });

    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.body.html, [
      '<p>Hi</p>',
      '<hr>',
      '<ul class="homepage-links">',
      '<li><a href="Projects/index.html">Projects</a></li>',
      '</ul>',
      '<ul class="article-links">',
      '<li><a href="About.html">About</a></li>',
      '</ul>'
    ].join('\n'));
  });

  it('should answer 400 for invalid sibling lists', async () => {
    const res = await request(app())
      .post('/api/render')
      .send({ markdown: 'Hi', homepageDirs: null });

    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(res.body, { error: 'homepageDirs must be a list of names, got null' });
  });

  it('should answer 400 without markdown', async () => {
    const res = await request(app()).post('/api/render').send({});
    assert.strictEqual(res.status, 400);
  });

  it('should serve generated pages', async () => {
    const res = await request(app()).get('/index.html');
    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.text, 'generated home');
  });

  it('should answer 404 for anything else', async () => {
    const res = await request(app()).get('/nowhere');
    assert.strictEqual(res.status, 404);
  });
});
