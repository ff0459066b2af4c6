import * as test from 'node:test';
import * as assert from 'node:assert';
import request from 'supertest';
import { createApp } from '../server.js';
import { LoadResult } from '../loader.js';

const { describe, it } = test;

function testData(): LoadResult {
  return {
    corpus: new Map([
      ['guide.md', '# Guide\n\nText.\n'],
      ['page.html', '<h1>Page</h1><p>Hello</p>'],
    ]),
    errors: [],
  };
}

describe('HTTP API', () => {
  const app = createApp(testData(), { selectorsToIgnore: [], ignoredLinkTargets: [], modeline: '' });

  it('should report health', async () => {
    const res = await request(app).get('/health');
    assert.strictEqual(res.status, 200);
    assert.deepStrictEqual(res.body, { status: 'ok', documents: 2 });
  });

  it('should list documents', async () => {
    const res = await request(app).get('/api/documents');
    assert.deepStrictEqual(res.body, ['guide.md', 'page.html']);
  });

  it('should return raw documents', async () => {
    const res = await request(app).get('/api/document/guide.md');
    assert.strictEqual(res.status, 200);
    assert.match(res.headers['content-type'], /^text\/markdown/);
    assert.strictEqual(res.text, '# Guide\n\nText.\n');
  });

  it('should answer 404 for unknown documents', async () => {
    const res = await request(app).get('/api/render/missing.md');
    assert.strictEqual(res.status, 404);
    assert.deepStrictEqual(res.body, { error: 'Document not found: missing.md' });
  });

  it('should render documents as help files', async () => {
    const res = await request(app).get('/api/render/page.html');
    assert.strictEqual(res.status, 200);
    assert.match(res.headers['content-type'], /^text\/plain/);
    assert.strictEqual(res.text.split('\n')[0], '*page.txt*  Page');
    assert.ok(res.text.endsWith('\nPage ~\n\nHello'));
  });

  it('should convert posted HTML', async () => {
    const res = await request(app)
      .post('/api/convert')
      .send({ html: '<p>Hello <b>you</b></p>' });
    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.text, 'Hello __you__');
  });

  it('should convert posted Markdown with options', async () => {
    const res = await request(app)
      .post('/api/convert')
      .send({ markdown: 'Plain *text*', options: { modeline: 'vim: tw=60' } });
    assert.strictEqual(res.status, 200);
    assert.strictEqual(res.text, 'Plain _text_\n\nvim: tw=60');
  });

  it('should require html or markdown', async () => {
    const res = await request(app).post('/api/convert').send({});
    assert.strictEqual(res.status, 400);
    assert.deepStrictEqual(res.body, { error: 'Payload must include html or markdown.' });
  });

  it('should reject malformed payloads', async () => {
    const res = await request(app).post('/api/convert').send({ html: 42 });
    assert.strictEqual(res.status, 400);
    assert.match(res.body.error, /^Invalid payload: html: /);
  });

  it('should report invalid selectors as bad requests', async () => {
    const res = await request(app)
      .post('/api/convert')
      .send({ html: '<p>x</p>', options: { contentSelector: 'p:frobnicate' } });
    assert.strictEqual(res.status, 400);
    assert.match(res.body.error, /^Invalid CSS selector "p:frobnicate"/);
  });

  it('should answer 404 for unknown routes', async () => {
    const res = await request(app).get('/nowhere');
    assert.strictEqual(res.status, 404);
  });
});
