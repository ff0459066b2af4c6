import * as test from 'node:test';
import * as assert from 'node:assert';
import { assembleOutput, convertHtml, convertMarkdown, convertText } from '../convert.js';
import { SelectorError } from '../errors.js';

const { describe, it } = test;

const rule = (char: string) => char.repeat(79);
const spaces = (count: number) => ' '.repeat(count);

describe('convertHtml', () => {
  it('should convert a small document with a link', () => {
    const html = '<h1>Title</h1><p>See <a href="http://example.com/x">here</a>.</p>';
    const expected = [
      '*plug.txt*  Title',
      '',
      rule('='),
      'Contents ~',
      '',
      ` 1. Title${spaces(58)}|plug-title|`,
      ` 2. References${spaces(48)}|plug-references|`,
      '',
      rule('='),
      `${spaces(67)}*plug-title*`,
      'Title ~',
      '',
      'See here [1].',
      '',
      rule('='),
      `${spaces(62)}*plug-references*`,
      'References ~',
      '',
      '[1] http://example.com/x',
      '',
      'vim: ft=help',
    ].join('\n');
    assert.strictEqual(convertHtml(html, { embeddedFilename: 'plug.txt' }), expected);
  });

  it('should introduce text before the first heading', () => {
    const html = '<p>Intro text.</p><h2>Usage</h2><p>Use it.</p>';
    const output = convertHtml(html, { modeline: '' });
    const lines = output.split('\n');
    assert.strictEqual(lines[0], rule('='));
    assert.strictEqual(lines[1], 'Contents ~');
    assert.strictEqual(lines[3], ` 1. Introduction${spaces(49)}|introduction|`);
    assert.strictEqual(lines[4], ` 2. Usage${spaces(63)}|usage|`);
    assert.ok(output.includes('\nIntroduction ~\n\nIntro text.\n'));
    assert.ok(output.endsWith('\nUsage ~\n\nUse it.'));
  });

  it('should use the content element and skip ignored elements', () => {
    const html = [
      '<html><head><title>Doc Title</title></head><body>',
      '<div id="nav">Menu</div>',
      '<div id="content"><h3>Note <a class="anchor" href="#note">#</a></h3><p>Body text</p></div>',
      '</body></html>',
    ].join('');
    const output = convertHtml(html, { selectorsToIgnore: ['a.anchor'], modeline: '' });
    const lines = output.split('\n');
    assert.strictEqual(lines[0], 'Doc Title');
    assert.ok(lines.includes('Note ~'));
    assert.ok(lines.includes('Body text'));
    assert.ok(!output.includes('Menu'));
  });

  it('should prefer the given title', () => {
    const output = convertHtml('<h1>Heading</h1>', { title: 'Given', embeddedFilename: 'x.txt' });
    assert.strictEqual(output.split('\n')[0], '*x.txt*  Given');
  });

  it('should report invalid selectors', () => {
    assert.throws(() => convertHtml('<p>x</p>', { contentSelector: 'p:frobnicate' }), SelectorError);
  });

  it('should not list links to external documentation as references', () => {
    const html = '<p>Use <a href="http://vimdoc.sourceforge.net/htmldoc/eval.html#expand()">expand()</a> here.</p>';
    assert.strictEqual(convertHtml(html, { modeline: '' }), 'Use |expand()| here.');
  });

  it('should resolve relative links against the base URL', () => {
    const html = '<p><a href="guide.html">The guide</a></p>';
    const output = convertHtml(html, { baseURL: 'https://example.com/docs/', modeline: '' });
    assert.ok(output.includes('\n\nThe guide [1]\n\n'));
    assert.ok(output.endsWith('\n[1] https://example.com/docs/guide.html'));
  });

  it('should produce nothing for an empty document', () => {
    assert.strictEqual(convertHtml('<div></div>', { modeline: '' }), '');
  });

  it('should number repeated links to the same target once', () => {
    const html = '<p><a href="https://example.com/">one</a> <a href="https://example.com/">two</a></p>';
    const output = convertHtml(html, { modeline: '' });
    const lines = output.split('\n');
    assert.ok(lines.includes('one [1] two [1]'));
    assert.deepStrictEqual(lines.filter(line => line.startsWith('[')), ['[1] https://example.com/']);
    assert.ok(output.endsWith('\n[1] https://example.com/'));
  });

  it('should give a document of links an introduction', () => {
    const html = '<p><a href="https://example.com/">one</a></p>';
    const lines = convertHtml(html, { modeline: '' }).split('\n');
    assert.ok(lines.includes('Introduction ~'));
    assert.ok(lines.indexOf('Introduction ~') < lines.indexOf('one [1]'));
  });

  it('should re-indent preformatted text', () => {
    const html = '<pre>\n    line one\n      nested\n</pre>';
    assert.strictEqual(convertHtml(html, { modeline: '' }), '\n>\n  line one\n    nested\n<\n');
  });

  it('should keep the space between adjacent links', () => {
    const html = '<p><a href="#a">one</a> <a href="#b">two</a></p>';
    assert.strictEqual(convertHtml(html, { modeline: '' }), 'one two');
  });
});

describe('convertMarkdown', () => {
  it('should convert emphasis and headings', () => {
    const output = convertMarkdown('# Guide\n\nSome *text* here.\n', { embeddedFilename: 'guide.txt' });
    const lines = output.split('\n');
    assert.strictEqual(lines[0], '*guide.txt*  Guide');
    assert.ok(lines.includes(`${spaces(72)}*guide*`));
    assert.ok(output.endsWith('\nGuide ~\n\nSome _text_ here.\n\nvim: ft=help'));
  });

  it('should turn fenced code into a code block', () => {
    const output = convertMarkdown('Intro:\n\n```\nlet x = 1\n```\n', { modeline: '' });
    assert.strictEqual(output, 'Intro:\n>\n  let x = 1\n<\n');
  });

  it('should keep the space between inline elements', () => {
    assert.strictEqual(convertMarkdown('Use `foo` *or* `bar`.\n', { modeline: '' }), 'Use `foo` _or_ `bar`.');
  });
});

describe('convertText', () => {
  it('should treat text starting with a heading marker as Markdown', () => {
    assert.strictEqual(convertText('text *a*', { modeline: '' }), 'text *a*');
    assert.strictEqual(convertText('# T\n\ntext *a*', { modeline: '' }).split('\n').pop(), 'text _a_');
  });
});

describe('assembleOutput', () => {
  it('should add the modeline by default', () => {
    assert.strictEqual(assembleOutput('body', {}), 'body\n\nvim: ft=help');
  });

  it('should put the file tag and title on the first line', () => {
    assert.strictEqual(assembleOutput('body', { embeddedFilename: 'x.txt' }), '*x.txt*\n\nbody\n\nvim: ft=help');
    assert.strictEqual(assembleOutput('body', { title: 'T', modeline: '  ' }), 'T\n\nbody');
  });

  it('should append the modeline as given', () => {
    assert.strictEqual(assembleOutput('body', { modeline: ' vim: tw=60' }), 'body\n\n vim: tw=60');
  });
});
