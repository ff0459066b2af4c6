import * as test from 'node:test';
import * as assert from 'node:assert';
import { renderDocument, renderInlineText, RenderOptions } from '../renderer.js';
import { deduplicateDelimiters } from '../delimiters.js';
import { linkParents, text } from '../tree.js';
import { DEFAULT_EXTERNAL_DOC_PREFIX } from '../links.js';
import { RenderError } from '../errors.js';
import { DocNode, Heading, ListItem, Reference } from '../types.js';

const { describe, it } = test;

const doc = (...children: DocNode[]): DocNode => ({ kind: 'blockSequence', children });
const p = (...children: DocNode[]): DocNode => ({ kind: 'paragraph', children });
const li = (...children: DocNode[]): ListItem => ({ kind: 'listItem', children });
const code = (value: string): DocNode => ({ kind: 'code', text: value });
const reference = (number: number, target: string): Reference => ({ kind: 'reference', number, target });

function render(root: DocNode, options: RenderOptions = {}): string {
  return deduplicateDelimiters(renderDocument(linkParents(root), options)).map(String).join('');
}

describe('renderDocument headings', () => {
  it('should underline untagged headings with a rule and a marker', () => {
    const heading: Heading = { kind: 'heading', level: 1, children: [text('Title')] };
    assert.strictEqual(render(doc(heading), { width: 20 }), `${'='.repeat(20)}\nTitle ~`);
  });

  it('should right-align the tag of subheadings', () => {
    const heading: Heading = { kind: 'heading', level: 2, children: [text('Options')], tag: 'plug-options' };
    assert.strictEqual(
      render(doc(heading), { width: 30 }),
      `${'-'.repeat(30)}\n${' '.repeat(16)}*plug-options*\nOptions ~`,
    );
  });

  it('should mark a tag that occurs in the heading text in place', () => {
    const heading: Heading = {
      kind: 'heading',
      level: 1,
      children: [text('The '), code('g:plug_enabled'), text(' option')],
      tag: 'g:plug_enabled',
    };
    assert.strictEqual(render(doc(heading)), `${'='.repeat(79)}\nThe *g:plug_enabled* option`);
  });
});

describe('renderDocument inline markup', () => {
  it('should mark emphasis and strong text', () => {
    const root = doc(p(
      text('Hello '),
      { kind: 'emphasis', children: [text('big ')] },
      { kind: 'strong', children: [text('world')] },
      text('.'),
    ));
    assert.strictEqual(render(root), 'Hello _big_ __world__.');
  });

  it('should quote code with a quote it does not contain', () => {
    const root = doc(p(text('Run '), code('make'), text(' or '), code("it's `x`")));
    assert.strictEqual(render(root), 'Run `make` or "it\'s `x`"');
  });

  it('should number links with a reference', () => {
    const root = doc(p({
      kind: 'hyperLink',
      target: 'https://example.com/',
      children: [text('site')],
      reference: reference(2, 'https://example.com/'),
    }));
    assert.strictEqual(render(root), 'site [2]');
  });

  it('should turn documentation links into tag references', () => {
    const root = doc(p(
      text('See '),
      { kind: 'hyperLink', target: `${DEFAULT_EXTERNAL_DOC_PREFIX}eval.html#expand()`, children: [text('expand()')] },
      text('.'),
    ));
    assert.strictEqual(render(root, { externalDocPrefix: DEFAULT_EXTERNAL_DOC_PREFIX }), 'See |expand()|.');
  });

  it('should indent a paragraph holding only an image', () => {
    const root = doc(p({ kind: 'image', src: 'logo.png', alt: 'Logo', reference: reference(1, 'logo.png') }));
    assert.strictEqual(render(root), '  Image: Logo (see reference [1])');
  });

  it('should indent an image paragraph despite surrounding whitespace', () => {
    const image: DocNode = { kind: 'image', src: 'logo.png', alt: 'Logo', reference: reference(1, 'logo.png') };
    assert.strictEqual(render(doc(p(text('\n'), image, text(' ')))), '  Image: Logo (see reference [1])');
  });
});

describe('renderDocument blocks', () => {
  it('should mark preformatted text as a code block', () => {
    const root = doc(p(text('Example:')), { kind: 'preformatted', text: 'let x = 1\n\nlet y = 2' });
    assert.strictEqual(render(root), 'Example:\n>\n  let x = 1\n\n  let y = 2\n<\n');
  });

  it('should render references and contents entries on their own lines', () => {
    const root = doc(
      { kind: 'tocEntry', number: 1, text: 'Intro', indent: 1, tag: 'plug-intro' },
      reference(1, 'https://example.com/'),
    );
    assert.strictEqual(
      render(root, { width: 30 }),
      ` 1. Intro${' '.repeat(9)}|plug-intro|\n[1] https://example.com/`,
    );
  });
});

describe('renderDocument lists', () => {
  it('should render compact unordered lists', () => {
    const root = doc({ kind: 'list', ordered: false, children: [li(text('one')), li(text('two'))] });
    assert.strictEqual(render(root), '- one\n- two');
  });

  it('should number ordered lists', () => {
    const root = doc({ kind: 'list', ordered: true, children: [li(text('one')), li(text('two'))] });
    assert.strictEqual(render(root), '1. one\n2. two');
  });

  it('should separate items by blank lines when they are long', () => {
    const root = doc({
      kind: 'list',
      ordered: false,
      children: [
        li(p(text('first')), p(text('second'))),
        li(p(text('third')), p(text('fourth'))),
      ],
    });
    assert.strictEqual(render(root), '- first\n\n  second\n\n- third\n\n  fourth');
  });

  it('should indent nested lists', () => {
    const root = doc({
      kind: 'list',
      ordered: false,
      children: [li(text('outer'), { kind: 'list', ordered: false, children: [li(text('inner'))] })],
    });
    assert.strictEqual(render(root), '- outer\n\n  - inner');
  });

  it('should render a list written directly inside a list with the item before it', () => {
    const root = doc({
      kind: 'list',
      ordered: false,
      children: [li(text('a')), { kind: 'list', ordered: false, children: [li(text('b'))] }],
    });
    assert.strictEqual(render(root), '- a\n\n  - b');
  });

  it('should ignore whitespace between items', () => {
    const root = doc({ kind: 'list', ordered: false, children: [text('\n'), li(text('one')), text('\n'), li(text('two')), text('\n')] });
    assert.strictEqual(render(root), '- one\n- two');
  });

  it('should refuse lists without items', () => {
    const tree = linkParents(doc({ kind: 'list', ordered: false, children: [] }));
    assert.throws(() => renderDocument(tree), RenderError);
  });
});

describe('renderInlineText', () => {
  it('should render code in headings literally', () => {
    const heading: Heading = { kind: 'heading', level: 1, children: [text('The  '), code('run()'), text(' call')] };
    const tree = linkParents(doc(heading));
    assert.strictEqual(renderInlineText(tree, heading.children), 'The run() call');
  });
});
