import { describe, expect, it, vi } from 'vitest';
import { ContentAdapter, withTitle } from '../../src/services/content-adapter.js';
import { MarkdownRenderer } from '../../src/services/rendering/markdown-renderer.js';
import { InlineHtmlRenderer } from '../../src/services/rendering/inline-html-renderer.js';
import { PlainTextRenderer, stripHtmlTags } from '../../src/services/rendering/plain-text-renderer.js';
import type { ContentRenderer } from '../../src/services/rendering/types.js';
import { logThought } from '../../src/utils/logger.js';

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

const throwingMarkdown: ContentRenderer = {
  format: 'markdown',
  render: () => {
    throw new Error('parser exploded');
  },
};

describe('stripHtmlTags', () => {
  it('drops markup, comments and scripts and decodes common entities', () => {
    expect(stripHtmlTags('<!-- c --><p>Caf&eacute; &copy; 2024&nbsp;&amp; more</p><script>x()</script>')).toBe(
      'Caf © 2024 & more',
    );
  });

  it('returns an empty string for blank input', () => {
    expect(stripHtmlTags('')).toBe('');
    expect(stripHtmlTags('   ')).toBe('');
  });

  it('copes with malformed angle brackets', () => {
    expect(stripHtmlTags('<<<>>>')).toBe('>>');
  });

  it('removes inline tags without adding space and separates blocks', () => {
    expect(stripHtmlTags('a<b>c</b>')).toBe('ac');
    expect(stripHtmlTags('<p>One</p><p>Two<br/>Three</p>')).toBe('One Two Three');
  });
});

describe('MarkdownRenderer', () => {
  const renderer = new MarkdownRenderer();

  it('renders headings and paragraphs with Slack bold markers', () => {
    expect(renderer.render('<h1>Hi</h1><p>Party Friday</p>')).toBe('*Hi*\n\nParty Friday');
  });

  it('renders containers, lists and links', () => {
    const html =
      '<div><span>Hello&nbsp;there</span></div><ul><li>One</li><li>Two</li></ul><a href="https://example.com/x">Link</a>';

    expect(renderer.render(html)).toBe('Hello there\n- One\n- Two\n\n<https://example.com/x|Link>');
  });

  it('collapses links whose label is the address', () => {
    expect(renderer.render('<a href="https://example.com">https://example.com</a>')).toBe('<https://example.com>');
    expect(renderer.render('<a>no address</a>')).toBe('no address');
  });

  it('renders italics and drops empty emphasis', () => {
    expect(renderer.render('<p><em>Note</em> bring boots<b> </b></p>')).toBe('_Note_ bring boots');
  });

  it('escapes literal ampersands and angle brackets', () => {
    expect(renderer.render('<p>Tom &amp; Jerry &lt;3</p>')).toBe('Tom &amp; Jerry &lt;3');
  });

  it('closes unclosed tags', () => {
    expect(renderer.render('<p>Unclosed <b>bold')).toBe('Unclosed *bold*');
  });

  it('drops style and script content', () => {
    expect(renderer.render('<style>p { color: red }</style><p>Visible</p><script>alert(1)</script>')).toBe('Visible');
  });

  it('returns an empty string for blank input', () => {
    expect(renderer.render('')).toBe('');
    expect(renderer.render('<p></p>')).toBe('');
  });

  it('falls back to tag stripping when only angle brackets remain', () => {
    expect(renderer.render('<<<>>>')).toBe('>>');
  });
});

describe('InlineHtmlRenderer', () => {
  const renderer = new InlineHtmlRenderer();

  it('keeps only the tags Telegram understands', () => {
    expect(renderer.render('<h1>Hi</h1><p>Party Friday</p>')).toBe('<b>Hi</b>\n\nParty Friday');
    expect(renderer.render('<p><strong>Trip</strong> on <em>Monday</em>, <u>bring lunch</u></p>')).toBe(
      '<b>Trip</b> on <i>Monday</i>, <u>bring lunch</u>',
    );
  });

  it('flattens other elements to escaped text', () => {
    expect(renderer.render('<p>Tom &amp; Jerry &lt;3</p><a href="https://example.com">site</a>')).toBe(
      'Tom &amp; Jerry &lt;3\n\nsite',
    );
  });

  it('turns breaks and non-breaking spaces into plain whitespace', () => {
    expect(renderer.render('<div>Line&nbsp;one<br>Line two</div>')).toBe('Line one\nLine two');
  });

  it('closes unclosed tags', () => {
    expect(renderer.render('<p>Unclosed <b>bold')).toBe('Unclosed <b>bold</b>');
  });
});

describe('ContentAdapter', () => {
  it('always renders plain text plus every requested format', () => {
    const adapter = new ContentAdapter();

    const rendered = adapter.render('<h1>Hi</h1><p>Party Friday</p>', ['markdown', 'html', 'plain']);

    expect(rendered).toEqual({
      plain: 'Hi Party Friday',
      markdown: '*Hi*\n\nParty Friday',
      html: '<b>Hi</b>\n\nParty Friday',
    });
  });

  it('renders only plain text when no format is requested', () => {
    expect(new ContentAdapter().render('<p>Hello</p>')).toEqual({ plain: 'Hello' });
  });

  it('falls back to plain text when a renderer throws', () => {
    const adapter = new ContentAdapter([throwingMarkdown, new PlainTextRenderer()]);

    const rendered = adapter.render('<p>Hello <b>world</b></p>', ['markdown']);

    expect(rendered).toEqual({ plain: 'Hello world', markdown: 'Hello world' });
    expect(logThought).toHaveBeenCalledWith(
      '[ContentAdapter] markdown rendering failed, using plain text: parser exploded',
    );
  });

  it('skips formats without a renderer', () => {
    const adapter = new ContentAdapter([new PlainTextRenderer()]);

    expect(adapter.formats).toEqual(['plain']);
    expect(adapter.render('<p>Hello</p>', ['html'])).toEqual({ plain: 'Hello' });
  });

  it('replaces a renderer registered for the same format', () => {
    const adapter = new ContentAdapter([new MarkdownRenderer(), new InlineHtmlRenderer(), new PlainTextRenderer()]);
    adapter.register({ format: 'html', render: (html) => `custom:${html.length}` });

    expect(adapter.formats).toEqual(['markdown', 'html', 'plain']);
    expect(adapter.render('<p>x</p>', ['html']).html).toBe('custom:8');
  });
});

describe('withTitle', () => {
  it('prefixes every non-empty rendering with a title in its own format', () => {
    expect(withTitle({ plain: 'Hi', markdown: '*Hi*', html: '' }, 'Week 1 & 2')).toEqual({
      plain: 'Week 1 & 2\n\nHi',
      markdown: '*Week 1 &amp; 2*\n\n*Hi*',
      html: '',
    });
  });
});
