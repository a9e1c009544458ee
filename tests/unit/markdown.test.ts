/**
 * Markdown Renderer Tests
 *
 * Rendering of common markdown and removal of anything executable.
 */

import { describe, it, expect } from 'vitest'
import { escapeHtml, renderMarkdown, sanitizeHtml } from '../../src/render/markdown'

describe('renderMarkdown', () => {
  it('renders headings, emphasis and paragraphs', () => {
    expect(renderMarkdown('# Hi')).toBe('<h1>Hi</h1>\n')
    expect(renderMarkdown('Some **bold** and *soft* text')).toBe(
      '<p>Some <strong>bold</strong> and <em>soft</em> text</p>\n'
    )
  })

  it('renders lists and fenced code', () => {
    const html = renderMarkdown('- one\n- two\n\n```\nlet x = 1\n```')
    expect(html).toContain('<ul>\n<li>one</li>\n<li>two</li>\n</ul>')
    expect(html).toContain('<pre><code>let x = 1\n</code></pre>')
  })

  it('renders GFM tables', () => {
    const html = renderMarkdown('| a | b |\n| - | - |\n| 1 | 2 |')
    expect(html).toContain('<table>')
    expect(html).toContain('<td>1</td>')
  })

  it('keeps a heading written on the same line as a script block', () => {
    const html = renderMarkdown('<script>alert(1)</script># Title')
    expect(html).toContain('<h1>Title</h1>')
    expect(html).not.toContain('<script')
    expect(html).not.toContain('alert')
  })

  it('parses text after a closing pre tag as a paragraph', () => {
    const html = renderMarkdown('<pre>a</pre> after')
    expect(html).toContain('<pre>a</pre>')
    expect(html).toContain('<p>after</p>')
  })

  it('removes script blocks and keeps the following heading', () => {
    const html = renderMarkdown('<script>alert(1)</script>\n# Title')
    expect(html).toContain('<h1>Title</h1>')
    expect(html).not.toContain('<script')
    expect(html).not.toContain('alert')
  })

  it('strips event handler attributes', () => {
    const html = renderMarkdown('<img src="x.png" onerror="alert(1)">')
    expect(html).toContain('<img src="x.png">')
    expect(html).not.toContain('onerror')
  })

  it('drops javascript: URLs but keeps the link text', () => {
    const html = renderMarkdown('[x](javascript:alert(1))')
    expect(html).toContain('<a>x</a>')
    expect(html).not.toContain('javascript:')
  })

  it('marks links as nofollow', () => {
    expect(renderMarkdown('[site](https://example.com)')).toBe(
      '<p><a href="https://example.com" rel="nofollow noopener noreferrer">site</a></p>\n'
    )
  })

  it('removes iframes, styles and forms', () => {
    const html = renderMarkdown(
      '<iframe src="https://example.com"></iframe>\n\n<p style="color:red">styled</p>\n\n<form><input></form>'
    )
    expect(html).not.toContain('<iframe')
    expect(html).not.toContain('style=')
    expect(html).not.toContain('<form')
    expect(html).not.toContain('<input')
    expect(html).toContain('<p>styled</p>')
  })

  it('shows HTML inside code spans as text', () => {
    expect(renderMarkdown('Use `<b>` tags')).toBe('<p>Use <code>&lt;b&gt;</code> tags</p>\n')
  })

  it('renders malformed markdown without throwing', () => {
    expect(() => renderMarkdown('**unclosed *emphasis [link](')).not.toThrow()
    expect(renderMarkdown('')).toBe('')
  })

  it('is deterministic', () => {
    const md = '# A\n\n[b](https://example.com) <img src=x onerror=y>'
    expect(renderMarkdown(md)).toBe(renderMarkdown(md))
  })
})

describe('sanitizeHtml', () => {
  it('keeps allowed markup untouched', () => {
    expect(sanitizeHtml('<p><em>ok</em></p>')).toBe('<p><em>ok</em></p>')
  })

  it('removes data attributes', () => {
    expect(sanitizeHtml('<span data-x="1">t</span>')).toBe('<span>t</span>')
  })
})

describe('escapeHtml', () => {
  it('escapes the five HTML-significant characters', () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
      '&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;'
    )
  })
})
