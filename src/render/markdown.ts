/**
 * Markdown Renderer - renders a post body to sanitized HTML.
 *
 * Uses `marked` for GFM parsing and `DOMPurify` for XSS sanitization.
 * Every call sanitizes; there is no path that returns unsanitized HTML,
 * and nothing is cached between calls.
 *
 * @module render/markdown
 */

import { Marked } from 'marked'
import DOMPurify from 'isomorphic-dompurify'
import { logger } from '../utils/logger'

/**
 * Closing tag of an element whose HTML block runs to the end of its line
 */
const RAW_BLOCK_CLOSE = /(<\/(?:script|style|pre|textarea)\s*>)[ \t]*(?=\S)/gi

/**
 * Start a new line after a raw block's closing tag, so markdown that follows
 * on the same line is parsed as markdown instead of joining the HTML block.
 */
function splitRawBlocks(md: string): string {
  return md.replace(RAW_BLOCK_CLOSE, '$1\n')
}

const marked = new Marked({
  gfm: true,
  breaks: false,
  async: false,
  hooks: {
    preprocess: splitRawBlocks,
  },
})

/**
 * Tags kept by the sanitizer: text formatting, structure, lists, tables,
 * links and images. Anything else is removed.
 */
export const ALLOWED_TAGS = [
  'a', 'abbr', 'b', 'blockquote', 'br', 'caption', 'cite', 'code', 'dd', 'del',
  'details', 'dfn', 'div', 'dl', 'dt', 'em', 'figcaption', 'figure',
  'h1', 'h2', 'h3', 'h4', 'h5', 'h6', 'hr', 'i', 'img', 'ins', 'kbd',
  'li', 'mark', 'ol', 'p', 'pre', 'q', 's', 'samp', 'small', 'span', 'strike',
  'strong', 'sub', 'summary', 'sup', 'table', 'tbody', 'td', 'tfoot', 'th',
  'thead', 'tr', 'u', 'ul', 'var',
]

/**
 * Attributes kept on allowed tags. Event handlers and `style` never appear
 * here.
 */
export const ALLOWED_ATTR = [
  'align', 'alt', 'cite', 'class', 'colspan', 'datetime', 'height', 'href',
  'lang', 'open', 'rel', 'rowspan', 'scope', 'src', 'start', 'title', 'width',
]

/**
 * http(s), mailto and relative URLs only
 */
const ALLOWED_URI_REGEXP = /^(?:(?:https?|mailto):|[^a-z]|[a-z+.-]+(?:[^a-z+.\-:]|$))/i

const SANITIZE_CONFIG = {
  ALLOWED_TAGS,
  ALLOWED_ATTR,
  ALLOWED_URI_REGEXP,
  ALLOW_DATA_ATTR: false,
}

const LINK_REL = 'nofollow noopener noreferrer'

function isElement(node: Node): node is Element {
  return node.nodeType === 1
}

// Every surviving link in user content gets LINK_REL.
DOMPurify.addHook('afterSanitizeAttributes', (node) => {
  if (isElement(node) && node.tagName === 'A' && node.hasAttribute('href')) {
    node.setAttribute('rel', LINK_REL)
  }
})

/**
 * Escape text for literal display inside HTML
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

/**
 * Sanitize an HTML fragment against the allow-list
 */
export function sanitizeHtml(html: string): string {
  return DOMPurify.sanitize(html, SANITIZE_CONFIG)
}

function expand(md: string): string {
  try {
    const raw = marked.parse(md)
    if (typeof raw === 'string') {
      return raw
    }
    logger.warn('Markdown parser returned a promise; rendering body as text')
  } catch (error) {
    logger.warn('Markdown parsing failed; rendering body as text', error)
  }
  return `<p>${escapeHtml(md)}</p>`
}

/**
 * Render an untrusted markdown body to display-safe HTML.
 *
 * Deterministic and never throws: markup the parser rejects is shown as
 * escaped text.
 *
 * @example
 * ```typescript
 * renderMarkdown('# Title\n\n<script>alert(1)</script>')
 * // '<h1>Title</h1>\n'
 * ```
 */
export function renderMarkdown(md: string): string {
  return sanitizeHtml(expand(md))
}
