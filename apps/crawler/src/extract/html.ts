import * as cheerio from 'cheerio'
import { hasChildren, isText, type AnyNode } from 'domhandler'
import { normalizeUrl } from '../utils/url.js'

export const MAX_TITLE_LENGTH = 500
export const MAX_CONTENT_LENGTH = 50000
export const MAX_LINK_TEXT_LENGTH = 500

/** Elements whose text never counts as page content. */
const STRIPPED_ELEMENTS = 'script, style, nav, footer, header'

const SKIPPED_HREF_PREFIXES = ['mailto:', 'tel:', 'javascript:']

export interface ExtractedLink {
  url: string
  text: string | null
}

export interface ExtractedPage {
  title: string | null
  content: string
  links: ExtractedLink[]
}

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

/**
 * Text nodes joined with a space, so adjacent block elements don't run together.
 */
function visibleText(nodes: AnyNode[]): string {
  const parts: string[] = []
  const walk = (node: AnyNode): void => {
    if (isText(node)) {
      const text = node.data.trim()
      if (text) parts.push(text)
    } else if (hasChildren(node)) {
      for (const child of node.children) walk(child)
    }
  }
  for (const node of nodes) walk(node)
  return collapseWhitespace(parts.join(' '))
}

/**
 * Resolve `href` against the page URL. Null for skipped schemes and unresolvable values.
 */
export function resolveLink(href: string, baseUrl: string): string | null {
  const trimmed = href.trim()
  const lowered = trimmed.toLowerCase()
  if (!trimmed || SKIPPED_HREF_PREFIXES.some((prefix) => lowered.startsWith(prefix))) {
    return null
  }

  let resolved: URL
  try {
    resolved = new URL(trimmed, baseUrl)
  } catch {
    return null
  }

  if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
    return null
  }

  return normalizeUrl(resolved.href)
}

/**
 * Pull title, visible text and outgoing links from a fetched page.
 *
 * @param finalUrl - URL after redirects; relative links resolve against it
 */
export function extractPage(html: string, finalUrl: string): ExtractedPage {
  const $ = loadHtml(html)
  $(STRIPPED_ELEMENTS).remove()

  const rawTitle = collapseWhitespace($('title').first().text())
  const title = rawTitle ? rawTitle.slice(0, MAX_TITLE_LENGTH) : null

  const content = visibleText($.root().toArray()).slice(0, MAX_CONTENT_LENGTH)

  const links: ExtractedLink[] = []
  $('a[href]').each((_, element) => {
    const href = $(element).attr('href')
    if (href === undefined) return

    const url = resolveLink(href, finalUrl)
    if (url === null) return

    const text = collapseWhitespace($(element).text())
    links.push({ url, text: text ? text.slice(0, MAX_LINK_TEXT_LENGTH) : null })
  })

  return { title, content, links }
}
