import * as cheerio from 'cheerio'

const NON_CONTENT = 'script, style, noscript, template, svg'

/** Elements that can hold one repeated draw region. */
const REGION_SELECTOR = 'tr, li, article, section, div, p, dl, tbody, table, ul, ol'

const LINE_BREAKING = `${REGION_SELECTOR}, h1, h2, h3, h4, h5, h6, td, th`

/**
 * Parse a document for text scanning: non-content elements are dropped and
 * every element gets a trailing space so adjacent cells never fuse into one
 * token (`<td>01</td><td>02</td>` reads "01 02").
 */
export function loadHtml(payload: string): cheerio.CheerioAPI {
  const $ = cheerio.load(payload)
  $(NON_CONTENT).remove()
  $('br').replaceWith(' ')
  $('*').each((_, element) => {
    $(element).append(' ')
  })
  return $
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\u00A0/g, ' ').replace(/\s+/g, ' ').trim()
}

/**
 * Text of every candidate region that passes `accept` and has no
 * descendant region that also passes, in document order.
 */
export function innermostRegionTexts(
  $: cheerio.CheerioAPI,
  accept: (text: string) => boolean
): string[] {
  const regions = $(REGION_SELECTOR).toArray()
  const texts = new Map<(typeof regions)[number], string>()

  for (const element of regions) {
    const text = collapseWhitespace($(element).text())
    if (accept(text)) {
      texts.set(element, text)
    }
  }

  const innermost: string[] = []
  for (const [element, text] of texts) {
    const hasAcceptedDescendant = $(REGION_SELECTOR, element)
      .toArray()
      .some(descendant => texts.has(descendant))
    if (!hasAcceptedDescendant) {
      innermost.push(text)
    }
  }
  return innermost
}

/**
 * Whole-document text, one line per block-level element.
 */
export function documentLines($: cheerio.CheerioAPI): string[] {
  $(LINE_BREAKING).each((_, element) => {
    $(element).append('\n')
  })
  return $.root()
    .text()
    .split(/\r?\n/)
    .map(collapseWhitespace)
    .filter(Boolean)
}
