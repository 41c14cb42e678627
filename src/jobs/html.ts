/**
 * Minimal HTML helpers for job-posting pages handed to us by the fetching
 * collaborator. Regex plus tag balancing; enough for the handful of
 * selectors the platform extractors need.
 */

export function decodeHtmlEntities(input: string): string {
  return input
    .replace(/&nbsp;/gi, ' ')
    .replace(/&quot;/gi, '"')
    .replace(/&#39;|&apos;/gi, "'")
    .replace(/&lt;/gi, '<')
    .replace(/&gt;/gi, '>')
    .replace(/&#(\d+);/g, (_, code: string) => String.fromCodePoint(Number.parseInt(code, 10)))
    .replace(/&amp;/gi, '&');
}

export function extractVisibleTextFromHtml(html: string): string {
  const noScripts = html
    .replace(/<script[\s\S]*?<\/script>/gi, ' ')
    .replace(/<style[\s\S]*?<\/style>/gi, ' ')
    .replace(/<noscript[\s\S]*?<\/noscript>/gi, ' ')
    .replace(/<(nav|header|footer)\b[\s\S]*?<\/\1>/gi, ' ');
  const withLineBreaks = noScripts
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|li|h1|h2|h3|h4|h5|h6|tr|td|section|ul|ol)>/gi, '\n');
  const withoutTags = withLineBreaks.replace(/<[^>]+>/g, ' ');
  return decodeHtmlEntities(withoutTags)
    .replace(/[ \t]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export interface ElementSelector {
  tag?: string;
  id?: string;
  className?: string;
  attr?: { name: string; value: string };
}

const OPEN_TAG = /<([a-zA-Z][\w-]*)\b([^>]*)>/g;
const ATTRIBUTE = /([\w:-]+)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

function parseAttributes(raw: string): Map<string, string> {
  const attrs = new Map<string, string>();
  for (const match of raw.matchAll(ATTRIBUTE)) {
    attrs.set(match[1].toLowerCase(), match[2] ?? match[3] ?? '');
  }
  return attrs;
}

function matchesSelector(tag: string, attrs: Map<string, string>, selector: ElementSelector): boolean {
  if (selector.tag && selector.tag.toLowerCase() !== tag) return false;
  if (selector.id && attrs.get('id') !== selector.id) return false;
  if (selector.className) {
    const classes = (attrs.get('class') ?? '').split(/\s+/);
    if (!classes.includes(selector.className)) return false;
  }
  if (selector.attr && attrs.get(selector.attr.name.toLowerCase()) !== selector.attr.value) return false;
  return true;
}

function innerHtmlFrom(html: string, tag: string, contentStart: number): string {
  const scanner = new RegExp(`<(/?)${tag}\\b[^>]*>`, 'gi');
  scanner.lastIndex = contentStart;
  let depth = 1;
  for (let m = scanner.exec(html); m; m = scanner.exec(html)) {
    if (m[0].endsWith('/>')) continue;
    depth += m[1] === '/' ? -1 : 1;
    if (depth === 0) return html.slice(contentStart, m.index);
  }
  // Unclosed element: take the rest of the document.
  return html.slice(contentStart);
}

/** Inner HTML of the first element matching `selector`, or null. */
export function findElementHtml(html: string, selector: ElementSelector): string | null {
  for (const match of html.matchAll(OPEN_TAG)) {
    const tag = match[1].toLowerCase();
    if (!matchesSelector(tag, parseAttributes(match[2]), selector)) continue;
    if (match[0].endsWith('/>')) return '';
    return innerHtmlFrom(html, tag, (match.index ?? 0) + match[0].length);
  }
  return null;
}

/** Visible text of the first selector that matches with non-empty text. */
export function firstText(html: string, selectors: readonly ElementSelector[]): string | null {
  for (const selector of selectors) {
    const inner = findElementHtml(html, selector);
    if (inner === null) continue;
    const text = extractVisibleTextFromHtml(inner);
    if (text) return text;
  }
  return null;
}

export function metaContent(html: string, property: string): string | null {
  for (const match of html.matchAll(/<meta\b([^>]*)>/gi)) {
    const attrs = parseAttributes(match[1]);
    if (attrs.get('property') === property || attrs.get('name') === property) {
      const content = attrs.get('content')?.trim();
      if (content) return decodeHtmlEntities(content);
    }
  }
  return null;
}
