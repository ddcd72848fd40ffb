export interface TagToken {
  /** Lower-cased tag name */
  name: string;
  start: number;
  /** Index just past the closing `>` */
  end: number;
  closing: boolean;
  raw: string;
}

interface Attribute {
  name: string;
  /** null for a bare boolean attribute */
  value: string | null;
}

// Their contents are text, not markup.
const RAW_TEXT_TAGS = new Set(['script', 'style', 'textarea']);

const TAG_OPEN = /^<(\/?)([a-zA-Z][a-zA-Z0-9:-]*)/;
const ATTRIBUTE = /([^\s"'<>/=]+)(?:\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'=<>`]+)))?/g;

function findTagEnd(html: string, from: number): number {
  let quote: string | null = null;
  for (let i = from; i < html.length; i++) {
    const c = html[i];
    if (quote) {
      if (c === quote) quote = null;
    } else if (c === '"' || c === "'") {
      quote = c;
    } else if (c === '>') {
      return i + 1;
    }
  }
  return -1;
}

/**
 * Walks the tags of an HTML fragment in document order. Comments and the
 * bodies of script/style/textarea are skipped; a `>` inside a quoted
 * attribute value does not end a tag.
 */
export function* scanTags(html: string, from = 0): Generator<TagToken> {
  let i = from;
  while (i < html.length) {
    const lt = html.indexOf('<', i);
    if (lt === -1) return;

    if (html.startsWith('<!--', lt)) {
      const close = html.indexOf('-->', lt + 4);
      if (close === -1) return;
      i = close + 3;
      continue;
    }

    const open = TAG_OPEN.exec(html.slice(lt, lt + 64));
    if (!open) {
      i = lt + 1;
      continue;
    }

    const end = findTagEnd(html, lt + open[0].length);
    if (end === -1) return;

    const name = (open[2] ?? '').toLowerCase();
    const closing = open[1] === '/';
    yield { name, start: lt, end, closing, raw: html.slice(lt, end) };
    i = end;

    if (!closing && RAW_TEXT_TAGS.has(name)) {
      const closeAt = html.toLowerCase().indexOf(`</${name}`, end);
      if (closeAt === -1) return;
      i = closeAt;
    }
  }
}

const REPLACEMENT_CHARACTER = '\uFFFD';

function fromCodePoint(codePoint: number): string {
  if (!(codePoint > 0) || codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
    return REPLACEMENT_CHARACTER;
  }
  return String.fromCodePoint(codePoint);
}

export function decodeEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#\d+|amp|quot|apos|lt|gt);/gi, (match, entity: string) => {
    const lower = entity.toLowerCase();
    if (lower.startsWith('#x')) return fromCodePoint(parseInt(lower.slice(2), 16));
    if (lower.startsWith('#')) return fromCodePoint(parseInt(lower.slice(1), 10));
    switch (lower) {
      case 'amp':
        return '&';
      case 'quot':
        return '"';
      case 'apos':
        return "'";
      case 'lt':
        return '<';
      case 'gt':
        return '>';
      default:
        return match;
    }
  });
}

export function escapeAttribute(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/"/g, '&quot;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * One opening tag as an editable attribute list. Attribute order is kept;
 * new attributes go at the end.
 */
export class HtmlTag {
  private constructor(
    readonly name: string,
    private attributes: Attribute[],
    private selfClosing: boolean
  ) {}

  static parse(raw: string): HtmlTag | null {
    const open = TAG_OPEN.exec(raw);
    if (!open || open[1] === '/') {
      return null;
    }
    const name = (open[2] ?? '').toLowerCase();
    const body = raw.slice(open[0].length).replace(/\/?>\s*$/, '');
    const attributes: Attribute[] = [];

    for (const match of body.matchAll(ATTRIBUTE)) {
      const attrName = (match[1] ?? '').toLowerCase();
      if (!attrName || attributes.some(attr => attr.name === attrName)) continue;
      const rawValue = match[2] ?? match[3] ?? match[4];
      attributes.push({ name: attrName, value: rawValue === undefined ? null : decodeEntities(rawValue) });
    }

    return new HtmlTag(name, attributes, /\/\s*>$/.test(raw));
  }

  static create(name: string, attributes: Record<string, string> = {}): HtmlTag {
    const tag = new HtmlTag(name.toLowerCase(), [], false);
    for (const [key, value] of Object.entries(attributes)) {
      tag.setAttribute(key, value);
    }
    return tag;
  }

  hasAttribute(name: string): boolean {
    return this.attributes.some(attr => attr.name === name.toLowerCase());
  }

  /** null when absent, '' for a bare attribute */
  getAttribute(name: string): string | null {
    const found = this.attributes.find(attr => attr.name === name.toLowerCase());
    if (!found) return null;
    return found.value ?? '';
  }

  setAttribute(name: string, value: string): this {
    const key = name.toLowerCase();
    const found = this.attributes.find(attr => attr.name === key);
    if (found) {
      found.value = value;
    } else {
      this.attributes.push({ name: key, value });
    }
    return this;
  }

  removeAttribute(name: string): this {
    const key = name.toLowerCase();
    this.attributes = this.attributes.filter(attr => attr.name !== key);
    return this;
  }

  classList(): string[] {
    return (this.getAttribute('class') ?? '').split(/\s+/).filter(Boolean);
  }

  hasClass(className: string): boolean {
    return this.classList().includes(className);
  }

  addClass(...classNames: string[]): this {
    const classes = this.classList();
    for (const className of classNames) {
      if (className && !classes.includes(className)) classes.push(className);
    }
    return this.setAttribute('class', classes.join(' '));
  }

  toString(): string {
    const attrs = this.attributes
      .map(attr => (attr.value === null ? attr.name : `${attr.name}="${escapeAttribute(attr.value)}"`))
      .join(' ');
    const head = attrs ? `<${this.name} ${attrs}` : `<${this.name}`;
    return this.selfClosing ? `${head} />` : `${head}>`;
  }
}
