/**
 * Regex-based helpers for the small, flat XML documents the upstream APIs return.
 * They do not validate structure; callers treat a missing tag as absent data.
 */

export interface XmlElement {
  attributes: Record<string, string>;
  body: string;
}

const ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

export function decodeEntities(value: string): string {
  return value
    .replace(/<!\[CDATA\[([\s\S]*?)\]\]>/g, '$1')
    .replace(/&(#x[0-9a-f]+|#\d+|\w+);/gi, (whole, entity: string) => {
      if (entity.startsWith('#x') || entity.startsWith('#X')) {
        return String.fromCodePoint(Number.parseInt(entity.slice(2), 16));
      }
      if (entity.startsWith('#')) {
        return String.fromCodePoint(Number.parseInt(entity.slice(1), 10));
      }
      return ENTITIES[entity.toLowerCase()] ?? whole;
    });
}

export function extractTag(block: string, tag: string): string | undefined {
  const regex = new RegExp(`<(?:\\w+:)?${tag}(?:\\s[^>]*)?>([\\s\\S]*?)<\\/(?:\\w+:)?${tag}>`, 'i');
  const match = block.match(regex);
  const value = match?.[1];
  return value === undefined ? undefined : decodeEntities(value).trim();
}

export function parseAttributes(raw: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  const attrRegex = /([\w:-]+)\s*=\s*("([^"]*)"|'([^']*)')/g;
  let match: RegExpExecArray | null;
  while ((match = attrRegex.exec(raw)) !== null) {
    attributes[match[1]] = decodeEntities(match[3] ?? match[4] ?? '');
  }
  return attributes;
}

/**
 * Returns every element named `tag`, including self-closing ones (with an empty body).
 */
export function extractElements(xml: string, tag: string): XmlElement[] {
  const elements: XmlElement[] = [];
  const regex = new RegExp(
    `<(?:\\w+:)?${tag}(\\s[^>]*?)?(?:\\/>|>([\\s\\S]*?)<\\/(?:\\w+:)?${tag}>)`,
    'gi',
  );
  let match: RegExpExecArray | null;
  while ((match = regex.exec(xml)) !== null) {
    elements.push({
      attributes: parseAttributes(match[1] ?? ''),
      body: match[2] ?? '',
    });
  }
  return elements;
}
