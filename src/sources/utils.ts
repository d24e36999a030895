/**
 * Shared helpers for reading markup trees produced by fast-xml-parser.
 *
 * With `ignoreAttributes: false`, an element carrying attributes becomes
 * `{ '#text': string, '@_attr': string }`; a text-only element becomes its
 * text; an element with children becomes an object keyed by child tag.
 */

export type XmlNode = Record<string, unknown>;

export function isXmlNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Walk a path of child tags, returning undefined as soon as a step is missing.
 * Array-valued steps follow their first element.
 */
export function pick(node: unknown, ...path: string[]): unknown {
    let current: unknown = node;
    for (const key of path) {
        const element = Array.isArray(current) ? current[0] : current;
        if (!isXmlNode(element)) return undefined;
        current = element[key];
    }
    return current;
}

/**
 * Normalize a value that may be a single element or a list into a list.
 */
export function asArray(value: unknown): unknown[] {
    if (value === undefined || value === null) return [];
    return Array.isArray(value) ? value : [value];
}

/**
 * Text content of an element, or undefined when it has none.
 */
export function textOf(value: unknown): string | undefined {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    if (isXmlNode(value)) return textOf(value['#text']);
    return undefined;
}

const NAMED_ENTITIES: Record<string, string> = {
    amp: '&',
    lt: '<',
    gt: '>',
    quot: '"',
    apos: "'",
    nbsp: ' ',
};

/**
 * Turn raw element content (as kept for stop nodes) into plain text:
 * inline tags removed, entities decoded, whitespace collapsed.
 * "<i>In vivo</i> effects of &amp;-receptors" → "In vivo effects of &-receptors"
 */
export function stripMarkup(raw: string): string {
    return raw
        .replace(/<[^>]*>/g, '')
        .replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity: string, body: string) => {
            if (body.startsWith('#')) {
                const hex = body[1] === 'x' || body[1] === 'X';
                const codePoint = hex ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
                return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : entity;
            }
            return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
        })
        .replace(/\s+/g, ' ')
        .trim();
}
