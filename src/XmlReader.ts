import { readFile } from 'fs/promises';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { XmlElement, XmlParseResult } from './types.js';
import { errorMessage } from './errors.js';

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';
// fast-xml-parser renames this tag so it cannot collide with Object.prototype.
const RENAMED_PROTO_KEY = '#__proto__';

const PREDEFINED_ENTITIES = new Set(['amp', 'lt', 'gt', 'quot', 'apos']);
const REFERENCE_PATTERN = /&(#\d+;|#x[0-9a-fA-F]+;|[A-Za-z_][\w.-]*;)?/g;
const ENTITY_DECLARATION_PATTERN = /<!ENTITY\s+([A-Za-z_][\w.-]*)/g;

/**
 * Returns the local part of a tag name. Both Clark notation (`{uri}ThingDef`) and
 * prefixed names (`ns:ThingDef`) reduce to `ThingDef`. Case is preserved.
 */
export function localName(tag: string): string {
    if (!tag) return '';
    let name = tag;
    if (name.startsWith('{')) {
        const end = name.indexOf('}');
        if (end !== -1) name = name.slice(end + 1);
    }
    const colon = name.indexOf(':');
    return colon === -1 ? name : name.slice(colon + 1);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readAttributes(raw: unknown): Record<string, string> {
    const attributes: Record<string, string> = {};
    if (!isRecord(raw)) return attributes;
    for (const [key, value] of Object.entries(raw)) {
        const name = key.startsWith(ATTRIBUTE_PREFIX) ? key.slice(ATTRIBUTE_PREFIX.length) : key;
        attributes[name] = String(value);
    }
    return attributes;
}

// preserveOrder output is a list of single-key objects, one per node.
function toElements(nodes: unknown): { elements: XmlElement[]; text: string } {
    const elements: XmlElement[] = [];
    let text = '';
    if (!Array.isArray(nodes)) return { elements, text };

    for (const node of nodes) {
        if (!isRecord(node)) continue;
        for (const [key, value] of Object.entries(node)) {
            if (key === ATTRIBUTES_KEY) continue;
            if (key === TEXT_KEY) {
                text += String(value);
                continue;
            }
            if (key.startsWith('?') || key.startsWith('!')) continue;

            const inner = toElements(value);
            elements.push({
                tag: key === RENAMED_PROTO_KEY ? '__proto__' : key,
                attributes: readAttributes(node[ATTRIBUTES_KEY]),
                children: inner.elements,
                text: inner.text.trim()
            });
        }
    }

    return { elements, text };
}

function blank(text: string): string {
    return text.replace(/[^\n]/g, ' ');
}

function lineAt(xml: string, index: number): number {
    return xml.slice(0, index).split('\n').length;
}

/**
 * Catches what XMLValidator lets through: a reference to an undeclared entity, a bare `&`,
 * and a raw `<` inside an attribute value.
 */
function findMarkupError(xml: string): string | undefined {
    const declared = new Set<string>();
    // Blanking keeps offsets intact so reported lines match the original text.
    let body = xml.replace(/<!--[\s\S]*?-->|<!\[CDATA\[[\s\S]*?\]\]>|<\?[\s\S]*?\?>/g, blank);
    body = body.replace(/<!DOCTYPE(?:[^[>]|\[[\s\S]*?\])*>/g, doctype => {
        for (const match of doctype.matchAll(ENTITY_DECLARATION_PATTERN)) {
            declared.add(match[1]);
        }
        return blank(doctype);
    });

    for (const match of body.matchAll(REFERENCE_PATTERN)) {
        const reference: string | undefined = match[1];
        const line = lineAt(xml, match.index ?? 0);
        if (reference === undefined) {
            return `Unescaped '&' (line ${line})`;
        }
        const name = reference.slice(0, -1);
        if (!name.startsWith('#') && !PREDEFINED_ENTITIES.has(name) && !declared.has(name)) {
            return `Undefined entity '&${name};' (line ${line})`;
        }
    }

    let inTag = false;
    let quote = '';
    for (let i = 0; i < body.length; i++) {
        const ch = body[i];
        if (!inTag) {
            if (ch === '<') inTag = true;
        } else if (quote) {
            if (ch === quote) {
                quote = '';
            } else if (ch === '<') {
                return `Unescaped '<' in attribute value (line ${lineAt(xml, i)})`;
            }
        } else if (ch === '"' || ch === "'") {
            quote = ch;
        } else if (ch === '>') {
            inTag = false;
        }
    }

    return undefined;
}

export function parseXml(content: string): XmlParseResult {
    const xml = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
        const { msg, line } = validation.err;
        return { ok: false, reason: `${msg} (line ${line})` };
    }

    const markupError = findMarkupError(xml);
    if (markupError) {
        return { ok: false, reason: markupError };
    }

    const parser = new XMLParser({
        ignoreAttributes: false,
        attributeNamePrefix: ATTRIBUTE_PREFIX,
        textNodeName: TEXT_KEY,
        parseTagValue: false,
        parseAttributeValue: false,
        ignoreDeclaration: true,
        ignorePiTags: true,
        preserveOrder: true
    });

    try {
        const parsed: unknown = parser.parse(xml);
        const [root] = toElements(parsed).elements;
        if (!root) {
            return { ok: false, reason: 'No root element' };
        }
        return { ok: true, root };
    } catch (error) {
        return { ok: false, reason: errorMessage(error) };
    }
}

export class XmlReader {
    async readDocument(filePath: string): Promise<XmlParseResult> {
        let content: string;
        try {
            content = await readFile(filePath, 'utf-8');
        } catch (error) {
            return { ok: false, reason: errorMessage(error) };
        }
        return parseXml(content);
    }
}
