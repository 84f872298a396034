import { SaxesParser } from 'saxes';
import { XmlParseError } from './types';

export interface XmlTextNode {
  kind: 'text';
  value: string;
}

export interface XmlElementNode {
  kind: 'element';
  name: string;
  attributes: Record<string, string>;
  children: XmlNode[];
  selfClosing: boolean;
  /** Source offset just past the start tag's `>`. */
  contentStart: number;
  /** Source offset of the end tag's `</`. Equals `contentStart` for self-closing elements. */
  contentEnd: number;
  rewritten: boolean;
}

export type XmlNode = XmlElementNode | XmlTextNode;

export interface DocumentTree {
  source: string;
  root: XmlElementNode;
}

type PlainParserOptions = { xmlns: false; position: true };

const INTERNAL_ENTITY = /<!ENTITY\s+([^\s%][^\s]*)\s+(["'])([^]*?)\2\s*>/g;

/** General entities with a literal value declared in a DOCTYPE's internal subset. */
export function readInternalEntities(doctype: string): Record<string, string> {
  const entities = new Map<string, string>();
  for (const match of doctype.matchAll(INTERNAL_ENTITY)) {
    const [, name, , value] = match;
    // First declaration wins.
    if (name && value !== undefined && !entities.has(name)) {
      entities.set(name, value);
    }
  }
  return Object.fromEntries(entities);
}

function escapeText(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function localName(name: string): string {
  return name.slice(name.indexOf(':') + 1);
}

export function tagMatches(element: XmlElementNode, name: string, matchLocalNames = false): boolean {
  return matchLocalNames ? localName(element.name) === localName(name) : element.name === name;
}

/**
 * Parses well-formed XML into an element tree that remembers where each
 * element's content sits in the source, so serialization can keep every
 * untouched byte as it was. Throws `XmlParseError` on malformed input.
 */
export function parseDocumentTree(source: string): DocumentTree {
  const parser = new SaxesParser<PlainParserOptions>({ xmlns: false, position: true });
  const stack: XmlElementNode[] = [];
  const roots: XmlElementNode[] = [];

  parser.on('opentag', (tag) => {
    const element: XmlElementNode = {
      kind: 'element',
      name: tag.name,
      attributes: { ...tag.attributes },
      children: [],
      selfClosing: tag.isSelfClosing,
      contentStart: parser.position,
      contentEnd: parser.position,
      rewritten: false
    };

    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(element);
    } else {
      roots.push(element);
    }
    stack.push(element);
  });

  parser.on('doctype', (doctype) => {
    for (const [name, value] of Object.entries(readInternalEntities(doctype))) {
      if (!Object.prototype.hasOwnProperty.call(parser.ENTITIES, name)) {
        parser.ENTITIES[name] = value;
      }
    }
  });

  parser.on('closetag', () => {
    const element = stack.pop();
    if (!element || element.selfClosing) {
      return;
    }
    element.contentEnd = source.lastIndexOf('</', parser.position - 1);
  });

  const appendText = (value: string): void => {
    stack[stack.length - 1]?.children.push({ kind: 'text', value });
  };
  parser.on('text', appendText);
  parser.on('cdata', appendText);

  try {
    parser.write(source).close();
  } catch (error) {
    throw new XmlParseError(error instanceof Error ? error.message : String(error));
  }

  const [root] = roots;
  if (!root) {
    throw new XmlParseError('Document has no root element.');
  }

  return { source, root };
}

export function textContent(element: XmlElementNode): string {
  let text = '';
  for (const child of element.children) {
    text += child.kind === 'text' ? child.value : textContent(child);
  }
  return text;
}

export function findChild(element: XmlElementNode, name: string, matchLocalNames = false): XmlElementNode | undefined {
  for (const child of element.children) {
    if (child.kind === 'element' && tagMatches(child, name, matchLocalNames)) {
      return child;
    }
  }
  return undefined;
}

export function setTextContent(element: XmlElementNode, value: string): void {
  if (element.selfClosing) {
    throw new Error(`Cannot set text content of self-closing element <${element.name}/>.`);
  }
  element.children = value ? [{ kind: 'text', value }] : [];
  element.rewritten = true;
}

function collectRewritten(element: XmlElementNode, into: XmlElementNode[]): void {
  if (element.rewritten) {
    into.push(element);
    return;
  }
  for (const child of element.children) {
    if (child.kind === 'element') {
      collectRewritten(child, into);
    }
  }
}

export function serializeDocumentTree(tree: DocumentTree): string {
  const rewritten: XmlElementNode[] = [];
  collectRewritten(tree.root, rewritten);

  let output = '';
  let cursor = 0;
  for (const element of rewritten) {
    output += tree.source.slice(cursor, element.contentStart);
    output += escapeText(textContent(element));
    cursor = element.contentEnd;
  }

  return output + tree.source.slice(cursor);
}
