import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  findChild,
  localName,
  parseDocumentTree,
  readInternalEntities,
  serializeDocumentTree,
  setTextContent,
  textContent,
  type XmlElementNode
} from '../src/shared/xml/tree';
import { XmlParseError } from '../src/shared/xml/types';

function mustFind(parent: XmlElementNode, name: string, matchLocalNames = false): XmlElementNode {
  const child = findChild(parent, name, matchLocalNames);
  assert.ok(child, `expected <${name}> under <${parent.name}>`);
  return child;
}

function runStructureTests(): void {
  const tree = parseDocumentTree('<Root a="1" b=\'two\'><Item>x<!-- note --><![CDATA[<y>]]></Item><Empty/></Root>');

  assert.equal(tree.root.name, 'Root');
  assert.deepEqual(tree.root.attributes, { a: '1', b: 'two' });
  assert.deepEqual(tree.root.children.map((child) => child.kind === 'element' ? child.name : child.value), ['Item', 'Empty']);
  assert.equal(textContent(mustFind(tree.root, 'Item')), 'x<y>');
  assert.equal(mustFind(tree.root, 'Empty').selfClosing, true);
}

function runLookupTests(): void {
  const tree = parseDocumentTree('<R><A><B>1</B></A><B>2</B><B>3</B></R>');
  assert.equal(textContent(mustFind(tree.root, 'B')), '2');
  assert.equal(findChild(tree.root, 'C'), undefined);

  const prefixed = parseDocumentTree('<ns0:R xmlns:ns0="urn:test"><ns0:B>1</ns0:B></ns0:R>');
  assert.deepEqual(prefixed.root.attributes, { 'xmlns:ns0': 'urn:test' });
  assert.equal(findChild(prefixed.root, 'B'), undefined);
  assert.equal(textContent(mustFind(prefixed.root, 'B', true)), '1');

  assert.equal(localName('ns0:Code'), 'Code');
  assert.equal(localName('Code'), 'Code');
}

function runSerializationTests(): void {
  const source = '<?xml version="1.0" encoding="UTF-8"?>\r\n<!DOCTYPE Root>\r\n<!-- export -->\r\n<Root v=\'2\'  x="a &amp; b">\r\n  <C >6A</C >\r\n  <D>&#65;</D>\r\n</Root>\r\n';
  const tree = parseDocumentTree(source);
  assert.equal(serializeDocumentTree(tree), source);

  setTextContent(mustFind(tree.root, 'C'), '');
  assert.equal(
    serializeDocumentTree(tree),
    '<?xml version="1.0" encoding="UTF-8"?>\r\n<!DOCTYPE Root>\r\n<!-- export -->\r\n<Root v=\'2\'  x="a &amp; b">\r\n  <C ></C >\r\n  <D>&#65;</D>\r\n</Root>\r\n'
  );

  const escaped = parseDocumentTree('<R><C>old</C></R>');
  setTextContent(mustFind(escaped.root, 'C'), 'a<b&c');
  assert.equal(serializeDocumentTree(escaped), '<R><C>a&lt;b&amp;c</C></R>');

  const selfClosing = parseDocumentTree('<R><C/></R>');
  assert.throws(() => setTextContent(mustFind(selfClosing.root, 'C'), 'x'), /self-closing/);
}

function runInternalEntityTests(): void {
  const doctype = ' Root [<!ENTITY six "6A"><!ENTITY % param "x"><!ENTITY ext SYSTEM "ext.xml"><!ENTITY six \'7B\'>]';
  assert.deepEqual(readInternalEntities(doctype), { six: '6A' });
  assert.deepEqual(readInternalEntities(' Root'), {});

  const tree = parseDocumentTree('<!DOCTYPE R [<!ENTITY who "Ouvriers">]><R><D>&who; &amp; co</D></R>');
  assert.equal(textContent(mustFind(tree.root, 'D')), 'Ouvriers & co');
}

function runParseFailureTests(): void {
  assert.throws(() => parseDocumentTree('<Root><PositionStatus><Code>6A</Code>'), (error: unknown) => {
    assert.ok(error instanceof XmlParseError);
    assert.match(error.message, /unclosed tag/);
    return true;
  });
  assert.throws(() => parseDocumentTree('<a><b></a>'), XmlParseError);
  assert.throws(() => parseDocumentTree(''), XmlParseError);
  assert.throws(() => parseDocumentTree('<a>&unknown;</a>'), XmlParseError);
}

test('parses elements, attributes and character data', runStructureTests);
test('looks up direct children by exact or local name', runLookupTests);
test('serializes untouched bytes verbatim and rewrites only changed content', runSerializationTests);
test('reads internal DTD entities', runInternalEntityTests);
test('malformed XML raises XmlParseError', runParseFailureTests);
