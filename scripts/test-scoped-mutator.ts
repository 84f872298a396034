import assert from 'node:assert/strict';
import { test } from 'node:test';
import { cleanPositionStatus } from '../src/shared/xml/mutator';
import type { CleaningOutcome, CleaningSuccess } from '../src/shared/xml/types';

function expectCleaned(outcome: CleaningOutcome): CleaningSuccess {
  assert.equal(outcome.ok, true, outcome.ok ? '' : outcome.reason);
  assert.ok(outcome.ok);
  return outcome;
}

const MATCHING_BLOCK = '<PositionStatus><Code>6A</Code><Description>Ouvriers</Description></PositionStatus>';
const CLEARED_BLOCK = '<PositionStatus><Code></Code><Description></Description></PositionStatus>';

function runSingleBlockTests(): void {
  const outcome = expectCleaned(cleanPositionStatus(`<Root>${MATCHING_BLOCK}</Root>`));
  assert.equal(outcome.cleanedText, `<Root>${CLEARED_BLOCK}</Root>`);
  assert.equal(outcome.modifications, 2);
  assert.ok(outcome.durationMs >= 0);
}

function runMultiBlockTests(): void {
  const other = '<PositionStatus><Code>6B</Code><Description>Employés</Description></PositionStatus>';
  const mixed = expectCleaned(cleanPositionStatus(`<Root>${MATCHING_BLOCK}${other}</Root>`));
  assert.equal(mixed.cleanedText, `<Root>${CLEARED_BLOCK}${other}</Root>`);
  assert.equal(mixed.modifications, 2);

  const input = `<Root><Batch>${MATCHING_BLOCK}<Note>keep</Note>${MATCHING_BLOCK}</Batch>${MATCHING_BLOCK}</Root>`;
  const many = expectCleaned(cleanPositionStatus(input));
  assert.equal(many.modifications, 6);
  assert.equal(many.cleanedText, `<Root><Batch>${CLEARED_BLOCK}<Note>keep</Note>${CLEARED_BLOCK}</Batch>${CLEARED_BLOCK}</Root>`);
}

function runPartialMatchTests(): void {
  const onlyCode = expectCleaned(cleanPositionStatus(
    '<Root><PositionStatus><Code>6A</Code><Description>Employés</Description></PositionStatus></Root>'
  ));
  assert.equal(onlyCode.modifications, 1);
  assert.equal(onlyCode.cleanedText, '<Root><PositionStatus><Code></Code><Description>Employés</Description></PositionStatus></Root>');

  const noFields = expectCleaned(cleanPositionStatus('<Root><PositionStatus><Other>6A</Other></PositionStatus></Root>'));
  assert.equal(noFields.modifications, 0);
}

function runExactValueTests(): void {
  const inputs = [
    '<Root><PositionStatus><Code> 6A </Code></PositionStatus></Root>',
    '<Root><PositionStatus><Code>6a</Code></PositionStatus></Root>',
    '<Root><PositionStatus><Description>ouvriers</Description></PositionStatus></Root>',
    '<Root><PositionStatus><Description>Ouvriers\n</Description></PositionStatus></Root>'
  ];

  for (const input of inputs) {
    const outcome = expectCleaned(cleanPositionStatus(input));
    assert.equal(outcome.modifications, 0);
    assert.equal(outcome.cleanedText, input);
  }
}

function runScopeTests(): void {
  const input = '<Root><Code>6A</Code><Description>Ouvriers</Description>'
    + '<PositionStatus><Wrapper><Code>6A</Code></Wrapper></PositionStatus></Root>';
  const outcome = expectCleaned(cleanPositionStatus(input));
  assert.equal(outcome.modifications, 0);
  assert.equal(outcome.cleanedText, input);

  const duplicate = expectCleaned(cleanPositionStatus('<Root><PositionStatus><Code>6B</Code><Code>6A</Code></PositionStatus></Root>'));
  assert.equal(duplicate.modifications, 0);

  const nested = expectCleaned(cleanPositionStatus(
    '<Root><PositionStatus><Code><PositionStatus><Code>6A</Code></PositionStatus></Code></PositionStatus></Root>'
  ));
  assert.equal(nested.modifications, 1);
  assert.equal(nested.cleanedText, '<Root><PositionStatus><Code></Code></PositionStatus></Root>');
}

function runCharacterDataTests(): void {
  const cdata = expectCleaned(cleanPositionStatus('<PositionStatus><Code><![CDATA[6A]]></Code></PositionStatus>'));
  assert.equal(cdata.cleanedText, '<PositionStatus><Code></Code></PositionStatus>');
  assert.equal(cdata.modifications, 1);

  const reference = expectCleaned(cleanPositionStatus('<PositionStatus><Code>6&#65;</Code></PositionStatus>'));
  assert.equal(reference.cleanedText, '<PositionStatus><Code></Code></PositionStatus>');
}

function runInternalEntityTests(): void {
  const doctype = '<!DOCTYPE Root [<!ENTITY six "6A"><!ENTITY workers \'Ouvriers\'>]>';
  const outcome = expectCleaned(cleanPositionStatus(
    `${doctype}<Root><PositionStatus><Code>&six;</Code><Description>&workers;</Description></PositionStatus></Root>`
  ));
  assert.equal(outcome.modifications, 2);
  assert.equal(outcome.cleanedText, `${doctype}<Root><PositionStatus><Code></Code><Description></Description></PositionStatus></Root>`);

  const undeclared = cleanPositionStatus('<!DOCTYPE Root [<!ENTITY six "6A">]><Root><Code>&seven;</Code></Root>');
  assert.equal(undeclared.ok, false);
}

function runPreservationTests(): void {
  const input = [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<!-- nightly export -->',
    '<Root version=\'2\'>',
    '  <PositionStatus id="p1">',
    '    <Code>6A</Code>',
    '    <Description lang="fr">Ouvriers</Description>',
    '  </PositionStatus>',
    '  <Label>Ouvriers &amp; employés</Label>',
    '</Root>',
    ''
  ].join('\n');

  const outcome = expectCleaned(cleanPositionStatus(input));
  assert.equal(outcome.modifications, 2);
  assert.equal(
    outcome.cleanedText,
    input.replace('<Code>6A</Code>', '<Code></Code>').replace('<Description lang="fr">Ouvriers</Description>', '<Description lang="fr"></Description>')
  );
}

function runNamespaceTests(): void {
  const input = '<ns0:Root xmlns:ns0="urn:positions"><ns0:PositionStatus><ns0:Code>6A</ns0:Code>'
    + '<ns0:Description>Ouvriers</ns0:Description></ns0:PositionStatus></ns0:Root>';

  const exact = expectCleaned(cleanPositionStatus(input));
  assert.equal(exact.modifications, 0);
  assert.equal(exact.cleanedText, input);

  const local = expectCleaned(cleanPositionStatus(input, { matchLocalNames: true }));
  assert.equal(local.modifications, 2);
  assert.equal(
    local.cleanedText,
    '<ns0:Root xmlns:ns0="urn:positions"><ns0:PositionStatus><ns0:Code></ns0:Code>'
      + '<ns0:Description></ns0:Description></ns0:PositionStatus></ns0:Root>'
  );
}

function runIdempotenceTests(): void {
  const inputs = [
    `<Root>${MATCHING_BLOCK}${MATCHING_BLOCK}</Root>`,
    '<Root><PositionStatus><Code/><Description>Ouvriers</Description></PositionStatus></Root>'
  ];

  for (const input of inputs) {
    const first = expectCleaned(cleanPositionStatus(input));
    const second = expectCleaned(cleanPositionStatus(first.cleanedText));
    assert.equal(second.modifications, 0);
    assert.equal(second.cleanedText, first.cleanedText);
  }
}

function runParseFailureTests(): void {
  const outcome = cleanPositionStatus('<Root><PositionStatus><Code>6A</Code>');
  assert.equal(outcome.ok, false);
  assert.ok(!outcome.ok);
  assert.match(outcome.reason, /unclosed tag/);
  assert.equal('cleanedText' in outcome, false);

  const mismatched = cleanPositionStatus('<Root><PositionStatus></Root>');
  assert.equal(mismatched.ok, false);
}

test('clears both sentinel fields of a single block', runSingleBlockTests);
test('counts two per fully matching block and leaves others alone', runMultiBlockTests);
test('clears only the fields that match', runPartialMatchTests);
test('matches sentinel values exactly', runExactValueTests);
test('only direct children of PositionStatus are eligible', runScopeTests);
test('compares character data after entity and CDATA decoding', runCharacterDataTests);
test('entities declared in the internal DTD subset expand before matching', runInternalEntityTests);
test('keeps every other byte of the document', runPreservationTests);
test('namespace prefixes are ignored only on request', runNamespaceTests);
test('cleaning twice changes nothing more', runIdempotenceTests);
test('malformed documents report a parse failure and no output', runParseFailureTests);
