import assert from 'node:assert/strict';
import { test } from 'node:test';
import {
  BEST_EFFORT_ENCODING,
  readDeclaredEncoding,
  resolveEncoding
} from '../src/shared/file/encoding';
import type { EncodingGuesser } from '../src/shared/file/types';

function latin1(text: string): Uint8Array {
  return Buffer.from(text, 'latin1');
}

function runUtf8Tests(): void {
  const source = '<Root><Label>Récapitulatif €</Label></Root>';
  assert.deepEqual(resolveEncoding(Buffer.from(source, 'utf8')), { text: source, encoding: 'utf-8' });
  assert.deepEqual(resolveEncoding(new Uint8Array(0)), { text: '', encoding: 'utf-8' });
}

function runDeclaredEncodingTests(): void {
  const declared = resolveEncoding(latin1('<?xml version="1.0" encoding="ISO-8859-1"?><Root>caf\xe9</Root>'));
  assert.equal(declared.encoding, 'ISO-8859-1');
  assert.equal(declared.text, '<?xml version="1.0" encoding="ISO-8859-1"?><Root>café</Root>');

  const lying = resolveEncoding(latin1('<?xml version="1.0" encoding="UTF-8"?><a>\xe9</a>'));
  assert.equal(lying.encoding, 'windows-1252');
  assert.equal(lying.text, '<?xml version="1.0" encoding="UTF-8"?><a>é</a>');

  const unknown = resolveEncoding(latin1("<?xml version='1.0' encoding='x-made-up'?><a>\xe9</a>"));
  assert.equal(unknown.encoding, 'windows-1252');
}

function runPrologueScanTests(): void {
  const withBom = Buffer.concat([
    Buffer.from([0xef, 0xbb, 0xbf]),
    Buffer.from("<?xml version='1.0' encoding='windows-1252' standalone='yes'?><a/>", 'latin1')
  ]);
  assert.equal(readDeclaredEncoding(withBom), 'windows-1252');

  const tooLate = latin1(`${' '.repeat(250)}<?xml version="1.0" encoding="ISO-8859-1"?><a/>`);
  assert.equal(readDeclaredEncoding(tooLate), null);
  assert.equal(readDeclaredEncoding(latin1('<a encoding="ISO-8859-1"/>')), null);
}

function runLegacyFallbackTests(): void {
  const resolved = resolveEncoding(latin1('<Root>Employ\xe9s</Root>'));
  assert.deepEqual(resolved, { text: '<Root>Employés</Root>', encoding: 'windows-1252' });
}

function runByteOrderMarkTests(): void {
  const bytes = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from('<a>é</a>', 'utf16le')]);
  assert.deepEqual(resolveEncoding(bytes), { text: '<a>é</a>', encoding: 'utf-16le' });
}

function runGuesserTests(): void {
  const seen: Uint8Array[] = [];
  const guesser: EncodingGuesser = {
    guess: (bytes) => {
      seen.push(bytes);
      return 'windows-1252';
    }
  };
  const bytes = latin1('caf\xe9');

  const guessed = resolveEncoding(bytes, { legacyEncoding: null, guesser });
  assert.deepEqual(guessed, { text: 'café', encoding: 'windows-1252' });
  assert.equal(seen.length, 1);
  assert.equal(seen[0], bytes);

  resolveEncoding(Buffer.from('plain ascii', 'utf8'), { guesser });
  resolveEncoding(bytes, { guesser });
  assert.equal(seen.length, 1, 'guesser is only consulted once earlier steps fail');

  const broken: EncodingGuesser = {
    guess: () => {
      throw new Error('detector crashed');
    }
  };
  assert.equal(resolveEncoding(bytes, { legacyEncoding: null, guesser: broken }).encoding, BEST_EFFORT_ENCODING);
  assert.equal(resolveEncoding(bytes, { legacyEncoding: null, guesser: { guess: () => 'not-an-encoding' } }).encoding, BEST_EFFORT_ENCODING);
}

function runBestEffortTests(): void {
  assert.deepEqual(resolveEncoding(latin1('caf\xe9'), { legacyEncoding: null }), {
    text: 'caf\uFFFD',
    encoding: BEST_EFFORT_ENCODING
  });
}

function runTotalityTests(): void {
  let seed = 7;
  for (let round = 0; round < 200; round += 1) {
    const bytes = new Uint8Array(round % 64);
    for (let index = 0; index < bytes.length; index += 1) {
      seed = (seed * 48271) % 2147483647;
      bytes[index] = seed % 256;
    }

    for (const legacyEncoding of [undefined, null]) {
      const resolved = resolveEncoding(bytes, { legacyEncoding });
      assert.equal(typeof resolved.text, 'string');
      assert.ok(resolved.encoding.length > 0);
    }
  }
}

test('valid UTF-8 decodes exactly', runUtf8Tests);
test('declared prologue encoding is honoured when it decodes', runDeclaredEncodingTests);
test('prologue scan is bounded and only reads the XML declaration', runPrologueScanTests);
test('undeclared legacy bytes fall back to windows-1252', runLegacyFallbackTests);
test('UTF-16 byte-order marks are sniffed', runByteOrderMarkTests);
test('encoding guesser is consulted last and never breaks resolution', runGuesserTests);
test('best-effort decode replaces invalid sequences', runBestEffortTests);
test('any byte sequence resolves without throwing', runTotalityTests);
