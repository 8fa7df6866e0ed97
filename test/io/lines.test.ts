// test/io/lines.test.ts
import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { LineSplitter, splitLines } from '../../src/io/lines.js';

describe('LineSplitter', () => {
  it('emits complete lines with their terminators', () => {
    const splitter = new LineSplitter();
    assert.deepEqual(splitter.push('one\ntwo\r\nthr'), ['one\n', 'two\r\n']);
    assert.deepEqual(splitter.push('ee\n'), ['three\n']);
    assert.deepEqual(splitter.flush(), []);
  });

  it('keeps a CRLF split across chunks together', () => {
    const splitter = new LineSplitter();
    assert.deepEqual(splitter.push('x\r'), []);
    assert.deepEqual(splitter.push('\ny\n'), ['x\r\n', 'y\n']);
  });

  it('returns the unterminated tail on flush', () => {
    const splitter = new LineSplitter();
    assert.deepEqual(splitter.push('a\nb'), ['a\n']);
    assert.deepEqual(splitter.flush(), ['b']);
    assert.deepEqual(splitter.flush(), []);
  });
});

describe('splitLines', () => {
  it('splits whole strings', () => {
    assert.deepEqual(splitLines(''), []);
    assert.deepEqual(splitLines('a\n\nb\n'), ['a\n', '\n', 'b\n']);
    assert.deepEqual(splitLines('no newline'), ['no newline']);
  });
});
