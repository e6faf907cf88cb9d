import { assert } from 'chai';
import { validate } from '../lib/validator';
import { CompileError } from '../lib/utils';
import { codeOf } from './common';

suite('validator', function () {
  test('accepts well-formed code', () => {
    const code = codeOf('1 2 < true and read int .');
    assert.strictEqual(validate(code), code);
  });

  test('accepts boolean operators on booleans', () => {
    assert.doesNotThrow(() => validate(codeOf('true false and')));
    assert.doesNotThrow(() => validate(codeOf('false not')));
  });

  test('rejects unknown words', () => {
    assert.throws(() => validate(codeOf('foo')), CompileError, 'Unknown instruction (index 0): foo');
    assert.throws(() => validate(codeOf('1 2 bar')), CompileError, 'Unknown instruction (index 2): bar');
  });

  test('accepts a reference spelled like a mnemonic', () => {
    assert.doesNotThrow(() => validate([{ type: 'SymbolicReference', name: 'dup' }]));
  });

  test('rejects a string cast to int', () => {
    assert.throws(() => validate(codeOf('"5" int')), CompileError, 'Cannot convert string to integer (index 0): "5" int');
    assert.throws(() => validate(codeOf('1 "x" int')), CompileError, 'Cannot convert string to integer (index 1): "x" int');
  });

  test('rejects boolean operators on non-boolean literals', () => {
    assert.throws(() => validate(codeOf('5 and')), CompileError, 'Can only use boolean operators on booleans (index 0): 5 and');
    assert.throws(() => validate(codeOf('true 1 or')), CompileError, 'Can only use boolean operators on booleans (index 1): 1 or');
    assert.throws(() => validate(codeOf('"s" not')), CompileError, 'Can only use boolean operators on booleans (index 0): "s" not');
  });

  test('rejects integer literals without an exact value', () => {
    assert.throws(
      () => validate(codeOf('1 9007199254740992 +')),
      CompileError,
      'Integer literal out of range (index 1): 9007199254740992'
    );
    assert.doesNotThrow(() => validate(codeOf('-9007199254740991')));
  });

  test('does not look at computed operands', () => {
    assert.doesNotThrow(() => validate(codeOf('read and')));
  });

  test('reports the first problem found', () => {
    assert.throws(() => validate(codeOf('5 and foo')), CompileError, 'Can only use boolean operators on booleans (index 0): 5 and');
  });
});
