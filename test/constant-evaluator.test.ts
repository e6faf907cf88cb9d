import { assert } from 'chai';
import { ConstantEvaluator, EvaluationError } from '../lib/constant-evaluator';
import { type Value } from '../lib/code-item';
import { codeOf } from './common';

function run(source: string): readonly Value[] {
  return new ConstantEvaluator().run(codeOf(source)).values;
}

const int = (value: number): Value => ({ type: 'IntegerValue', value });
const float = (value: number): Value => ({ type: 'FloatValue', value });
const str = (value: string): Value => ({ type: 'StringValue', value });
const bool = (value: boolean): Value => ({ type: 'BooleanValue', value });

suite('constant-evaluator', function () {
  test('integer arithmetic', () => {
    assert.deepEqual(run('2 3 +'), [int(5)]);
    assert.deepEqual(run('10 3 -'), [int(7)]);
    assert.deepEqual(run('4 5 *'), [int(20)]);
    assert.deepEqual(run('7 2 /'), [int(3)]);
    assert.deepEqual(run('-7 2 /'), [int(-4)]);
    assert.deepEqual(run('7 2 %'), [int(1)]);
    assert.deepEqual(run('-7 2 %'), [int(1)]);
    assert.deepEqual(run('7 -2 %'), [int(-1)]);
  });

  test('float arithmetic', () => {
    assert.deepEqual(run('1.5 2 *'), [float(3)]);
    assert.deepEqual(run('7.0 2 /'), [float(3.5)]);
    assert.deepEqual(run('0.5 0.25 +'), [float(0.75)]);
  });

  test('string concatenation', () => {
    assert.deepEqual(run('"ab" "cd" +'), [str('abcd')]);
    assert.throws(() => run('"ab" 1 +'), EvaluationError);
  });

  test('bitwise operators', () => {
    assert.deepEqual(run('6 3 &'), [int(2)]);
    assert.deepEqual(run('6 3 |'), [int(7)]);
    assert.deepEqual(run('6 3 ^'), [int(5)]);
    assert.deepEqual(run('5 ~'), [int(-6)]);
    assert.throws(() => run('1.5 2 &'), EvaluationError);
  });

  test('comparisons', () => {
    assert.deepEqual(run('2 3 <'), [bool(true)]);
    assert.deepEqual(run('2 3 >'), [bool(false)]);
    assert.deepEqual(run('"a" "b" <'), [bool(true)]);
    assert.deepEqual(run('2 2.0 ='), [bool(true)]);
    assert.deepEqual(run('"a" "a" ='), [bool(true)]);
    assert.deepEqual(run('1 "1" ='), [bool(false)]);
    assert.deepEqual(run('1 2 <>'), [bool(true)]);
  });

  test('stack manipulation', () => {
    assert.deepEqual(run('1 dup'), [int(1), int(1)]);
    assert.deepEqual(run('1 2 drop'), [int(1)]);
    assert.deepEqual(run('1 2 swap'), [int(2), int(1)]);
    assert.deepEqual(run('1 2 over'), [int(1), int(2), int(1)]);
    assert.deepEqual(run('1 2 3 rot'), [int(2), int(3), int(1)]);
  });

  test('casts', () => {
    assert.deepEqual(run('"12" int'), [int(12)]);
    assert.deepEqual(run('" -4 " int'), [int(-4)]);
    assert.deepEqual(run('2.7 int'), [int(2)]);
    assert.deepEqual(run('-2.7 int'), [int(-2)]);
    assert.deepEqual(run('true int'), [int(1)]);
    assert.deepEqual(run('"1.5" float'), [float(1.5)]);
    assert.deepEqual(run('3 float'), [float(3)]);
    assert.deepEqual(run('5 str'), [str('5')]);
    assert.deepEqual(run('2.0 str'), [str('2.0')]);
    assert.deepEqual(run('true str'), [str('true')]);
    assert.deepEqual(run('0 bool'), [bool(false)]);
    assert.deepEqual(run('"" bool'), [bool(false)]);
    assert.deepEqual(run('"0" bool'), [bool(true)]);
    assert.throws(() => run('"abc" int'), EvaluationError, 'Cannot convert "abc" to an integer');
    assert.throws(() => run('"abc" float'), EvaluationError);
  });

  test('boolean connectives', () => {
    assert.deepEqual(run('true false and'), [bool(false)]);
    assert.deepEqual(run('true false or'), [bool(true)]);
    assert.deepEqual(run('0 not'), [bool(true)]);
  });

  test('nop', () => {
    assert.deepEqual(run('1 nop'), [int(1)]);
  });

  test('refuses what only the runtime can do', () => {
    assert.throws(() => run('1 0 /'), EvaluationError, 'Division by zero');
    assert.throws(() => run('1 0.0 %'), EvaluationError, 'Division by zero');
    assert.throws(() => run('read'), EvaluationError, 'Instruction "read" is not pure');
    assert.throws(() => run('1 .'), EvaluationError, 'Instruction "." is not pure');
    assert.throws(() => run('4 call'), EvaluationError);
    assert.throws(() => run('double'), EvaluationError, 'Cannot evaluate reference to "double"');
    assert.throws(() => run('1 +'), EvaluationError, 'Stack underflow');
    assert.throws(() => run('9007199254740991 1 +'), EvaluationError);
    assert.throws(() => run('9007199254740993'), EvaluationError, 'Integer 9007199254740993 cannot be represented exactly');
    assert.throws(() => run('1e400'), EvaluationError, 'Float 1e400 is not finite');
    assert.throws(() => run('1e308 10.0 *'), EvaluationError, 'Float result Infinity is not finite');
  });

  test('top', () => {
    assert.deepEqual(new ConstantEvaluator().run(codeOf('1 2')).top, int(2));
    assert.throws(() => new ConstantEvaluator().top, EvaluationError, 'Stack is empty');
  });
});
