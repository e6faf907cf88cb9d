import { mnemonicOf, type Opcode } from './instruction-set';
import { type CodeItem, isExactInteger, isTruthy, literalValue, nativeText, type NumericValue, type Value } from './code-item';
import { assertUnreachable } from './utils';

/**
 * Raised when a code slice cannot be evaluated at compile time. The optimizer
 * treats this as "leave the code for the runtime".
 */
export class EvaluationError extends Error {
}

const integerStringPattern = /^\s*[+-]?\d+\s*$/;
const floatStringPattern = /^\s*[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?\s*$/;

/**
 * A minimal stack machine covering the pure subset of the instruction set:
 * arithmetic, comparisons, stack manipulation, casts and boolean connectives.
 * Control flow and I/O are left to the runtime.
 */
export class ConstantEvaluator {
  private stack: Value[] = [];

  get values(): readonly Value[] {
    return this.stack;
  }

  get top(): Value {
    const value = this.stack[this.stack.length - 1];
    if (value === undefined) {
      throw new EvaluationError('Stack is empty');
    }
    return value;
  }

  run(code: readonly CodeItem[]): this {
    for (const item of code) {
      this.step(item);
    }
    return this;
  }

  private step(item: CodeItem) {
    switch (item.type) {
      case 'IntegerLiteral':
        if (!isExactInteger(item)) {
          throw new EvaluationError(`Integer ${item.text} cannot be represented exactly`);
        }
        this.stack.push(literalValue(item));
        break;
      case 'FloatLiteral': {
        const value = literalValue(item);
        if (!Number.isFinite(value.value)) {
          throw new EvaluationError(`Float ${item.text} is not finite`);
        }
        this.stack.push(value);
        break;
      }
      case 'StringLiteral':
      case 'BoolLiteral':
        this.stack.push(literalValue(item));
        break;
      case 'Instruction':
        this.execute(item.opcode);
        break;
      case 'SymbolicReference':
        throw new EvaluationError(`Cannot evaluate reference to "${item.name}"`);
      default: return assertUnreachable(item);
    }
  }

  private execute(opcode: Opcode) {
    switch (opcode) {
      case 'Add': return this.operationAdd();
      case 'Sub':
      case 'Mul':
      case 'Div':
      case 'Mod':
        return this.operationArithmetic(opcode);
      case 'BitAnd':
      case 'BitOr':
      case 'BitXor':
        return this.operationBitwise(opcode);
      case 'BitNot': return this.operationBitNot();
      case 'Less':
      case 'Greater':
        return this.operationOrdering(opcode);
      case 'Equal': return this.pushBoolean(valuesEqual(...this.pop2()));
      case 'NotEqual': return this.pushBoolean(!valuesEqual(...this.pop2()));
      case 'Dup': {
        const a = this.pop();
        this.stack.push(a, a);
        break;
      }
      case 'Drop': this.pop(); break;
      case 'Swap': {
        const [a, b] = this.pop2();
        this.stack.push(b, a);
        break;
      }
      case 'Over': {
        const [a, b] = this.pop2();
        this.stack.push(a, b, a);
        break;
      }
      case 'Rot': {
        const c = this.pop();
        const [a, b] = this.pop2();
        this.stack.push(b, c, a);
        break;
      }
      case 'CastInt': return this.operationCastInt();
      case 'CastFloat': return this.operationCastFloat();
      case 'CastStr':
        this.stack.push({ type: 'StringValue', value: nativeText(this.pop()) });
        break;
      case 'CastBool': return this.pushBoolean(isTruthy(this.pop()));
      case 'And': {
        const [a, b] = this.pop2();
        return this.pushBoolean(isTruthy(a) && isTruthy(b));
      }
      case 'Or': {
        const [a, b] = this.pop2();
        return this.pushBoolean(isTruthy(a) || isTruthy(b));
      }
      case 'Not': return this.pushBoolean(!isTruthy(this.pop()));
      case 'True': return this.pushBoolean(true);
      case 'False': return this.pushBoolean(false);
      case 'Nop': break;
      case 'Call':
      case 'Return':
      case 'Jump':
      case 'If':
      case 'Exit':
      case 'Read':
      case 'Write':
      case 'Print':
        throw new EvaluationError(`Instruction "${mnemonicOf(opcode)}" is not pure`);
      default: return assertUnreachable(opcode);
    }
  }

  private operationAdd() {
    const [left, right] = this.pop2();
    if (left.type === 'StringValue' && right.type === 'StringValue') {
      this.stack.push({ type: 'StringValue', value: left.value + right.value });
    } else {
      this.pushNumber(expectNumber(left), expectNumber(right), (a, b) => a + b);
    }
  }

  private operationArithmetic(op: 'Sub' | 'Mul' | 'Div' | 'Mod') {
    const [left, right] = this.pop2();
    const leftNum = expectNumber(left);
    const rightNum = expectNumber(right);
    const bothIntegers = leftNum.type === 'IntegerValue' && rightNum.type === 'IntegerValue';
    switch (op) {
      case 'Sub': return this.pushNumber(leftNum, rightNum, (a, b) => a - b);
      case 'Mul': return this.pushNumber(leftNum, rightNum, (a, b) => a * b);
      case 'Div': {
        if (rightNum.value === 0) throw new EvaluationError('Division by zero');
        const result = bothIntegers
          ? Math.floor(leftNum.value / rightNum.value)
          : leftNum.value / rightNum.value;
        return this.pushResult(result, bothIntegers);
      }
      case 'Mod': {
        if (rightNum.value === 0) throw new EvaluationError('Division by zero');
        // Floored: the result takes the sign of the divisor
        const result = leftNum.value - rightNum.value * Math.floor(leftNum.value / rightNum.value);
        return this.pushResult(result, bothIntegers);
      }
      default: return assertUnreachable(op);
    }
  }

  private operationBitwise(op: 'BitAnd' | 'BitOr' | 'BitXor') {
    const [left, right] = this.pop2();
    const a = BigInt(expectInteger(left));
    const b = BigInt(expectInteger(right));
    let result: bigint;
    switch (op) {
      case 'BitAnd': result = a & b; break;
      case 'BitOr': result = a | b; break;
      case 'BitXor': result = a ^ b; break;
      default: return assertUnreachable(op);
    }
    this.pushResult(Number(result), true);
  }

  private operationBitNot() {
    this.pushResult(-expectInteger(this.pop()) - 1, true);
  }

  private operationOrdering(op: 'Less' | 'Greater') {
    const [left, right] = this.pop2();
    if (left.type === 'StringValue' && right.type === 'StringValue') {
      this.pushBoolean(op === 'Less' ? left.value < right.value : left.value > right.value);
    } else {
      const a = expectNumber(left).value;
      const b = expectNumber(right).value;
      this.pushBoolean(op === 'Less' ? a < b : a > b);
    }
  }

  private operationCastInt() {
    const value = this.pop();
    switch (value.type) {
      case 'IntegerValue':
        this.stack.push(value);
        break;
      case 'FloatValue': return this.pushResult(Math.trunc(value.value), true);
      case 'BooleanValue': return this.pushResult(value.value ? 1 : 0, true);
      case 'StringValue': {
        if (!integerStringPattern.test(value.value)) {
          throw new EvaluationError(`Cannot convert "${value.value}" to an integer`);
        }
        return this.pushResult(parseInt(value.value.trim(), 10), true);
      }
      default: return assertUnreachable(value);
    }
  }

  private operationCastFloat() {
    const value = this.pop();
    switch (value.type) {
      case 'IntegerValue':
      case 'FloatValue':
        return this.pushResult(value.value, false);
      case 'BooleanValue': return this.pushResult(value.value ? 1 : 0, false);
      case 'StringValue': {
        if (!floatStringPattern.test(value.value)) {
          throw new EvaluationError(`Cannot convert "${value.value}" to a float`);
        }
        return this.pushResult(Number(value.value.trim()), false);
      }
      default: return assertUnreachable(value);
    }
  }

  private pushNumber(left: NumericValue, right: NumericValue, op: (a: number, b: number) => number) {
    const isInteger = left.type === 'IntegerValue' && right.type === 'IntegerValue';
    this.pushResult(op(left.value, right.value), isInteger);
  }

  private pushResult(result: number, isInteger: boolean) {
    if (isInteger) {
      if (!Number.isSafeInteger(result)) {
        throw new EvaluationError(`Integer result ${result} cannot be represented exactly`);
      }
      this.stack.push({ type: 'IntegerValue', value: result });
    } else {
      if (!Number.isFinite(result)) {
        throw new EvaluationError(`Float result ${result} is not finite`);
      }
      this.stack.push({ type: 'FloatValue', value: result });
    }
  }

  private pushBoolean(value: boolean) {
    this.stack.push({ type: 'BooleanValue', value });
  }

  private pop(): Value {
    const value = this.stack.pop();
    if (value === undefined) {
      throw new EvaluationError('Stack underflow');
    }
    return value;
  }

  // Pops the top two values, returning them in push order
  private pop2(): [Value, Value] {
    const b = this.pop();
    const a = this.pop();
    return [a, b];
  }
}

function expectNumber(value: Value): NumericValue {
  if (value.type !== 'IntegerValue' && value.type !== 'FloatValue') {
    throw new EvaluationError(`Expected a number but got ${nativeText(value)}`);
  }
  return value;
}

function expectInteger(value: Value): number {
  if (value.type !== 'IntegerValue' || !Number.isSafeInteger(value.value)) {
    throw new EvaluationError(`Expected an integer but got ${nativeText(value)}`);
  }
  return value.value;
}

function valuesEqual(a: Value, b: Value): boolean {
  const aIsNumber = a.type === 'IntegerValue' || a.type === 'FloatValue';
  const bIsNumber = b.type === 'IntegerValue' || b.type === 'FloatValue';
  if (aIsNumber && bIsNumber) {
    return a.value === b.value;
  }
  return a.type === b.type && a.value === b.value;
}
