import { type CodeItem, isBool, isConstant, isExactInteger, isInstruction, isInteger, isString } from './code-item';
import { booleanConnectives, tryLookup } from './instruction-set';
import { stringifyCode, stringifyItem } from './stringify-program';
import { assertUnreachable, CompileError } from './utils';

/**
 * Checks linked code for obvious errors, in a single pass. Returns the code
 * unchanged, or throws a `CompileError` for the first problem found.
 *
 * Note: a string followed by an `int` cast is rejected here even though the
 * optimizer folds the same pattern when the string holds an integer. Since
 * validation runs after optimization, it only sees the casts that were left
 * for the runtime.
 */
export function validate<T extends readonly CodeItem[]>(code: T): T {
  code.forEach((a, i) => {
    const b: CodeItem | undefined = code[i + 1];

    if (!isResolvable(a)) {
      throw new CompileError(`Unknown instruction (index ${i}): ${stringifyItem(a)}`);
    }

    if (isInteger(a) && !isExactInteger(a)) {
      throw new CompileError(`Integer literal out of range (index ${i}): ${a.text}`);
    }

    if (isString(a) && isInstruction(b, 'CastInt')) {
      throw new CompileError(`Cannot convert string to integer (index ${i}): ${stringifyCode([a, b])}`);
    }

    if (isConstant(a) && !isBool(a) && isInstruction(b) && booleanConnectives.has(b.opcode)) {
      throw new CompileError(`Can only use boolean operators on booleans (index ${i}): ${stringifyCode([a, b])}`);
    }
  });
  return code;
}

function isResolvable(item: CodeItem): boolean {
  switch (item.type) {
    case 'Instruction':
    case 'IntegerLiteral':
    case 'FloatLiteral':
    case 'StringLiteral':
    case 'BoolLiteral':
      return true;
    case 'SymbolicReference':
      return tryLookup(item.name) !== undefined;
    default: return assertUnreachable(item);
  }
}
