import * as im from 'immutable';
import colors from 'colors';
import {
  type CodeItem,
  isBool,
  isConstant,
  isInstruction,
  isInteger,
  isNumber,
  isString,
  type Literal,
  literalFromValue,
  literalValue,
} from './code-item';
import { ConstantEvaluator, EvaluationError } from './constant-evaluator';
import { divisionOpcodes, foldableOpcodes } from './instruction-set';
import { stringifyCode } from './stringify-program';
import { CompileError } from './utils';

export interface OptimizeOpts {
  // Report a division or modulo by a literal zero as a `CompileError` instead
  // of leaving it for the runtime
  strict?: boolean;
  // If false, a diagnostic line is logged for every rewrite
  silent?: boolean;
  log?: (message: string) => void;
}

/**
 * A rewrite replaces the `consumed` items at the match position with the
 * `replacement` items
 */
interface Rewrite {
  consumed: number;
  replacement: CodeItem[];
  description: string;
}

/**
 * A rule looks at the items at the match position (`a`) and the two after it
 * (`b` and `c`, which are undefined past the end of the code)
 */
type RewriteRule = (a: CodeItem, b: CodeItem | undefined, c: CodeItem | undefined, opts: OptimizeOpts) => Rewrite | undefined;

const defaultLog = (message: string) => console.log(colors.gray(message));

/**
 * Constant-folds the code until no more rewrites apply, e.g. `2 3 + 5 *`
 * becomes `5 5 *` on the first pass and `25` on the second.
 *
 * Each pass scans from the start and applies only the first rule that matches
 * at the lowest index, so an earlier fold can expose an opportunity at an
 * index that was already scanned.
 */
export function optimize(code: readonly CodeItem[], opts: OptimizeOpts = {}): CodeItem[] {
  opts = {
    strict: false,
    silent: true,
    log: defaultLog,
    ...opts
  };

  let list = im.List(code);
  let changed = true;
  while (changed) {
    changed = false;
    for (let i = 0; i < list.size; i++) {
      const rewrite = firstMatch(list, i, opts);
      if (rewrite) {
        list = list.splice(i, rewrite.consumed, ...rewrite.replacement);
        if (!opts.silent && opts.log) {
          opts.log(rewrite.description);
        }
        changed = true;
        break;
      }
    }
  }
  return list.toArray();
}

function firstMatch(list: im.List<CodeItem>, i: number, opts: OptimizeOpts): Rewrite | undefined {
  const a = list.get(i);
  if (a === undefined) return undefined;
  const b = list.get(i + 1);
  const c = list.get(i + 2);
  for (const rule of rules) {
    const rewrite = rule(a, b, c, opts);
    if (rewrite) return rewrite;
  }
  return undefined;
}

// <num> <num> <op> -> <result>
const foldArithmetic: RewriteRule = (a, b, c, opts) => {
  if (!isNumber(a) || !isNumber(b) || !isInstruction(c) || !foldableOpcodes.has(c.opcode)) {
    return undefined;
  }
  if (divisionOpcodes.has(c.opcode) && literalValue(b).value === 0) {
    if (opts.strict) {
      throw new CompileError(`Division by zero: ${stringifyCode([a, b, c])}`);
    }
    // Deferred to the runtime
    return undefined;
  }
  const result = evaluate([a, b, c]);
  if (!result) return undefined;
  return {
    consumed: 3,
    replacement: [result],
    description: `Constant-folded ${stringifyCode([a, b, c])} to ${stringifyCode([result])}`
  };
};

// <const> dup -> <const> <const>
const materializeDup: RewriteRule = (a, b) => {
  if (!isConstant(a) || !isInstruction(b, 'Dup')) return undefined;
  return translated([a, b], [a, a]);
};

// <const> drop ->
const removeDeadDrop: RewriteRule = (a, b) => {
  if (!isConstant(a) || !isInstruction(b, 'Drop')) return undefined;
  return {
    consumed: 2,
    replacement: [],
    description: `Removed dead code ${stringifyCode([a, b])}`
  };
};

// <int> int -> <int>
const removeIntCast: RewriteRule = (a, b) => {
  if (!isInteger(a) || !isInstruction(b, 'CastInt')) return undefined;
  return translated([a, b], [a]);
};

// <str> str -> <str>
const removeStrCast: RewriteRule = (a, b) => {
  if (!isString(a) || !isInstruction(b, 'CastStr')) return undefined;
  return translated([a, b], [a]);
};

// <bool> bool -> <bool>
const removeBoolCast: RewriteRule = (a, b) => {
  if (!isBool(a) || !isInstruction(b, 'CastBool')) return undefined;
  return translated([a, b], [a]);
};

// <c1> <c2> swap -> <c2> <c1>
const foldSwap: RewriteRule = (a, b, c) => {
  if (!isConstant(a) || !isConstant(b) || !isInstruction(c, 'Swap')) return undefined;
  return translated([a, b, c], [b, a]);
};

// <c1> <c2> over -> <c1> <c2> <c1>
const foldOver: RewriteRule = (a, b, c) => {
  if (!isConstant(a) || !isConstant(b) || !isInstruction(c, 'Over')) return undefined;
  return translated([a, b, c], [a, b, a]);
};

// "123" int -> 123, only if the string holds an integer
const foldStringToInt: RewriteRule = (a, b) => {
  if (!isString(a) || !isInstruction(b, 'CastInt')) return undefined;
  return foldCast(a, b);
};

// <const> str -> "<const>"
const foldToStr: RewriteRule = (a, b) => {
  if (!isConstant(a) || !isInstruction(b, 'CastStr')) return undefined;
  return foldCast(a, b);
};

// <const> bool -> true|false
const foldToBool: RewriteRule = (a, b) => {
  if (!isConstant(a) || !isInstruction(b, 'CastBool')) return undefined;
  return foldCast(a, b);
};

// In order of precedence at a given position
const rules: RewriteRule[] = [
  foldArithmetic,
  materializeDup,
  removeDeadDrop,
  removeIntCast,
  removeStrCast,
  removeBoolCast,
  foldSwap,
  foldOver,
  foldStringToInt,
  foldToStr,
  foldToBool,
];

function foldCast(a: Literal, b: CodeItem): Rewrite | undefined {
  const result = evaluate([a, b]);
  if (!result) return undefined;
  return translated([a, b], [result]);
}

function translated(from: CodeItem[], to: CodeItem[]): Rewrite {
  return {
    consumed: from.length,
    replacement: to,
    description: `Translated ${stringifyCode(from)} to ${stringifyCode(to)}`
  };
}

/**
 * Runs the slice on a fresh evaluator and gives its result as a literal, or
 * `undefined` if it can only be evaluated at runtime
 */
function evaluate(code: CodeItem[]): Literal | undefined {
  try {
    return literalFromValue(new ConstantEvaluator().run(code).top);
  } catch (e) {
    if (e instanceof EvaluationError) {
      return undefined;
    }
    throw e;
  }
}
