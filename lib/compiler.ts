import {
  classifyToken,
  type CodeItem,
  instruction,
  isConstant,
  isExactInteger,
  type LinkedItem,
  literalValue,
  type LocationTable,
  type SubroutineTable,
  type Token,
} from './code-item';
import { CLOSE, isReservedWord, lookup, OPEN } from './instruction-set';
import { optimize, type OptimizeOpts } from './optimizer';
import { validate } from './validator';
import { assertUnreachable, CompileError } from './utils';

export interface CompileOpts extends OptimizeOpts {
  optimize?: boolean;
}

export interface SplitResult {
  main: CodeItem[];
  subroutines: SubroutineTable;
}

export interface LinkResult {
  // Resolved and validated, with literals still in token form
  code: CodeItem[];
  locations: LocationTable;
}

/**
 * Compiles subroutine forms into a complete linked program.
 *
 * A program such as:
 *
 *     : sub1 <sub1 code ...> ;
 *     : sub2 <sub2 code ...> ;
 *     sub1 foo sub2 bar
 *
 * is compiled into:
 *
 *     <sub1 address> call
 *     foo
 *     <sub2 address> call
 *     bar
 *     exit
 *     <sub1 code ...> return
 *     <sub2 code ...> return
 *
 * The main code is optimized first, and then each subroutine body in
 * isolation. Addresses can only be assigned after the code before them has
 * been optimized, since optimization changes its length.
 */
export function compile(tokens: readonly Token[], opts: CompileOpts = {}): LinkedItem[] {
  return materialize(link(tokens, opts).code);
}

/**
 * All the steps of `compile` except converting the literals to values
 */
export function link(tokens: readonly Token[], opts: CompileOpts = {}): LinkResult {
  opts = {
    optimize: true,
    ...opts
  };
  const optimizeBlock = (code: CodeItem[]) => opts.optimize ? optimize(code, opts) : code;

  const { main, subroutines } = splitSubroutines(tokens);

  for (const [name, body] of subroutines) {
    subroutines.set(name, expandCalls(body, subroutines));
  }
  let output = expandCalls(main, subroutines);

  // Main code comes before the subroutines, so it must not fall through into
  // the first one
  if (subroutines.size > 0) {
    output.push(instruction('Exit'));
  }

  output = optimizeBlock(output);

  const locations: LocationTable = new Map();
  for (const [name, body] of subroutines) {
    locations.set(name, output.length);
    output.push(...optimizeBlock(body));
  }

  const code = resolveReferences(output, locations);
  validate(code);

  return { code, locations };
}

/**
 * Separates the subroutine definitions from the main code.
 *
 * `: name <body ...> ;` defines a subroutine, and its body gets an implicit
 * `return` at the closing delimiter. A definition still open at the end of the
 * input is kept as it is, without the `return`.
 */
export function splitSubroutines(tokens: readonly Token[]): SplitResult {
  const main: CodeItem[] = [];
  const subroutines: SubroutineTable = new Map();

  let i = 0;
  while (i < tokens.length) {
    const token = tokens[i++];
    if (token !== OPEN) {
      main.push(classifyToken(token));
      continue;
    }

    if (i >= tokens.length) break;
    const name = tokens[i++];
    checkSubroutineName(name);

    const body: CodeItem[] = [];
    subroutines.set(name, body);
    while (i < tokens.length) {
      const op = tokens[i++];
      if (op === CLOSE) {
        body.push(instruction('Return'));
        break;
      }
      body.push(classifyToken(op));
    }
  }

  return { main, subroutines };
}

function checkSubroutineName(name: Token) {
  if (name === OPEN || name === CLOSE) {
    throw new CompileError(`Invalid subroutine name '${name}'.`);
  }
  if (isReservedWord(name)) {
    throw new CompileError(`Cannot shadow internal word definition '${name}'.`);
  }
  if (isConstant(classifyToken(name))) {
    throw new CompileError(`Invalid subroutine name '${name}': a literal cannot be used as a name.`);
  }
}

/**
 * Inserts a `call` after every reference to a subroutine
 */
export function expandCalls(code: readonly CodeItem[], subroutines: SubroutineTable): CodeItem[] {
  const result: CodeItem[] = [];
  for (const item of code) {
    result.push(item);
    if (item.type === 'SymbolicReference' && subroutines.has(item.name)) {
      result.push(instruction('Call'));
    }
  }
  return result;
}

/**
 * Replaces each reference to a subroutine by the subroutine's address
 */
export function resolveReferences(code: readonly CodeItem[], locations: LocationTable): CodeItem[] {
  return code.map((item): CodeItem => {
    if (item.type !== 'SymbolicReference') return item;
    const address = locations.get(item.name);
    if (address === undefined) return item;
    return { type: 'IntegerLiteral', text: String(address) };
  });
}

/**
 * Converts literals to native values and instructions to operations
 */
export function materialize(code: readonly CodeItem[]): LinkedItem[] {
  return code.map((item): LinkedItem => {
    switch (item.type) {
      case 'IntegerLiteral':
        if (!isExactInteger(item)) {
          throw new CompileError(`Integer literal out of range: ${item.text}`);
        }
        return literalValue(item);
      case 'FloatLiteral':
      case 'StringLiteral':
      case 'BoolLiteral':
        return literalValue(item);
      case 'Instruction':
        return { type: 'Operation', opcode: item.opcode };
      case 'SymbolicReference':
        return { type: 'Operation', opcode: lookup(item.name) };
      default: return assertUnreachable(item);
    }
  });
}
