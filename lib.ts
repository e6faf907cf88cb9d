import { compile, link, materialize, splitSubroutines, expandCalls, resolveReferences } from './lib/compiler';
import { optimize } from './lib/optimizer';
import { validate } from './lib/validator';
import { lookup } from './lib/instruction-set';
import { classifyToken } from './lib/code-item';
import { stringifyProgram } from './lib/stringify-program';

export type { CompileOpts, LinkResult, SplitResult } from './lib/compiler';
export type { OptimizeOpts } from './lib/optimizer';
export type { StringifyProgramOpts } from './lib/stringify-program';
export type { Opcode, OpcodeCategory } from './lib/instruction-set';
export type {
  BoolLiteral,
  CodeItem,
  FloatLiteral,
  InstructionItem,
  IntegerLiteral,
  LinkedItem,
  Literal,
  LocationTable,
  Operation,
  StringLiteral,
  SubroutineTable,
  SymbolicReference,
  Token,
  Value,
} from './lib/code-item';

export { ConstantEvaluator, EvaluationError } from './lib/constant-evaluator';
export { stringifyCode, stringifyItem, stringifyLinkedItem, stringifyValue } from './lib/stringify-program';
export { CompileError, UsageError } from './lib/utils';
export { CLOSE, OPEN, categoryOf, isReservedWord, mnemonicOf, opcodes, tryLookup } from './lib/instruction-set';
export { isBool, isConstant, isFloat, isInteger, isNumber, isString } from './lib/code-item';

export {
  classifyToken,
  compile,
  expandCalls,
  link,
  lookup,
  materialize,
  optimize,
  resolveReferences,
  splitSubroutines,
  stringifyProgram,
  validate,
};

export const Stackc = {
  compile,
  link,
  optimize,
  validate,
  lookup,
  classifyToken,
  stringifyProgram,
};

export default Stackc;
