/*
A code item is one element of a program: an instruction, a literal, or (before
linking) a symbolic reference to a subroutine.

Literals keep the spelling they had in the token stream until the linked
program is materialized. `literalValue` gives the typed value of a literal and
`literalFromValue` gives the canonical spelling of a computed value.
*/
import { type Opcode, tryLookup } from './instruction-set';
import { assertUnreachable } from './utils';

export type Token = string;

export type CodeItem =
  | InstructionItem
  | Literal
  | SymbolicReference

export type Literal =
  | IntegerLiteral
  | FloatLiteral
  | StringLiteral
  | BoolLiteral

export interface InstructionItem {
  type: 'Instruction';
  opcode: Opcode;
}

export interface IntegerLiteral {
  type: 'IntegerLiteral';
  text: string;
}

export interface FloatLiteral {
  type: 'FloatLiteral';
  text: string;
}

export interface StringLiteral {
  type: 'StringLiteral';
  // Including the surrounding quotes
  text: string;
}

export interface BoolLiteral {
  type: 'BoolLiteral';
  text: 'true' | 'false';
}

export interface SymbolicReference {
  type: 'SymbolicReference';
  name: string;
}

export type Value =
  | IntegerValue
  | FloatValue
  | StringValue
  | BooleanValue

export type NumericValue = IntegerValue | FloatValue;

export interface IntegerValue {
  type: 'IntegerValue';
  value: number;
}

export interface FloatValue {
  type: 'FloatValue';
  value: number;
}

export interface StringValue {
  type: 'StringValue';
  value: string;
}

export interface BooleanValue {
  type: 'BooleanValue';
  value: boolean;
}

// An item of a linked program: an operation, or a value to push
export type LinkedItem =
  | Operation
  | Value

export interface Operation {
  type: 'Operation';
  opcode: Opcode;
}

// Subroutine bodies by name, in the order the subroutines were discovered
export type SubroutineTable = Map<string, CodeItem[]>;

// Address of each subroutine's first item in the linked program
export type LocationTable = Map<string, number>;

const integerPattern = /^[+-]?\d+$/;
const floatPattern = /^[+-]?(\d+\.\d*|\.\d+|\d+(\.\d*)?[eE][+-]?\d+|\.\d+[eE][+-]?\d+)$/;

export function classifyToken(token: Token): CodeItem {
  if (integerPattern.test(token)) {
    return { type: 'IntegerLiteral', text: token };
  }
  if (floatPattern.test(token)) {
    return { type: 'FloatLiteral', text: token };
  }
  if (isQuoted(token)) {
    return { type: 'StringLiteral', text: token };
  }
  if (token === 'true' || token === 'false') {
    return { type: 'BoolLiteral', text: token };
  }
  const opcode = tryLookup(token);
  if (opcode !== undefined) {
    return instruction(opcode);
  }
  return { type: 'SymbolicReference', name: token };
}

function isQuoted(token: string): boolean {
  if (token.length < 2) return false;
  const quote = token[0];
  return (quote === '"' || quote === "'") && token[token.length - 1] === quote;
}

export function instruction(opcode: Opcode): InstructionItem {
  return { type: 'Instruction', opcode };
}

export function isInstruction(item: CodeItem | undefined, opcode?: Opcode): item is InstructionItem {
  return item !== undefined
    && item.type === 'Instruction'
    && (opcode === undefined || item.opcode === opcode);
}

export function isConstant(item: CodeItem | undefined): item is Literal {
  if (item === undefined) return false;
  switch (item.type) {
    case 'IntegerLiteral':
    case 'FloatLiteral':
    case 'StringLiteral':
    case 'BoolLiteral':
      return true;
    case 'Instruction':
    case 'SymbolicReference':
      return false;
    default: return assertUnreachable(item);
  }
}

export function isNumber(item: CodeItem | undefined): item is IntegerLiteral | FloatLiteral {
  return isInteger(item) || isFloat(item);
}

export function isInteger(item: CodeItem | undefined): item is IntegerLiteral {
  return item?.type === 'IntegerLiteral';
}

export function isFloat(item: CodeItem | undefined): item is FloatLiteral {
  return item?.type === 'FloatLiteral';
}

export function isString(item: CodeItem | undefined): item is StringLiteral {
  return item?.type === 'StringLiteral';
}

export function isBool(item: CodeItem | undefined): item is BoolLiteral {
  return item?.type === 'BoolLiteral';
}

// Integer literals beyond 2^53 - 1 in magnitude have no exact `number` form
export function isExactInteger(literal: IntegerLiteral): boolean {
  return Number.isSafeInteger(parseInt(literal.text, 10));
}

export function unquote(literal: StringLiteral): string {
  return literal.text.slice(1, -1);
}

export function literalValue(literal: Literal): Value {
  switch (literal.type) {
    case 'IntegerLiteral': return { type: 'IntegerValue', value: parseInt(literal.text, 10) };
    case 'FloatLiteral': return { type: 'FloatValue', value: Number(literal.text) };
    case 'StringLiteral': return { type: 'StringValue', value: unquote(literal) };
    case 'BoolLiteral': return { type: 'BooleanValue', value: literal.text === 'true' };
    default: return assertUnreachable(literal);
  }
}

export function literalFromValue(value: Value): Literal {
  switch (value.type) {
    case 'IntegerValue': return { type: 'IntegerLiteral', text: formatInteger(value.value) };
    case 'FloatValue': return { type: 'FloatLiteral', text: formatFloat(value.value) };
    case 'StringValue': return { type: 'StringLiteral', text: quote(value.value) };
    case 'BooleanValue': return { type: 'BoolLiteral', text: value.value ? 'true' : 'false' };
    default: return assertUnreachable(value);
  }
}

/**
 * The text form of a value, as produced by the `str` cast
 */
export function nativeText(value: Value): string {
  switch (value.type) {
    case 'IntegerValue': return formatInteger(value.value);
    case 'FloatValue': return formatFloat(value.value);
    case 'StringValue': return value.value;
    case 'BooleanValue': return value.value ? 'true' : 'false';
    default: return assertUnreachable(value);
  }
}

export function formatInteger(n: number): string {
  return String(n);
}

// Floats always show a fractional part so that `3.0` stays distinguishable from `3`
export function formatFloat(n: number): string {
  if (Number.isInteger(n) && Math.abs(n) < 1e21) {
    return Object.is(n, -0) ? '-0.0' : n.toFixed(1);
  }
  return String(n);
}

export function quote(s: string): string {
  return s.includes('"') && !s.includes("'") ? `'${s}'` : `"${s}"`;
}

export function isTruthy(value: Value): boolean {
  switch (value.type) {
    case 'IntegerValue':
    case 'FloatValue':
      return value.value !== 0 && !Number.isNaN(value.value);
    case 'StringValue': return value.value !== '';
    case 'BooleanValue': return value.value;
    default: return assertUnreachable(value);
  }
}
