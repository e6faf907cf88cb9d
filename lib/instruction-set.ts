import * as im from 'immutable';
import { CompileError } from './utils';

export type OpcodeCategory =
  | 'arithmetic'
  | 'comparison'
  | 'stack'
  | 'cast'
  | 'control'
  | 'boolean'
  | 'io'
  | 'literal'

/**
 * The set of opcodes and metadata about the opcodes
 *
 * The mnemonic is the spelling of the instruction in a token stream. The
 * category groups instructions by the kind of effect they have.
 */
export const opcodes = {
  'Add':       { mnemonic: '+',      category: 'arithmetic' },
  'Sub':       { mnemonic: '-',      category: 'arithmetic' },
  'Mul':       { mnemonic: '*',      category: 'arithmetic' },
  'Div':       { mnemonic: '/',      category: 'arithmetic' },
  'Mod':       { mnemonic: '%',      category: 'arithmetic' },
  'BitAnd':    { mnemonic: '&',      category: 'arithmetic' },
  'BitOr':     { mnemonic: '|',      category: 'arithmetic' },
  'BitXor':    { mnemonic: '^',      category: 'arithmetic' },
  'BitNot':    { mnemonic: '~',      category: 'arithmetic' },
  'Less':      { mnemonic: '<',      category: 'comparison' },
  'Greater':   { mnemonic: '>',      category: 'comparison' },
  'Equal':     { mnemonic: '=',      category: 'comparison' },
  'NotEqual':  { mnemonic: '<>',     category: 'comparison' },
  'Dup':       { mnemonic: 'dup',    category: 'stack'      },
  'Drop':      { mnemonic: 'drop',   category: 'stack'      },
  'Swap':      { mnemonic: 'swap',   category: 'stack'      },
  'Over':      { mnemonic: 'over',   category: 'stack'      },
  'Rot':       { mnemonic: 'rot',    category: 'stack'      },
  'CastInt':   { mnemonic: 'int',    category: 'cast'       },
  'CastFloat': { mnemonic: 'float',  category: 'cast'       },
  'CastStr':   { mnemonic: 'str',    category: 'cast'       },
  'CastBool':  { mnemonic: 'bool',   category: 'cast'       },
  'Call':      { mnemonic: 'call',   category: 'control'    },
  'Return':    { mnemonic: 'return', category: 'control'    },
  'Jump':      { mnemonic: 'jmp',    category: 'control'    },
  'If':        { mnemonic: 'if',     category: 'control'    },
  'Exit':      { mnemonic: 'exit',   category: 'control'    },
  'Nop':       { mnemonic: 'nop',    category: 'control'    },
  'And':       { mnemonic: 'and',    category: 'boolean'    },
  'Or':        { mnemonic: 'or',     category: 'boolean'    },
  'Not':       { mnemonic: 'not',    category: 'boolean'    },
  'Read':      { mnemonic: 'read',   category: 'io'         },
  'Write':     { mnemonic: 'write',  category: 'io'         },
  'Print':     { mnemonic: '.',      category: 'io'         },
  'True':      { mnemonic: 'true',   category: 'literal'    },
  'False':     { mnemonic: 'false',  category: 'literal'    },
} as const;

export type Opcode = keyof typeof opcodes;

// Opens a subroutine definition; the next token is its name
export const OPEN = ':';
// Closes a subroutine definition
export const CLOSE = ';';

// Binary operators the optimizer folds when both operands are numeric literals
export const foldableOpcodes = new Set<Opcode>([
  'Add', 'Sub', 'Mul', 'Div', 'Mod', 'BitAnd', 'BitOr', 'BitXor', 'Less', 'Greater', 'Equal'
]);

export const divisionOpcodes = new Set<Opcode>(['Div', 'Mod']);

export const booleanConnectives = new Set<Opcode>(['And', 'Or', 'Not']);

function isOpcode(name: string): name is Opcode {
  return Object.prototype.hasOwnProperty.call(opcodes, name);
}

export const allOpcodes: readonly Opcode[] = Object.keys(opcodes).filter(isOpcode);

const mnemonics: im.Map<string, Opcode> = im.Map(allOpcodes.map((opcode): [string, Opcode] =>
  [opcodes[opcode].mnemonic, opcode]));

/**
 * Resolves an instruction mnemonic to its opcode, or fails with a
 * `CompileError` if the name is not a recognized instruction.
 */
export function lookup(name: string): Opcode {
  const opcode = tryLookup(name);
  if (opcode === undefined) {
    throw new CompileError(`Unknown instruction: ${name}`);
  }
  return opcode;
}

export function tryLookup(name: string): Opcode | undefined {
  return mnemonics.get(name);
}

export function mnemonicOf(opcode: Opcode): string {
  return opcodes[opcode].mnemonic;
}

export function categoryOf(opcode: Opcode): OpcodeCategory {
  return opcodes[opcode].category;
}

// Words that cannot be used as subroutine names
export function isReservedWord(name: string): boolean {
  return name === OPEN || name === CLOSE || mnemonics.has(name);
}
