import _ from 'lodash';
import { type CodeItem, formatFloat, formatInteger, type LinkedItem, type LocationTable, type Value } from './code-item';
import { mnemonicOf } from './instruction-set';
import { assertUnreachable } from './utils';

export interface StringifyProgramOpts {
  // If given, each subroutine's entry point gets a label line
  locations?: LocationTable;
  showAddresses?: boolean;
}

export function stringifyItem(item: CodeItem): string {
  switch (item.type) {
    case 'Instruction': return mnemonicOf(item.opcode);
    case 'IntegerLiteral':
    case 'FloatLiteral':
    case 'StringLiteral':
    case 'BoolLiteral':
      return item.text;
    case 'SymbolicReference': return item.name;
    default: return assertUnreachable(item);
  }
}

export function stringifyCode(code: readonly CodeItem[]): string {
  return code.map(stringifyItem).join(' ');
}

export function stringifyValue(value: Value): string {
  switch (value.type) {
    case 'IntegerValue': return formatInteger(value.value);
    case 'FloatValue': return formatFloat(value.value);
    case 'StringValue': return JSON.stringify(value.value);
    case 'BooleanValue': return value.value ? 'true' : 'false';
    default: return assertUnreachable(value);
  }
}

export function stringifyLinkedItem(item: LinkedItem): string {
  switch (item.type) {
    case 'Operation': return mnemonicOf(item.opcode);
    case 'IntegerValue':
    case 'FloatValue':
    case 'StringValue':
    case 'BooleanValue':
      return stringifyValue(item);
    default: return assertUnreachable(item);
  }
}

/**
 * Human-readable listing of a linked program, one item per line
 */
export function stringifyProgram(program: readonly LinkedItem[], opts: StringifyProgramOpts = {}): string {
  const { locations, showAddresses } = { showAddresses: true, ...opts };
  const labels = labelsByAddress(locations);
  const addressWidth = String(Math.max(program.length - 1, 0)).length;
  const lines: string[] = [];

  if (locations) {
    lines.push('main:');
  }
  program.forEach((item, address) => {
    lines.push(...labelLines(address));
    const addressPrefix = showAddresses ? `${_.padStart(String(address), addressWidth)}: ` : '';
    lines.push(`  ${addressPrefix}${stringifyLinkedItem(item)}`);
  });
  // A subroutine with an empty body starts at the end of the program
  lines.push(...labelLines(program.length));

  return lines.join('\n');

  function labelLines(address: number): string[] {
    return (labels.get(address) ?? []).map(name => `${name}:`);
  }
}

function labelsByAddress(locations: LocationTable | undefined): Map<number, string[]> {
  const result = new Map<number, string[]>();
  if (!locations) return result;
  for (const [name, address] of locations) {
    const names = result.get(address) ?? [];
    names.push(name);
    result.set(address, names);
  }
  return result;
}
