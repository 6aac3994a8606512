import { describe, it, expect } from 'vitest';
import { parse, NodeType } from '../../src/assembler/parser.js';
import { resolveLabelAddresses } from '../../src/assembler/labels.js';

describe('resolveLabelAddresses', () => {
  it('should return nothing for a program without labels', () => {
    const { addresses, duplicates } = resolveLabelAddresses(parse('@1\nD=A'));
    expect(addresses.size).toBe(0);
    expect(duplicates).toHaveLength(0);
  });

  it('should point a label at the next instruction', () => {
    const program = parse(`(START)
@1
D=A
(LOOP)
(ALSO_LOOP)
D=D-1
@LOOP
D;JGT
(END)`);
    const { addresses } = resolveLabelAddresses(program);
    expect([...addresses]).toEqual([
      ['START', 0],
      ['LOOP', 2],
      ['ALSO_LOOP', 2],
      ['END', 5],
    ]);
  });

  it('should keep the first address and report duplicates', () => {
    const program = parse('(X)\n@1\n(X)\n@2');
    const { addresses, duplicates } = resolveLabelAddresses(program);
    expect(addresses.get('X')).toBe(0);
    expect(duplicates).toEqual([{ type: NodeType.LABEL, name: 'X', line: 3, column: 1 }]);
  });

  it('should treat label names case-sensitively', () => {
    const { addresses } = resolveLabelAddresses(parse('(loop)\n@1\n(LOOP)'));
    expect(addresses.get('loop')).toBe(0);
    expect(addresses.get('LOOP')).toBe(1);
  });
});
