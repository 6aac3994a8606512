/**
 * Canonical text for parsed instructions. Registers and jump mnemonics are
 * printed upper case; literals keep the digits they were written with.
 */

import { Computation, InstructionNode, NodeType, Program } from './parser.js';

export function formatComputation(comp: Computation): string {
  switch (comp.kind) {
    case 'constant':
      return String(comp.value);
    case 'register':
      return comp.register;
    case 'unary':
      return comp.position === 'prefix' ? `${comp.op}${comp.operand}` : `${comp.operand}${comp.op}`;
    case 'binary':
      return `${comp.left}${comp.op}${comp.right}`;
  }
}

export function formatInstruction(node: InstructionNode): string {
  switch (node.type) {
    case NodeType.LABEL:
      return `(${node.name})`;
    case NodeType.AT_INSTRUCTION:
      return node.operand.kind === 'literal' ? `@${node.operand.digits}` : `@${node.operand.name}`;
    case NodeType.C_INSTRUCTION: {
      let text = formatComputation(node.comp);
      if (node.dest.length > 0) {
        text = `${node.dest.join('')}=${text}`;
      }
      if (node.jump !== undefined) {
        text += `;${node.jump}`;
      }
      return text;
    }
  }
}

export function formatProgram(program: Program): string {
  return program.instructions.map(node => formatInstruction(node) + '\n').join('');
}
