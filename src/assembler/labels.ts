/**
 * Label addresses
 *
 * Labels occupy no ROM, so a label marks the address of the next
 * A- or C-instruction after it.
 */

import { LabelNode, NodeType, Program } from './parser.js';

export interface LabelAddresses {
  addresses: Map<string, number>;
  // Later declarations of an already-seen name, in source order
  duplicates: LabelNode[];
}

export function resolveLabelAddresses(program: Program): LabelAddresses {
  const addresses = new Map<string, number>();
  const duplicates: LabelNode[] = [];
  let address = 0;

  for (const node of program.instructions) {
    if (node.type !== NodeType.LABEL) {
      address++;
      continue;
    }

    if (addresses.has(node.name)) {
      duplicates.push(node);
    } else {
      addresses.set(node.name, address);
    }
  }

  return { addresses, duplicates };
}
