/**
 * Generator Contract Check
 * Finds nodes a generator must not receive unresolved
 */

import type { ASTNode, DocumentNode } from '../types.js';
import { type ContractError, createContractError } from '../types.js';
import { type NodeVisitor, visitNode } from './visitor.js';

interface ContractContext {
  readonly errors: ContractError[];
  /** Ancestors of the node being visited, innermost last */
  readonly parents: ASTNode[];
}

const contractVisitor: NodeVisitor<ContractContext> = {
  enter(node, ctx) {
    if (node.type === 'Directive') {
      const parent = ctx.parents[ctx.parents.length - 1];
      // The closing endif of a conditional travels with it
      const closing = node.name === 'endif' && parent?.type === 'Directive';
      if (!closing) {
        ctx.errors.push(
          createContractError(
            'LEANDOC-C001',
            { name: node.name },
            node.span.start
          )
        );
      }
    } else if (node.type === 'BlockMacro' && node.name === 'include') {
      ctx.errors.push(
        createContractError(
          'LEANDOC-C002',
          { target: node.target },
          node.span.start
        )
      );
    }
    ctx.parents.push(node);
  },
  exit(_node, ctx) {
    ctx.parents.pop();
  },
};

/**
 * Report conditional directives and `include::` macros left in a document.
 * Both must be resolved by a preprocessing pass before a generator walks
 * the tree. Violations are returned in document order.
 */
export function checkContract(document: DocumentNode): ContractError[] {
  const ctx: ContractContext = { errors: [], parents: [] };
  visitNode(document, ctx, contractVisitor);
  return ctx.errors;
}
