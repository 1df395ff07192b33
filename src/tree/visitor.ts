/**
 * Tree Visitor
 * Recursive traversal with enter/exit callbacks
 */

import type { ASTNode } from '../types.js';

// ============================================================
// VISITOR INTERFACE
// ============================================================

/**
 * Visitor pattern interface for tree traversal.
 * Provides enter/exit callbacks invoked before and after visiting children.
 */
export interface NodeVisitor<C> {
  /** Called before visiting the node's children */
  enter(node: ASTNode, context: C): void;

  /** Called after visiting the node's children */
  exit(node: ASTNode, context: C): void;
}

// ============================================================
// CHILDREN
// ============================================================

/**
 * Owned child nodes in document order. Inline content of a node comes
 * before its nested blocks; list items, rows and cells are children of
 * their container.
 */
export function childrenOf(node: ASTNode): readonly ASTNode[] {
  switch (node.type) {
    case 'Document':
    case 'Section':
    case 'DelimitedBlock':
    case 'Directive':
    case 'ListItem':
      return node.blocks;

    case 'List':
      return node.items;

    case 'Table':
      return node.rows;

    case 'TableRow':
      return node.cells;

    case 'Paragraph':
    case 'AdmonitionParagraph':
    case 'TableCell':
    case 'Emphasis':
    case 'InlineImage':
    case 'InlineAnchor':
    case 'CrossReference':
    case 'InlineMacro':
    case 'Passthrough':
      return node.content;

    case 'LiteralParagraph':
    case 'BlockMacro':
    case 'ThematicBreak':
    case 'PageBreak':
    case 'LineComment':
    case 'Text':
    case 'Space':
    case 'LineBreak':
    case 'Superscript':
    case 'Subscript':
    case 'Link':
    case 'AttributeReference':
      // Leaf nodes - no children
      return [];
  }
}

// ============================================================
// VISITOR FUNCTION
// ============================================================

/**
 * Recursively visit nodes with enter/exit callbacks.
 *
 * Traversal order:
 * 1. visitor.enter(node)
 * 2. Recurse into children
 * 3. visitor.exit(node)
 */
export function visitNode<C>(
  node: ASTNode,
  context: C,
  visitor: NodeVisitor<C>
): void {
  visitor.enter(node, context);
  for (const child of childrenOf(node)) {
    visitNode(child, context, visitor);
  }
  visitor.exit(node, context);
}
