import type { Value, ValueType } from './value';

export interface VisitContext {
  parent: Value | null;
  /** Index in the parent sequence, or the key of the parent mapping entry. */
  key?: number | Value;
  /** Whether the node is a mapping key rather than a value. */
  isKey: boolean;
  depth: number;
}

export interface ValueVisitor {
  enter?: (node: Value, context: VisitContext) => void;
  leave?: (node: Value, context: VisitContext) => void;
  byType?: Partial<Record<ValueType, (node: Value, context: VisitContext) => void>>;
}

interface Pending {
  node: Value;
  context: VisitContext;
  exiting: boolean;
}

/**
 * Traverse a value tree depth-first and invoke visitor callbacks. Mapping keys
 * are visited before their values.
 *
 * Traversal keeps its own stack, so nesting is bounded only by memory. A node
 * reached twice (shared aliases) is visited each time it is reached; a cycle is
 * followed only once.
 */
export function visitValue(root: Value, visitor: ValueVisitor): void {
  const stack: Pending[] = [{ node: root, context: { parent: null, isKey: false, depth: 0 }, exiting: false }];
  const active = new Set<Value>();

  while (stack.length > 0) {
    const item = stack.pop();
    if (!item) break;
    const { node, context } = item;

    if (item.exiting) {
      active.delete(node);
      visitor.leave?.(node, context);
      continue;
    }
    if (active.has(node)) continue;

    visitor.enter?.(node, context);
    visitor.byType?.[node.type]?.(node, context);
    active.add(node);
    stack.push({ node, context, exiting: true });

    const depth = context.depth + 1;
    if (node.type === 'sequence') {
      for (let i = node.items.length - 1; i >= 0; i--) {
        stack.push({ node: node.items[i], context: { parent: node, key: i, isKey: false, depth }, exiting: false });
      }
    } else if (node.type === 'mapping') {
      for (let i = node.entries.length - 1; i >= 0; i--) {
        const entry = node.entries[i];
        stack.push({ node: entry.value, context: { parent: node, key: entry.key, isKey: false, depth }, exiting: false });
        stack.push({ node: entry.key, context: { parent: node, key: entry.key, isKey: true, depth }, exiting: false });
      }
    }
  }
}
