import { describe, expect, it } from 'vitest';
import { loadOne } from '../src/load';
import { intValue, mappingValue, sequenceValue, stringValue } from '../src/value';
import { visitValue } from '../src/visitor';

describe('visitValue', () => {
  it('traverses depth-first with keys before values', () => {
    const seen: string[] = [];
    visitValue(loadOne('a: [1, 2]\nb: x'), {
      enter(node, context) {
        seen.push(`${node.type}@${context.depth}${context.isKey ? ' key' : ''}`);
      },
    });
    expect(seen).toEqual([
      'mapping@0',
      'string@1 key',
      'sequence@1',
      'int@2',
      'int@2',
      'string@1 key',
      'string@1',
    ]);
  });

  it('leaves children before their parents', () => {
    const left: string[] = [];
    visitValue(loadOne('[1, [2]]'), {
      leave(node) {
        left.push(node.type === 'int' ? String(node.value) : node.type);
      },
    });
    expect(left).toEqual(['1', '2', 'sequence', 'sequence']);
  });

  it('reports the parent and sequence index', () => {
    const root = loadOne('[a, b]');
    const indexes: Array<number | undefined> = [];
    visitValue(root, {
      byType: {
        string(_node, context) {
          expect(context.parent).toBe(root);
          indexes.push(typeof context.key === 'number' ? context.key : undefined);
        },
      },
    });
    expect(indexes).toEqual([0, 1]);
  });

  it('dispatches per-type handlers', () => {
    let ints = 0;
    visitValue(loadOne('a: 1\nb: [2, 3]\nc: x'), {
      byType: {
        int() {
          ints++;
        },
      },
    });
    expect(ints).toBe(3);
  });

  it('visits a shared child once per reference', () => {
    const shared = intValue(7);
    const root = mappingValue([
      { key: stringValue('a'), value: shared },
      { key: stringValue('b'), value: shared },
    ]);
    let visits = 0;
    visitValue(root, {
      enter(node) {
        if (node === shared) visits++;
      },
    });
    expect(visits).toBe(2);
  });

  it('does not follow a cycle', () => {
    const seq = sequenceValue();
    seq.items.push(seq);
    let entered = 0;
    visitValue(seq, {
      enter() {
        entered++;
      },
    });
    expect(entered).toBe(1);
  });

  it('walks deep values without recursion', () => {
    let value = sequenceValue();
    const root = value;
    for (let i = 0; i < 20_000; i++) {
      const child = sequenceValue();
      value.items.push(child);
      value = child;
    }
    let maxDepth = 0;
    visitValue(root, {
      enter(_node, context) {
        maxDepth = Math.max(maxDepth, context.depth);
      },
    });
    expect(maxDepth).toBe(20_000);
  });
});
