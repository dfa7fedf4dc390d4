import { describe, expect, it } from 'vitest';
import {
  type KeyedNode,
  isKeyedObject,
  keyedCapability,
  keyedCursor,
  keyedEntry,
  keyedRoot,
  keyedValue,
  labeledCursor,
  labeledNode,
  listCursor,
} from '../src/entities/tree-adapters.js';
import { InvalidNodeError } from '../src/errors/cursor.js';

describe('Tree adapters', () => {
  describe('nested lists', () => {
    it('walks arrays as branches in pre-order', () => {
      const tree = [1, [2, [3]], 4];
      const nodes = [...listCursor<number>(tree)];

      expect(nodes).toEqual([tree, 1, [2, [3]], 2, [3], 3, 4]);
    });

    it('maps the leaves', () => {
      const result = listCursor<number>([1, [2, [3]], 4]).map((node) =>
        typeof node === 'number' ? node * 2 : node
      );

      expect(result.root()).toEqual([2, [4, [6]], 8]);
    });

    it('treats an empty array as a branch without children', () => {
      const cursor = listCursor<number>([]);

      expect(cursor.isBranch()).toBe(true);
      expect(cursor.down()).toBeNull();
      expect(cursor.appendChild(1).root()).toEqual([1]);
    });

    it('promotes a leaf to a list holding only the new child', () => {
      expect(listCursor<number>([1, 2]).down()?.appendChild(9).root()).toEqual([[9], 2]);
    });

    it('removes an element', () => {
      expect(listCursor<number>([1, 2, 3]).down()?.right()?.remove().root()).toEqual([1, 3]);
    });
  });

  describe('keyed objects', () => {
    const renameAndIncrement = (node: KeyedNode): KeyedNode =>
      node.kind === 'entry'
        ? keyedEntry(
            node.key.toUpperCase(),
            typeof node.value === 'number' ? node.value + 1 : node.value
          )
        : node;

    it('walks the root object and one entry per key', () => {
      const nodes = [...keyedCursor({ a: 10, b: { x: 11 } })];

      expect(nodes).toEqual([
        keyedRoot({ a: 10, b: { x: 11 } }),
        keyedEntry('a', 10),
        keyedEntry('b', { x: 11 }),
        keyedEntry('x', 11),
      ]);
    });

    it('rebuilds objects from mapped entries', () => {
      const result = keyedCursor({ a: 10, b: { x: 11 } }).map(renameAndIncrement);
      expect(keyedValue(result.root())).toEqual({ A: 11, B: { X: 12 } });
    });

    it('treats entries holding plain objects as branches', () => {
      expect(keyedCapability.isBranch(keyedEntry('b', { x: 1 }))).toBe(true);
      expect(keyedCapability.isBranch(keyedEntry('a', 1))).toBe(false);
      expect(keyedCapability.isBranch(keyedEntry('l', [1, 2]))).toBe(false);
      expect(keyedCapability.isBranch(keyedRoot({}))).toBe(true);
    });

    it('promotes a leaf entry to an object', () => {
      const cursor = keyedCursor({ a: 10, b: 2 }).down()?.appendChild(keyedEntry('z', 1));
      expect(cursor && keyedValue(cursor.root())).toEqual({ a: { z: 1 }, b: 2 });
    });

    it('removes a key', () => {
      const cursor = keyedCursor({ a: 1, b: 2 }).down()?.right()?.remove();

      expect(cursor?.node).toEqual(keyedEntry('a', 1));
      expect(cursor && keyedValue(cursor.root())).toEqual({ a: 1 });
    });

    it('rejects children that are not entries', () => {
      expect(() => keyedCapability.makeNode(keyedRoot({}), [keyedRoot({})])).toThrow(
        InvalidNodeError
      );
    });

    it('keeps a "__proto__" key as an own key when rebuilding', () => {
      const parsed: unknown = JSON.parse('{"__proto__":{"x":1},"b":2}');
      if (!isKeyedObject(parsed)) throw new Error('expected a plain object');

      const rebuilt = keyedValue(keyedCursor(parsed).map((node) => node).root());
      if (!isKeyedObject(rebuilt)) throw new Error('expected a plain object');

      expect(Object.keys(rebuilt)).toEqual(['__proto__', 'b']);
      expect(Object.getPrototypeOf(rebuilt)).toBe(Object.prototype);
      expect(Object.getOwnPropertyDescriptor(rebuilt, '__proto__')?.value).toEqual({ x: 1 });
    });

    it('rejects two entries with the same key', () => {
      const cursor = keyedCursor({ a: 1, b: 2 }).down()?.insertRight(keyedEntry('b', 3));

      expect(cursor?.rights).toHaveLength(2);
      expect(() => cursor?.up()).toThrow(InvalidNodeError);
      expect(() => cursor?.up()).toThrow('Duplicate key "b" among keyed children');
    });

    it('recognises plain objects only', () => {
      expect(isKeyedObject({ a: 1 })).toBe(true);
      expect(isKeyedObject(Object.create(null))).toBe(true);
      expect(isKeyedObject([1])).toBe(false);
      expect(isKeyedObject(new Date(0))).toBe(false);
      expect(isKeyedObject(null)).toBe(false);
    });
  });

  describe('labeled nodes', () => {
    const tree = labeledNode('root', [
      labeledNode('a'),
      labeledNode('b', [labeledNode('c')]),
    ]);

    it('walks values in pre-order', () => {
      expect([...labeledCursor(tree)].map((node) => node.value)).toEqual(['root', 'a', 'b', 'c']);
    });

    it('treats a node without children as a leaf', () => {
      const leaf = labeledCursor(tree).down();

      expect(leaf?.isBranch()).toBe(false);
      expect(leaf?.down()).toBeNull();
    });

    it('keeps the value when rebuilding with new children', () => {
      const cursor = labeledCursor(tree).down()?.appendChild(labeledNode('x'));

      expect(cursor?.node).toEqual(labeledNode('a', [labeledNode('x')]));
      expect(cursor?.up()?.node.children.map((child) => child.value)).toEqual(['a', 'b']);
    });

    it('maps values', () => {
      const result = labeledCursor(tree).map((node) => ({ ...node, value: node.value.toUpperCase() }));

      expect(result.root()).toEqual(
        labeledNode('ROOT', [labeledNode('A'), labeledNode('B', [labeledNode('C')])])
      );
    });
  });
});
