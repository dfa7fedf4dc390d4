/**
 * Tree Adapters
 *
 * Capabilities for nested lists, keyed objects and labeled nodes.
 */

export {
  listCapability,
  listCursor,
  keyedCapability,
  keyedCursor,
  keyedRoot,
  keyedEntry,
  keyedValue,
  isKeyedObject,
  labeledCapability,
  labeledCursor,
  labeledNode,
  type NestedList,
  type KeyedObject,
  type KeyedNode,
  type KeyedEntry,
  type LabeledNode,
} from './entities/tree-adapters.js';
