/**
 * Outline editing with a tree cursor
 *
 * Walks a document outline made of labeled nodes, renames headings, drops a
 * section and stops a search early:
 * - Navigation with down/right/up
 * - Structural edits that only reach the tree when moving up
 * - map and foldWhile over the whole outline or a single section
 */

import {
  type LabeledNode,
  cont,
  halt,
  labeledCapability,
  labeledCursor,
  labeledNode,
  validateTree,
} from '../src/index.js';

type Outline = LabeledNode<string>;

const outline: Outline = labeledNode('Guide', [
  labeledNode('Install', [labeledNode('npm'), labeledNode('From source')]),
  labeledNode('Usage', [labeledNode('Cursors'), labeledNode('Drivers'), labeledNode('Edits')]),
  labeledNode('Changelog'),
]);

function render(node: Outline, depth = 0): string[] {
  const line = `${'  '.repeat(depth)}- ${node.value}`;
  return [line, ...node.children.flatMap((child) => render(child, depth + 1))];
}

function demonstrateOutlineEditing(): void {
  console.log('📚 Outline editing demo\n');
  console.log(render(outline).join('\n'));

  const report = validateTree(outline, labeledCapability<string>());
  console.log(`\n✅ Outline valid: ${report.isValid}`);

  // Drop the changelog: focus Guide > Changelog, remove it, rebuild
  const withoutChangelog = labeledCursor(outline).down()?.rightmost().remove().root();
  if (withoutChangelog) {
    console.log('\n✂️  Without the changelog:');
    console.log(render(withoutChangelog).join('\n'));
  }

  // Number every heading below the title
  const numbered = labeledCursor(outline)
    .traverse((cursor) =>
      cursor.depth === 0
        ? cursor
        : cursor.update((node) => ({ ...node, value: `${cursor.lefts.length + 1}. ${node.value}` }))
    )
    .root();
  console.log('\n🔢 Numbered headings:');
  console.log(render(numbered).join('\n'));

  // Add a section under Usage without touching the rest
  const usage = labeledCursor(outline).find((cursor) => cursor.node.value === 'Usage');
  const extended = usage?.appendChild(labeledNode('Validation')).root();
  if (extended) {
    console.log('\n➕ Usage with a new section:');
    console.log(render(extended).join('\n'));
  }

  // Find the path to the first heading mentioning "Drivers", then stop
  const start: string[] = [];
  const { acc: trail } = labeledCursor(outline).foldWhile(start, (cursor, acc) => {
    const next = [...acc.slice(0, cursor.depth), cursor.node.value];
    return cursor.node.value === 'Drivers' ? halt(cursor, next) : cont(cursor, next);
  });
  console.log(`\n🔎 Found: ${trail.join(' > ')}`);
}

demonstrateOutlineEditing();
