import assert from 'node:assert/strict';
import test from 'node:test';
import {
    EmptyClipboardError,
    NoSelectionError,
    RootImmutableError,
    StructuralError,
} from '../src/engine/errors.ts';
import { fromRecord, toRecord } from '../src/engine/node.ts';
import { createClipboard, type TreeClipboard } from '../src/store/clipboard.ts';
import { createDocumentStore, documentName, type DocumentStoreApi } from '../src/store/documentStore.ts';
import type { NodeRecord, TreeNode } from '../src/types/tree.ts';

function labels(nodes: TreeNode[]): Array<string | null> {
    return nodes.map((node) => node.label);
}

/** Store over `record` with the node at `path` (child indexes from the root) selected. */
function storeWith(record: NodeRecord, path: number[] = [], clipboard: TreeClipboard = createClipboard()): DocumentStoreApi {
    const root = fromRecord(record);
    let selection = root;
    for (const index of path) selection = selection.children[index];
    const store = createDocumentStore({ clipboard, root });
    store.getState().selectNode(selection.id);
    return store;
}

const ABC: NodeRecord = { label: 'P', children: [{ label: 'A' }, { label: 'B' }, { label: 'C' }] };

test('a new document is empty, clean and unselected', () => {
    const state = createDocumentStore({ clipboard: createClipboard() }).getState();
    assert.equal(state.root, null);
    assert.equal(state.selection, null);
    assert.equal(state.dirty, false);
    assert.equal(state.lastPath, '');
    assert.equal(state.manifest.version, '1.0.0');
});

test('the first node becomes the root whatever the location', () => {
    const store = createDocumentStore({ clipboard: createClipboard() });
    const node = store.getState().add('sibling', 'TP', '');
    const state = store.getState();
    assert.equal(state.root, node);
    assert.equal(state.selection, node);
    assert.equal(node.label, 'TP');
    assert.equal(node.value, null);
    assert.equal(state.dirty, true);
    assert.equal(state.revision, 1);
});

test('add requires a selection on a non-empty document', () => {
    const store = storeWith(ABC);
    store.getState().selectNode(null);
    assert.throws(() => store.getState().add('child', 'X'), NoSelectionError);
    assert.equal(store.getState().dirty, false);
    assert.equal(store.getState().root?.children.length, 3);
});

test('add as child appends under the selection and selects the new node', () => {
    const store = storeWith(ABC, [1]);
    const node = store.getState().add('child', 'B1');
    const b = store.getState().root?.children[1];
    assert.deepEqual(b?.children, [node]);
    assert.equal(store.getState().selection, node);
});

test('add as sibling appends to the parent of the selection', () => {
    const store = storeWith(ABC, [0]);
    store.getState().add('sibling', 'D');
    assert.deepEqual(labels(store.getState().root?.children ?? []), ['A', 'B', 'C', 'D']);
});

test('add as sibling of the root is rejected without changes', () => {
    const store = storeWith(ABC);
    assert.throws(() => store.getState().add('sibling', 'X'), StructuralError);
    const state = store.getState();
    assert.equal(state.dirty, false);
    assert.equal(state.revision, 0);
    assert.equal(state.selection, state.root);
    assert.deepEqual(labels(state.root?.children ?? []), ['A', 'B', 'C']);
});

test('add as parent of an inner node keeps its position', () => {
    const store = storeWith(ABC, [1]);
    const node = store.getState().add('parent', 'Q');
    const root = store.getState().root;
    assert.deepEqual(labels(root?.children ?? []), ['A', 'Q', 'C']);
    assert.deepEqual(labels(node.children), ['B']);
});

test('add as parent of the root replaces the root', () => {
    const store = storeWith(ABC);
    const oldRoot = store.getState().root;
    const node = store.getState().add('parent', 'S');
    const state = store.getState();
    assert.equal(state.root, node);
    assert.equal(node.parent, null);
    assert.deepEqual(node.children, [oldRoot]);
    assert.equal(oldRoot?.parent, node);
});

test('edit clears fields on empty strings and ignores omitted ones', () => {
    const store = storeWith({ label: 'D', value: 'the' });
    store.getState().edit(undefined, '');
    let root = store.getState().root;
    assert.equal(root?.label, 'D');
    assert.equal(root?.value, null);
    assert.equal(store.getState().dirty, true);

    store.getState().edit('DP');
    root = store.getState().root;
    assert.equal(root?.label, 'DP');
    assert.equal(root?.value, null);
    assert.equal(store.getState().revision, 2);
});

test('edit without an actual change leaves the document clean', () => {
    const store = storeWith({ label: 'D', value: 'the' });
    store.getState().edit('D', 'the');
    store.getState().edit();
    assert.equal(store.getState().dirty, false);
    assert.equal(store.getState().revision, 0);
});

test('edit requires a selection', () => {
    const store = storeWith(ABC);
    store.getState().selectNode(null);
    assert.throws(() => store.getState().edit('X'), NoSelectionError);
});

test('delete moves the selection to the parent and drops the subtree', () => {
    const store = storeWith({ label: 'P', children: [{ label: 'A', children: [{ label: 'A1' }] }, { label: 'B' }] }, [0]);
    const parent = store.getState().root;
    store.getState().deleteSelection();
    const state = store.getState();
    assert.equal(state.selection, parent);
    assert.deepEqual(labels(state.root?.children ?? []), ['B']);
    assert.equal(state.dirty, true);
});

test('deleting the root empties the document', () => {
    const store = storeWith(ABC);
    store.getState().deleteSelection();
    const state = store.getState();
    assert.equal(state.root, null);
    assert.equal(state.selection, null);
    assert.equal(state.dirty, true);
});

test('delete requires a selection', () => {
    const store = storeWith(ABC);
    store.getState().selectNode(null);
    assert.throws(() => store.getState().deleteSelection(), NoSelectionError);
});

test('copy requires a selection and paste requires a copy', () => {
    const store = storeWith(ABC);
    assert.throws(() => store.getState().paste('child'), EmptyClipboardError);
    store.getState().selectNode(null);
    assert.throws(() => store.getState().copy(), NoSelectionError);
    assert.equal(store.getState().dirty, false);
});

test('paste places a fresh copy every time', () => {
    const store = storeWith({ label: 'P', children: [{ label: 'NP', children: [{ label: 'N' }] }] }, [0]);
    store.getState().copy();
    store.getState().selectNode(store.getState().root?.id ?? null);

    const first = store.getState().paste('child');
    store.getState().selectNode(store.getState().root?.id ?? null);
    const second = store.getState().paste('child');

    const root = store.getState().root;
    assert.deepEqual(labels(root?.children ?? []), ['NP', 'NP', 'NP']);
    assert.notEqual(first, second);
    assert.notEqual(first.children[0], second.children[0]);
    assert.notEqual(first, root?.children[0]);
    assert.deepEqual(toRecord(first), toRecord(second));
    assert.equal(store.getState().selection, second);
});

test('copied content is not affected by later edits of the source', () => {
    const store = storeWith(ABC, [0]);
    store.getState().copy();
    store.getState().edit('changed');
    store.getState().selectNode(store.getState().root?.id ?? null);
    const pasted = store.getState().paste('child');
    assert.equal(pasted.label, 'A');
});

test('the clipboard is shared between documents', () => {
    const clipboard = createClipboard();
    const source = storeWith({ label: 'S', children: [{ label: 'VP', value: 'ran' }] }, [0], clipboard);
    source.getState().copy();

    const target = createDocumentStore({ clipboard });
    const pasted = target.getState().paste('child');
    assert.equal(target.getState().root, pasted);
    assert.equal(pasted.label, 'VP');
    assert.equal(pasted.value, 'ran');
    assert.notEqual(pasted, source.getState().root?.children[0]);
});

test('paste as parent of the root wraps the whole tree', () => {
    const store = storeWith({ label: 'S', children: [{ label: 'X' }] }, [0]);
    store.getState().copy();
    store.getState().selectNode(store.getState().root?.id ?? null);
    const pasted = store.getState().paste('parent');
    const root = store.getState().root;
    assert.equal(root, pasted);
    assert.deepEqual(labels(pasted.children), ['S']);
});

test('a pasted parent keeps its own children ahead of the selection', () => {
    const store = storeWith({ label: 'P', children: [{ label: 'A', children: [{ label: 'A1' }] }, { label: 'B' }] }, [0]);
    store.getState().copy();
    const b = store.getState().root?.children[1];
    store.getState().selectNode(b?.id ?? null);

    const pasted = store.getState().paste('parent');
    assert.deepEqual(labels(pasted.children), ['A1', 'B']);
    assert.equal(b?.parent, pasted);
    assert.deepEqual(labels(store.getState().root?.children ?? []), ['A', 'A']);
    assert.equal(store.getState().root?.children[1], pasted);
});

test('a pasted parent of the root also keeps its children first', () => {
    const store = storeWith({ label: 'S', children: [{ label: 'X', children: [{ label: 'Y' }] }] }, [0]);
    store.getState().copy();
    const oldRoot = store.getState().root;
    store.getState().selectNode(oldRoot?.id ?? null);

    const pasted = store.getState().paste('parent');
    assert.equal(store.getState().root, pasted);
    assert.deepEqual(labels(pasted.children), ['Y', 'S']);
    assert.equal(oldRoot?.parent, pasted);
});

test('moveUp and moveDown swap with the neighbouring sibling', () => {
    const store = storeWith(ABC, [1]);
    store.getState().moveUp();
    assert.deepEqual(labels(store.getState().root?.children ?? []), ['B', 'A', 'C']);
    store.getState().moveDown();
    store.getState().moveDown();
    assert.deepEqual(labels(store.getState().root?.children ?? []), ['A', 'C', 'B']);
    assert.equal(store.getState().selection?.label, 'B');
    assert.equal(store.getState().revision, 3);
});

test('moving past either end is a no-op that keeps the document clean', () => {
    const store = storeWith(ABC, [0]);
    store.getState().moveUp();
    assert.deepEqual(labels(store.getState().root?.children ?? []), ['A', 'B', 'C']);
    assert.equal(store.getState().dirty, false);

    const last = store.getState().root?.children[2];
    store.getState().selectNode(last?.id ?? null);
    store.getState().moveDown();
    assert.deepEqual(labels(store.getState().root?.children ?? []), ['A', 'B', 'C']);
    assert.equal(store.getState().dirty, false);
    assert.equal(store.getState().revision, 0);
});

test('moving the root or nothing is an error', () => {
    const store = storeWith(ABC);
    assert.throws(() => store.getState().moveUp(), RootImmutableError);
    assert.throws(() => store.getState().moveDown(), RootImmutableError);
    store.getState().selectNode(null);
    assert.throws(() => store.getState().moveUp(), NoSelectionError);
});

test('selectNode ignores ids outside the tree', () => {
    const store = storeWith(ABC);
    store.getState().selectNode('not-a-node');
    assert.equal(store.getState().selection, null);
});

test('notes live in the manifest and mark the document dirty', () => {
    const store = storeWith(ABC);
    store.getState().setNotes('The cat sat.');
    assert.equal(store.getState().manifest.notes, 'The cat sat.');
    assert.equal(store.getState().manifest.version, '1.0.0');
    assert.equal(store.getState().dirty, true);
});

test('markSaved clears dirty and remembers the path', () => {
    const store = storeWith(ABC);
    store.getState().add('child', 'D');
    store.getState().markSaved('/trees/sentence.syntree');
    assert.equal(store.getState().dirty, false);
    assert.equal(store.getState().lastPath, '/trees/sentence.syntree');
});

test('subscribers see every in-place edit through the revision', () => {
    const store = storeWith(ABC, [0]);
    const revisions: number[] = [];
    const unsubscribe = store.subscribe((state) => revisions.push(state.revision));
    store.getState().edit('A2');
    store.getState().moveDown();
    unsubscribe();
    store.getState().edit('A3');
    assert.deepEqual(revisions, [1, 2]);
});

test('exports read the current tree', () => {
    const store = storeWith({ label: 'TP', children: [{ label: 'DP' }] });
    assert.equal(
        store.getState().exportTypesetting(),
        '% Add \\usepackage{qtree} to the preamble of your document.\n\n\\Tree [.TP\n  DP\n]\n',
    );
    store.getState().markSaved('/trees/my-tree.syntree');
    assert.equal(
        store.getState().exportDiagram(),
        'graph "my-tree" {\n\tgraph [dpi=400 nodesep=.25 ranksep=0.02]\n\tnode [shape=plain]\n' +
            '\tTP [label=<TP>]\n\tDP [label=<DP>]\n\tTP -- DP\n}\n',
    );
    assert.ok(store.getState().exportContainer().length > 0);
});

test('documentName strips directories and the extension', () => {
    assert.equal(documentName('/trees/my-tree.syntree'), 'my-tree');
    assert.equal(documentName('C:\\trees\\clause.gv'), 'clause');
    assert.equal(documentName('.hidden'), '.hidden');
    assert.equal(documentName('plain'), 'plain');
});
