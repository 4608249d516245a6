/**
 * Node graph operations.
 *
 * The tree is owned top-down through `children`; `parent` is only a
 * back-reference. Every operation checks its preconditions before it
 * touches anything, so a rejected call leaves the graph unchanged.
 */
import { nanoid } from 'nanoid';
import type { NodeRecord, TreeNode } from '../types/tree';
import { StructuralError } from './errors';
import { DEFAULT_MESSAGES } from './messages';

/* ------------------------------------------------------------------ */
/*  Construction                                                      */
/* ------------------------------------------------------------------ */

export function createNode(label: string | null = null, value: string | null = null): TreeNode {
    return {
        id: nanoid(10),
        label,
        value,
        children: [],
        parent: null,
    };
}

/** Build a fresh, parentless subtree from its record form. */
export function fromRecord(record: NodeRecord): TreeNode {
    const node = createNode(record.label ?? null, record.value ?? null);
    for (const child of record.children ?? []) {
        addChild(node, fromRecord(child));
    }
    return node;
}

export function toRecord(node: TreeNode): Required<NodeRecord> {
    return {
        label: node.label,
        value: node.value,
        children: node.children.map(toRecord),
    };
}

/* ------------------------------------------------------------------ */
/*  Structural edits                                                  */
/* ------------------------------------------------------------------ */

export function addChild(parent: TreeNode, child: TreeNode): void {
    if (child.parent !== null) {
        throw new StructuralError('Node already has a parent');
    }
    if (child === parent || isAncestor(child, parent)) {
        throw new StructuralError('A node cannot become its own descendant');
    }
    parent.children.push(child);
    child.parent = parent;
}

/**
 * Remove a node (with its subtree) from its parent. Detaching a root is
 * the caller's business and is rejected here.
 */
export function detach(node: TreeNode): void {
    const parent = node.parent;
    if (parent === null) {
        throw new StructuralError('Cannot detach a node without a parent');
    }
    const index = parent.children.indexOf(node);
    if (index !== -1) {
        parent.children.splice(index, 1);
    }
    node.parent = null;
}

/**
 * Splice `newParent` into `node`'s slot among its siblings and append
 * `node` to its children. A `newParent` that already has children keeps
 * them, ahead of `node`.
 */
export function insertParent(node: TreeNode, newParent: TreeNode): void {
    const parent = node.parent;
    if (parent === null) {
        throw new StructuralError('Cannot insert a parent above a root');
    }
    if (newParent.parent !== null) {
        throw new StructuralError('New parent already has a parent');
    }
    if (newParent === node || isAncestor(newParent, node)) {
        throw new StructuralError('A node cannot become its own descendant');
    }
    const index = parent.children.indexOf(node);
    parent.children[index] = newParent;
    newParent.parent = parent;
    node.parent = null;
    addChild(newParent, node);
}

/**
 * Swap a node with its neighbour `offset` positions away. Returns false
 * (and changes nothing) when the target slot is outside the sibling list.
 */
export function shiftAmongSiblings(node: TreeNode, offset: number): boolean {
    const parent = node.parent;
    if (parent === null) {
        throw new StructuralError('A root has no siblings');
    }
    const siblings = parent.children;
    const from = siblings.indexOf(node);
    const to = from + offset;
    if (to < 0 || to >= siblings.length) return false;
    siblings.splice(from, 1);
    siblings.splice(to, 0, node);
    return true;
}

/* ------------------------------------------------------------------ */
/*  Queries                                                           */
/* ------------------------------------------------------------------ */

/** True if `ancestor` lies on the parent chain of `node`. */
export function isAncestor(ancestor: TreeNode, node: TreeNode): boolean {
    let current = node.parent;
    while (current !== null) {
        if (current === ancestor) return true;
        current = current.parent;
    }
    return false;
}

export function depthOf(node: TreeNode): number {
    let depth = 0;
    let current = node.parent;
    while (current !== null) {
        depth += 1;
        current = current.parent;
    }
    return depth;
}

/** Depth-first, pre-order. */
export function walkTree(root: TreeNode, visit: (node: TreeNode, depth: number) => void): void {
    const stack: Array<{ node: TreeNode; depth: number }> = [{ node: root, depth: 0 }];
    let entry = stack.pop();
    while (entry !== undefined) {
        visit(entry.node, entry.depth);
        for (let i = entry.node.children.length - 1; i >= 0; i--) {
            stack.push({ node: entry.node.children[i], depth: entry.depth + 1 });
        }
        entry = stack.pop();
    }
}

export function findNode(root: TreeNode, id: string): TreeNode | null {
    const stack = [root];
    let node = stack.pop();
    while (node !== undefined) {
        if (node.id === id) return node;
        stack.push(...node.children);
        node = stack.pop();
    }
    return null;
}

export function countNodes(root: TreeNode): number {
    let count = 0;
    walkTree(root, () => {
        count += 1;
    });
    return count;
}

export function toDisplayString(node: TreeNode, unlabelled: string = DEFAULT_MESSAGES.unlabelled): string {
    let text = node.label ? node.label : unlabelled;
    if (node.value) {
        text += ': ' + node.value;
    }
    return text;
}
