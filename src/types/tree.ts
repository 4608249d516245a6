/**
 * Core semantic types for the syntree document model.
 *
 * Design: the in-memory node graph is the source of truth.
 * Typesetting source, diagram source and the on-disk container are
 * derived (projected) from it and never read back into it, except for
 * the container which round-trips through {@link NodeRecord}.
 */

/** A single node in the tree. Children order is significant. */
export interface TreeNode {
    /** Opaque in-memory id; not persisted. */
    id: string;
    label: string | null;
    value: string | null;
    children: TreeNode[];
    /** Back-reference to the owning parent (null for a root or a detached node). */
    parent: TreeNode | null;
}

/**
 * Serializable form of a subtree. This is both the structural entry of
 * the container and the clipboard payload.
 */
export interface NodeRecord {
    label?: string | null;
    value?: string | null;
    children?: NodeRecord[];
}

/** Where a new or pasted node goes relative to the current selection. */
export type InsertLocation = 'child' | 'parent' | 'sibling';

/** Persisted metadata. `version` is always present. */
export interface Manifest {
    version: string;
    notes?: string;
    [key: string]: unknown;
}

/** Full state for one document. */
export interface DocumentState {
    /** Root node (null if the document is empty). */
    root: TreeNode | null;
    /** Currently selected node; a view into the tree, never an owner. */
    selection: TreeNode | null;
    manifest: Manifest;
    /** Set on every mutation, cleared on a successful container save. */
    dirty: boolean;
    lastPath: string;
    /** Bumped on every mutation, including in-place edits of the node graph. */
    revision: number;
}
