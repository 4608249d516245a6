/**
 * Document store: the single source of truth for one tree.
 *
 * All edits go through these actions. Nodes are edited in place; every
 * accepted edit bumps `revision` and sets `dirty`, so subscribers can
 * tell that the tree changed even when `root` is the same object.
 * Preconditions are checked before anything is touched: a thrown error
 * means the document is unchanged.
 */
import { createStore, type StoreApi } from 'zustand/vanilla';
import { createManifest, encodeContainer } from '../engine/container';
import { DEFAULT_CONFIG, type EngineConfig } from '../engine/config';
import { toDiagramSource } from '../engine/diagram';
import { EmptyClipboardError, NoSelectionError, RootImmutableError, StructuralError } from '../engine/errors';
import {
    addChild,
    createNode,
    detach,
    findNode,
    fromRecord,
    insertParent,
    shiftAmongSiblings,
    toRecord,
} from '../engine/node';
import { exportTypesetting } from '../engine/typesetting';
import type { DocumentState, InsertLocation, Manifest, TreeNode } from '../types/tree';
import type { TreeClipboard } from './clipboard';

/* ------------------------------------------------------------------ */
/*  Store actions                                                     */
/* ------------------------------------------------------------------ */

export interface DocumentActions {
    /** Select the node with the given id (null, or an unknown id, clears the selection). */
    selectNode: (nodeId: string | null) => void;
    /**
     * Add a node relative to the selection. On an empty document the node
     * becomes the root whatever the location. Empty strings mean absent.
     */
    add: (location: InsertLocation, label?: string, value?: string) => TreeNode;
    /** Edit the selection. `''` clears a field, `undefined` leaves it alone. */
    edit: (label?: string, value?: string) => void;
    /** Delete the selection and its subtree; the parent becomes the selection. */
    deleteSelection: () => void;
    /** Copy the selected subtree to the shared clipboard. */
    copy: () => void;
    /** Paste a fresh copy of the clipboard relative to the selection. */
    paste: (location: InsertLocation) => TreeNode;
    /** Swap the selection with its previous sibling; no-op on the first child. */
    moveUp: () => void;
    /** Swap the selection with its next sibling; no-op on the last child. */
    moveDown: () => void;
    setNotes: (notes: string) => void;
    /** Record a successful container save. */
    markSaved: (path: string) => void;
    exportTypesetting: () => string;
    /** Graph is named after the file the document was last saved to or opened from. */
    exportDiagram: () => string;
    exportContainer: () => Uint8Array;
}

export type DocumentStore = DocumentState &
    DocumentActions & {
        readonly config: EngineConfig;
        readonly clipboard: TreeClipboard;
    };

export type DocumentStoreApi = StoreApi<DocumentStore>;

export interface DocumentStoreOptions {
    clipboard: TreeClipboard;
    root?: TreeNode | null;
    manifest?: Manifest;
    lastPath?: string;
    config?: EngineConfig;
}

type StatePatch = Partial<Pick<DocumentState, 'root' | 'selection' | 'manifest'>>;

/** File name without directory or extension. */
export function documentName(path: string): string {
    const base = path.split(/[\\/]/).pop() ?? '';
    const dot = base.lastIndexOf('.');
    return dot > 0 ? base.slice(0, dot) : base;
}

/* ------------------------------------------------------------------ */
/*  Store definition                                                  */
/* ------------------------------------------------------------------ */

export function createDocumentStore(options: DocumentStoreOptions): DocumentStoreApi {
    const config = options.config ?? DEFAULT_CONFIG;
    const { messages } = config;
    const clipboard = options.clipboard;

    return createStore<DocumentStore>()((set, get) => {
        const commit = (patch: StatePatch): void => {
            set((state) => ({ ...patch, dirty: true, revision: state.revision + 1 }));
        };

        const requireSelection = (): TreeNode => {
            const { selection } = get();
            if (selection === null) throw new NoSelectionError(messages.noSelection);
            return selection;
        };

        const place = (location: InsertLocation, node: TreeNode): TreeNode => {
            const { root } = get();
            if (root === null) {
                commit({ root: node, selection: node });
                return node;
            }
            const selection = requireSelection();
            let nextRoot = root;
            switch (location) {
                case 'child':
                    addChild(selection, node);
                    break;
                case 'parent':
                    if (selection === root) {
                        addChild(node, root);
                        nextRoot = node;
                    } else {
                        insertParent(selection, node);
                    }
                    break;
                case 'sibling':
                    if (selection === root || selection.parent === null) {
                        throw new StructuralError(messages.rootHasNoSiblings);
                    }
                    addChild(selection.parent, node);
                    break;
            }
            commit({ root: nextRoot, selection: node });
            return node;
        };

        const shift = (offset: number): void => {
            const selection = requireSelection();
            if (selection === get().root) throw new RootImmutableError(messages.cannotMoveRoot);
            if (shiftAmongSiblings(selection, offset)) commit({});
        };

        return {
            // --- Initial state ---
            root: options.root ?? null,
            selection: options.root ?? null,
            manifest: options.manifest ?? createManifest(),
            dirty: false,
            lastPath: options.lastPath ?? '',
            revision: 0,
            config,
            clipboard,

            // --- Actions ---

            selectNode(nodeId) {
                const { root } = get();
                const selection = nodeId !== null && root !== null ? findNode(root, nodeId) : null;
                set({ selection });
            },

            add(location, label, value) {
                return place(location, createNode(label || null, value || null));
            },

            edit(label, value) {
                const selection = requireSelection();
                let changed = false;
                if (label !== undefined) {
                    const next = label === '' ? null : label;
                    if (next !== selection.label) {
                        selection.label = next;
                        changed = true;
                    }
                }
                if (value !== undefined) {
                    const next = value === '' ? null : value;
                    if (next !== selection.value) {
                        selection.value = next;
                        changed = true;
                    }
                }
                if (changed) commit({});
            },

            deleteSelection() {
                const selection = requireSelection();
                const parent = selection.parent;
                if (selection === get().root || parent === null) {
                    commit({ root: null, selection: null });
                    return;
                }
                detach(selection);
                commit({ selection: parent });
            },

            copy() {
                clipboard.write(toRecord(requireSelection()));
            },

            paste(location) {
                const record = clipboard.read();
                if (record === null) throw new EmptyClipboardError(messages.emptyClipboard);
                return place(location, fromRecord(record));
            },

            moveUp() {
                shift(-1);
            },

            moveDown() {
                shift(1);
            },

            setNotes(notes) {
                commit({ manifest: { ...get().manifest, notes } });
            },

            markSaved(path) {
                set({ dirty: false, lastPath: path });
            },

            exportTypesetting() {
                return exportTypesetting(get().root, config);
            },

            exportDiagram() {
                const { root, lastPath } = get();
                return toDiagramSource(root, {
                    name: lastPath ? documentName(lastPath) : undefined,
                    diagram: config.diagram,
                });
            },

            exportContainer() {
                const { root, manifest } = get();
                return encodeContainer(root, manifest);
            },
        };
    });
}
