/**
 * Clipboard shared by every document a host opens.
 *
 * It holds a value copy (record form) of the last copied subtree, so later
 * edits to the source tree never leak into it. Last writer wins; reads
 * do not clear it.
 */
import type { NodeRecord } from '../types/tree';

export interface TreeClipboard {
    read: () => NodeRecord | null;
    write: (record: NodeRecord) => void;
    clear: () => void;
}

export function createClipboard(): TreeClipboard {
    let slot: NodeRecord | null = null;

    return {
        read() {
            return slot === null ? null : structuredClone(slot);
        },
        write(record) {
            slot = structuredClone(record);
        },
        clear() {
            slot = null;
        },
    };
}
