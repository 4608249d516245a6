/**
 * Read-only views over a document for the presentation layer.
 */
import { DEFAULT_MESSAGES, type Messages } from '../engine/messages';
import type { DocumentState, InsertLocation } from '../types/tree';
import { documentName } from './documentStore';

export function isEmpty(state: Pick<DocumentState, 'root'>): boolean {
    return state.root === null;
}

export function hasSelection(state: Pick<DocumentState, 'selection'>): boolean {
    return state.selection !== null;
}

export function selectNotes(state: Pick<DocumentState, 'manifest'>): string {
    return state.manifest.notes ?? '';
}

/**
 * Locations an add or paste may use right now. An empty document takes
 * the first node anywhere; the root has no siblings.
 */
export function availableLocations(state: Pick<DocumentState, 'root' | 'selection'>): InsertLocation[] {
    if (state.root === null) return ['child'];
    if (state.selection === null) return [];
    if (state.selection === state.root) return ['child', 'parent'];
    return ['child', 'parent', 'sibling'];
}

/** Window title: `*name – App`, with the star only while there are unsaved changes. */
export function documentTitle(
    state: Pick<DocumentState, 'dirty' | 'lastPath'>,
    messages: Pick<Messages, 'appName'> = DEFAULT_MESSAGES,
): string {
    let title = messages.appName;
    if (state.lastPath) {
        title = `${documentName(state.lastPath)} – ${title}`;
    }
    if (state.dirty) {
        title = `*${title}`;
    }
    return title;
}
