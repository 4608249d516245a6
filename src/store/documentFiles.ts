/**
 * Reading and writing documents on disk.
 *
 * Output is rendered completely in memory before the file is opened, and
 * each file is read or written with a single synchronous call, so no
 * handle outlives the call even when rendering fails.
 */
import { readFileSync, writeFileSync } from 'node:fs';
import { decodeContainer } from '../engine/container';
import { DEFAULT_CONFIG, type EngineConfig } from '../engine/config';
import { SaveError } from '../engine/errors';
import type { TreeClipboard } from './clipboard';
import { createDocumentStore, type DocumentStoreApi } from './documentStore';

export const CONTAINER_EXTENSION = '.syntree';
export const DIAGRAM_EXTENSION = '.gv';

export interface OpenDocumentOptions {
    clipboard: TreeClipboard;
    config?: EngineConfig;
}

/** Load a container file into a new document. The root starts selected. */
export function openDocument(path: string, options: OpenDocumentOptions): DocumentStoreApi {
    const config = options.config ?? DEFAULT_CONFIG;
    const { root, manifest } = decodeContainer(readFileSync(path), config.messages);
    return createDocumentStore({
        clipboard: options.clipboard,
        config,
        root,
        manifest,
        lastPath: path,
    });
}

/**
 * Save to `path`, or to the path the document was last saved to.
 *
 * A `.gv` path receives diagram source; that is an export and leaves the
 * dirty flag and remembered path alone. Any other path receives the
 * container and marks the document clean.
 */
export function saveDocument(store: DocumentStoreApi, path?: string): string {
    const state = store.getState();
    const target = path || state.lastPath;
    if (!target) {
        throw new SaveError(state.config.messages.noSavePath);
    }
    if (target.toLowerCase().endsWith(DIAGRAM_EXTENSION)) {
        writeFileSync(target, state.exportDiagram(), 'utf8');
        return target;
    }
    writeFileSync(target, state.exportContainer());
    state.markSaved(target);
    return target;
}
