/**
 * Container format: a zip archive with two JSON entries.
 *
 *   manifest.json  { "version": "<major>.<minor>.<patch>", "notes"?: string, ... }
 *   tree.json      the root as a nested {label, value, children} record, or null
 *
 * Only the major version is compared on load. Every read failure is an
 * IncompatibleFormatError; a too-new file also carries the version that
 * is needed to open it.
 */
import { strFromU8, strToU8, unzipSync, zipSync, type Unzipped } from 'fflate';
import type { Manifest, NodeRecord, TreeNode } from '../types/tree';
import { IncompatibleFormatError } from './errors';
import { DEFAULT_MESSAGES, formatMessage, type Messages } from './messages';
import { fromRecord, toRecord } from './node';

export const CONTAINER_VERSION = '1.0.0';
export const MANIFEST_ENTRY = 'manifest.json';
export const TREE_ENTRY = 'tree.json';

export function createManifest(): Manifest {
    return { version: CONTAINER_VERSION };
}

/** Leading numeric component of a dotted version, or null if there is none. */
export function majorVersion(version: string): number | null {
    const match = /^\s*(\d+)/.exec(version);
    return match ? Number(match[1]) : null;
}

const RUNNING_MAJOR = majorVersion(CONTAINER_VERSION) ?? 0;

/* ------------------------------------------------------------------ */
/*  Record validation                                                 */
/* ------------------------------------------------------------------ */

function isOptionalText(value: unknown): value is string | null | undefined {
    return value === undefined || value === null || typeof value === 'string';
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
    return !!value && typeof value === 'object' && !Array.isArray(value);
}

export function isNodeRecord(value: unknown): value is NodeRecord {
    if (!isPlainObject(value)) return false;
    if (!isOptionalText(value.label) || !isOptionalText(value.value)) return false;
    if (value.children === undefined) return true;
    return Array.isArray(value.children) && value.children.every(isNodeRecord);
}

/* ------------------------------------------------------------------ */
/*  Encode                                                            */
/* ------------------------------------------------------------------ */

export function encodeContainer(root: TreeNode | null, manifest: Manifest): Uint8Array {
    const entries: Record<string, Uint8Array> = {
        [TREE_ENTRY]: strToU8(JSON.stringify(root ? toRecord(root) : null, null, 2)),
        [MANIFEST_ENTRY]: strToU8(JSON.stringify({ ...manifest, version: CONTAINER_VERSION }, null, 2)),
    };
    return zipSync(entries, { level: 9 });
}

/* ------------------------------------------------------------------ */
/*  Decode                                                            */
/* ------------------------------------------------------------------ */

export interface DecodedContainer {
    root: TreeNode | null;
    manifest: Manifest;
}

function readEntry(bytes: Uint8Array, name: string, messages: Messages): unknown {
    let entries: Unzipped;
    try {
        entries = unzipSync(bytes, { filter: (file) => file.name === name });
    } catch (error) {
        throw new IncompatibleFormatError(messages.fileUnreadable, null, { cause: error });
    }
    const entry = entries[name];
    if (entry === undefined) {
        throw new IncompatibleFormatError(messages.fileUnreadable);
    }
    try {
        return JSON.parse(strFromU8(entry));
    } catch (error) {
        throw new IncompatibleFormatError(messages.fileUnreadable, null, { cause: error });
    }
}

function readManifest(raw: Record<string, unknown>, version: string): Manifest {
    const manifest = createManifest();
    manifest.version = version;
    for (const [key, entry] of Object.entries(raw)) {
        if (key === 'version') continue;
        if (key === 'notes') {
            if (typeof entry === 'string') {
                manifest.notes = entry;
            } else {
                console.warn('Manifest notes are not text; ignoring them.');
            }
            continue;
        }
        // Own data property, so a "__proto__" key stays a key.
        Object.defineProperty(manifest, key, { value: entry, enumerable: true, writable: true, configurable: true });
    }
    return manifest;
}

export function decodeContainer(bytes: Uint8Array, messages: Messages = DEFAULT_MESSAGES): DecodedContainer {
    const rawManifest = readEntry(bytes, MANIFEST_ENTRY, messages);
    const version = isPlainObject(rawManifest) ? rawManifest.version : undefined;
    if (!isPlainObject(rawManifest) || typeof version !== 'string') {
        throw new IncompatibleFormatError(messages.fileUnreadable);
    }
    const theirMajor = majorVersion(version);
    if (theirMajor === null) {
        throw new IncompatibleFormatError(messages.fileUnreadable);
    }
    if (theirMajor > RUNNING_MAJOR) {
        const requiredVersion = `${theirMajor}.0.0`;
        throw new IncompatibleFormatError(
            formatMessage(messages.fileTooNew, { runningVersion: CONTAINER_VERSION, requiredVersion }),
            requiredVersion,
        );
    }

    const rawTree = readEntry(bytes, TREE_ENTRY, messages);
    if (rawTree !== null && !isNodeRecord(rawTree)) {
        throw new IncompatibleFormatError(messages.fileUnreadable);
    }
    return {
        root: rawTree === null ? null : fromRecord(rawTree),
        manifest: readManifest(rawManifest, version),
    };
}
