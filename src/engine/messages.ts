/**
 * User-facing strings. A host swaps in a translated table through
 * {@link resolveConfig}; everything else reads from the resolved table.
 */

export interface Messages {
    appName: string;
    /** Display text for a node without a label. */
    unlabelled: string;
    /** First comment line of the typesetting export. */
    typesettingHeader: string;
    /** Placeholders: {runningVersion}, {requiredVersion}. */
    fileTooNew: string;
    fileUnreadable: string;
    noSelection: string;
    emptyClipboard: string;
    rootHasNoSiblings: string;
    cannotMoveRoot: string;
    noSavePath: string;
}

export const DEFAULT_MESSAGES: Messages = {
    appName: 'Syntree',
    unlabelled: 'UNLABELLED',
    typesettingHeader: 'Add \\usepackage{qtree} to the preamble of your document.',
    fileTooNew:
        'This file is too new for the currently running version ({runningVersion}). Please upgrade to {requiredVersion} or later.',
    fileUnreadable: 'Invalid, very outdated, or damaged tree file.',
    noSelection: 'No selection!',
    emptyClipboard: 'Clipboard is empty!',
    rootHasNoSiblings: 'The root cannot have siblings!',
    cannotMoveRoot: 'Cannot shift the root!',
    noSavePath: 'No last path',
};

export function formatMessage(template: string, values: Record<string, string>): string {
    return template.replace(/\{(\w+)\}/g, (match, name: string) =>
        Object.prototype.hasOwnProperty.call(values, name) ? values[name] : match,
    );
}
