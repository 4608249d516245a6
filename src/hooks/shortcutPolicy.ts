export type TreeShortcutAction =
    | 'addChild'
    | 'editNode'
    | 'deleteSubtree'
    | 'moveUp'
    | 'moveDown'
    | 'copy'
    | 'paste'
    | null;

export interface ShortcutPolicyInput {
    key: string;
    hasSelection: boolean;
    isEmpty: boolean;
    isEditing: boolean;
    /** Ctrl, or Cmd on macOS. */
    hasModifier: boolean;
    hasAlt: boolean;
    isRootSelected: boolean;
    isEditableTarget: boolean;
}

export function getTreeShortcutAction(input: ShortcutPolicyInput): TreeShortcutAction {
    const { key, hasSelection, isEmpty, isEditing, hasModifier, hasAlt, isRootSelected, isEditableTarget } = input;
    if (isEditing || isEditableTarget) return null;

    // The first node of an empty document needs no selection.
    if (isEmpty) {
        if (key === 'Insert' && !hasModifier && !hasAlt) return 'addChild';
        if (hasModifier && !hasAlt && key.toLowerCase() === 'v') return 'paste';
        return null;
    }
    if (!hasSelection) return null;

    if (hasModifier && !hasAlt) {
        switch (key.toLowerCase()) {
            case 'c':
                return 'copy';
            case 'v':
                return 'paste';
            default:
                return null;
        }
    }

    if (hasAlt && !hasModifier) {
        if (isRootSelected) return null;
        switch (key) {
            case 'ArrowUp':
                return 'moveUp';
            case 'ArrowDown':
                return 'moveDown';
            default:
                return null;
        }
    }

    if (hasModifier || hasAlt) return null;

    switch (key) {
        case 'Insert':
            return 'addChild';
        case 'F2':
            return 'editNode';
        case 'Delete':
            return 'deleteSubtree';
        default:
            return null;
    }
}
