export type { DocumentState, InsertLocation, Manifest, NodeRecord, TreeNode } from './types/tree';

export {
    TreeError,
    StructuralError,
    NoSelectionError,
    EmptyClipboardError,
    RootImmutableError,
    IncompatibleFormatError,
    SaveError,
    isTreeError,
    type TreeErrorCode,
} from './engine/errors';
export { DEFAULT_MESSAGES, formatMessage, type Messages } from './engine/messages';
export {
    DEFAULT_CONFIG,
    resolveConfig,
    type DiagramOptions,
    type EngineConfig,
    type EngineConfigOverrides,
} from './engine/config';
export {
    addChild,
    countNodes,
    createNode,
    depthOf,
    detach,
    findNode,
    fromRecord,
    insertParent,
    isAncestor,
    shiftAmongSiblings,
    toDisplayString,
    toRecord,
    walkTree,
} from './engine/node';
export {
    MarkupTranslator,
    decodeCharacterReferences,
    isMarkupTag,
    isValidMarkup,
    renderMarkup,
    scanMarkup,
    translateMarkup,
    type MarkupTag,
    type MarkupToken,
    type TranslationResult,
} from './engine/markup';
export { exportTypesetting, toTypesetting } from './engine/typesetting';
export {
    buildDiagramStatements,
    escapeHtml,
    freshIdentifier,
    quoteId,
    quoteLabel,
    toDiagramSource,
    type DiagramSourceOptions,
    type DiagramStatement,
} from './engine/diagram';
export {
    CONTAINER_VERSION,
    MANIFEST_ENTRY,
    TREE_ENTRY,
    createManifest,
    decodeContainer,
    encodeContainer,
    isNodeRecord,
    majorVersion,
    type DecodedContainer,
} from './engine/container';

export { createClipboard, type TreeClipboard } from './store/clipboard';
export {
    createDocumentStore,
    documentName,
    type DocumentActions,
    type DocumentStore,
    type DocumentStoreApi,
    type DocumentStoreOptions,
} from './store/documentStore';
export {
    CONTAINER_EXTENSION,
    DIAGRAM_EXTENSION,
    openDocument,
    saveDocument,
    type OpenDocumentOptions,
} from './store/documentFiles';
export { availableLocations, documentTitle, hasSelection, isEmpty, selectNotes } from './store/selectors';
export { getTreeShortcutAction, type ShortcutPolicyInput, type TreeShortcutAction } from './hooks/shortcutPolicy';
