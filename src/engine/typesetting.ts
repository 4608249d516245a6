/**
 * Typesetting export: nested-bracket tree source for the qtree package.
 *
 *   \Tree [.TP
 *     DP
 *     T$^{\prime}$
 *   ]
 *
 * Inner nodes open `[.label` and close `]` on their own line; leaves
 * below the root are written bare. The root is never a leaf, so a
 * single-node tree still gets a bracket pair.
 */
import type { TreeNode } from '../types/tree';
import { DEFAULT_CONFIG, type EngineConfig } from './config';
import { MarkupTranslator, renderMarkup } from './markup';

const VALUE_SEPARATOR = '\\\\';

function renderNode(node: TreeNode, translator: MarkupTranslator, indent: string, depth: number): string {
    const label = renderMarkup(node.label ?? '', translator);
    const value = node.value ? renderMarkup(node.value, translator) : null;
    const leaf = node.children.length === 0 && depth > 0;
    const pad = indent.repeat(depth);

    let out = pad + (leaf ? '' : '[.') + label;
    if (value) {
        out += VALUE_SEPARATOR + value;
    }
    out += '\n';
    for (const child of node.children) {
        out += renderNode(child, translator, indent, depth + 1);
    }
    if (!leaf) {
        out += pad + ']\n';
    }
    return out;
}

/** Bracket source for the subtree rooted at `root`, prefixed with `\Tree`. */
export function toTypesetting(root: TreeNode, config: Pick<EngineConfig, 'indent'> = DEFAULT_CONFIG): string {
    const translator = new MarkupTranslator();
    return '\\Tree ' + renderNode(root, translator, config.indent, 0);
}

/**
 * Full export: a comment telling the reader which package to load,
 * a blank line, then the tree. An empty document yields the comment only.
 */
export function exportTypesetting(
    root: TreeNode | null,
    config: Pick<EngineConfig, 'indent' | 'messages'> = DEFAULT_CONFIG,
): string {
    const header = `% ${config.messages.typesettingHeader}\n`;
    if (root === null) return header;
    return `${header}\n${toTypesetting(root, config)}`;
}
