/**
 * Diagram export: converts the tree into Graphviz (DOT) source.
 *
 * Statements are built first as plain descriptors, then printed. Every
 * node gets an identifier derived from the identifier-safe text of its
 * label, made unique within the export by a numeric suffix; edges run
 * parent -- child and carry no label.
 */
import type { TreeNode } from '../types/tree';
import { DEFAULT_CONFIG, type DiagramOptions } from './config';
import { MarkupTranslator, isValidMarkup, translateMarkup } from './markup';

/* ------------------------------------------------------------------ */
/*  Descriptors                                                       */
/* ------------------------------------------------------------------ */

export type DiagramStatement =
    | { kind: 'node'; id: string; label: string }
    | { kind: 'edge'; from: string; to: string };

/** Identifier used when a label has no identifier-safe text. */
const FALLBACK_ID = 'node';

/** Literal swaps applied to valid markup before it becomes an HTML-like label. */
const GLYPH_REPLACEMENTS: ReadonlyArray<readonly [string, string]> = [
    ['<null/>', 'Ø'],
    ['<bar/>', '<sup>′</sup>'],
];

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#x27;');
}

/** Reserve a fresh identifier: `name`, then `name2`, `name3`, ... */
export function freshIdentifier(name: string, used: Set<string>): string {
    const base = name === '' ? FALLBACK_ID : name;
    let candidate = base;
    let suffix = 1;
    while (used.has(candidate)) {
        suffix += 1;
        candidate = `${base}${suffix}`;
    }
    used.add(candidate);
    return candidate;
}

function labelText(text: string, translator: MarkupTranslator): string {
    if (!isValidMarkup(text, translator)) {
        return escapeHtml(text);
    }
    let cleaned = text;
    for (const [glyph, replacement] of GLYPH_REPLACEMENTS) {
        cleaned = cleaned.split(glyph).join(replacement);
    }
    return cleaned;
}

function nodeLabel(node: TreeNode, translator: MarkupTranslator): string {
    const label = labelText(node.label ?? '', translator);
    if (node.value) {
        return `<${label}<br/>${labelText(node.value, translator)}>`;
    }
    return isValidMarkup(label, translator) ? `<${label}>` : label;
}

/** Node and edge descriptors in depth-first pre-order. */
export function buildDiagramStatements(root: TreeNode): DiagramStatement[] {
    const statements: DiagramStatement[] = [];
    const used = new Set<string>();
    const translator = new MarkupTranslator();

    function walk(node: TreeNode, parentId: string | null): void {
        const id = freshIdentifier(translateMarkup(node.label ?? '', translator).plainText, used);
        statements.push({ kind: 'node', id, label: nodeLabel(node, translator) });
        if (parentId !== null) {
            statements.push({ kind: 'edge', from: parentId, to: id });
        }
        for (const child of node.children) {
            walk(child, id);
        }
    }

    walk(root, null);
    return statements;
}

/* ------------------------------------------------------------------ */
/*  Printing                                                          */
/* ------------------------------------------------------------------ */

const BARE_ID = /^[a-zA-Z_\u0080-\uffff][a-zA-Z0-9_\u0080-\uffff]*$/;
const NUMERAL = /^-?(?:\.\d+|\d+(?:\.\d*)?)$/;
const HTML_LABEL = /^<[\s\S]*>$/;
const KEYWORDS: ReadonlySet<string> = new Set(['node', 'edge', 'graph', 'digraph', 'subgraph', 'strict']);

/** Quote a DOT identifier unless it can stand bare. */
export function quoteId(id: string): string {
    if (!KEYWORDS.has(id.toLowerCase()) && (BARE_ID.test(id) || NUMERAL.test(id))) return id;
    return `"${id.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

/** Attribute value: HTML-like labels stay as they are, anything else is an identifier. */
export function quoteLabel(label: string): string {
    return HTML_LABEL.test(label) ? label : quoteId(label);
}

export interface DiagramSourceOptions {
    /** Graph name, usually the document's file name. */
    name?: string;
    diagram?: DiagramOptions;
}

/** An empty document (null root) prints as a graph with no statements. */
export function toDiagramSource(root: TreeNode | null, options: DiagramSourceOptions = {}): string {
    const diagram = options.diagram ?? DEFAULT_CONFIG.diagram;
    const lines: string[] = [];
    lines.push(options.name ? `graph ${quoteId(options.name)} {` : 'graph {');
    lines.push(
        `\tgraph [dpi=${quoteId(String(diagram.dpi))} nodesep=${quoteId(diagram.nodesep)} ranksep=${quoteId(diagram.ranksep)}]`,
    );
    lines.push(`\tnode [shape=${quoteId(diagram.shape)}]`);

    for (const statement of root ? buildDiagramStatements(root) : []) {
        if (statement.kind === 'node') {
            lines.push(`\t${quoteId(statement.id)} [label=${quoteLabel(statement.label)}]`);
        } else {
            lines.push(`\t${quoteId(statement.from)} -- ${quoteId(statement.to)}`);
        }
    }

    lines.push('}');
    return lines.join('\n') + '\n';
}
