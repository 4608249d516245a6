import { DEFAULT_MESSAGES, type Messages } from './messages';

/* ------------------------------------------------------------------ */
/*  Diagram defaults                                                  */
/* ------------------------------------------------------------------ */

export interface DiagramOptions {
    /** Output resolution the renderer is asked for. */
    dpi: number;
    /** Minimum horizontal space between nodes (inches). */
    nodesep: string;
    /** Height of edges (inches); 0.02 is the renderer's minimum. */
    ranksep: string;
    /** Node shape; `plain` draws the label only. */
    shape: string;
}

export interface EngineConfig {
    /** Indentation unit of the typesetting export, repeated once per depth. */
    indent: string;
    diagram: DiagramOptions;
    messages: Messages;
}

export interface EngineConfigOverrides {
    indent?: string;
    diagram?: Partial<DiagramOptions>;
    messages?: Partial<Messages>;
}

export const DEFAULT_CONFIG: EngineConfig = {
    indent: '  ',
    diagram: {
        dpi: 400,
        nodesep: '.25',
        ranksep: '0.02',
        shape: 'plain',
    },
    messages: DEFAULT_MESSAGES,
};

export function resolveConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
    return {
        indent: overrides.indent ?? DEFAULT_CONFIG.indent,
        diagram: { ...DEFAULT_CONFIG.diagram, ...overrides.diagram },
        messages: { ...DEFAULT_CONFIG.messages, ...overrides.messages },
    };
}
