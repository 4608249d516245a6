/**
 * Streaming translator for the inline markup allowed in labels and values.
 *
 * Vocabulary: <b>, <i>, <u>, <sup>, <sub>, <null/> (null symbol) and
 * <bar/> (prime). Input is tokenized into open/close/text tokens, which
 * drive a small state machine producing:
 *
 *   - `markup`: typesetting source (`<b>x</b>` -> `\textbf{x}`),
 *   - `plainText`: identifier-safe text (tags dropped, `<null/>` -> "Null",
 *     `<bar/>` -> "Bar"),
 *   - `valid`: false as soon as anything outside the vocabulary is seen.
 *
 * The translator never throws. When `valid` is false the caller must use
 * the raw input instead of `markup`.
 */

/* ------------------------------------------------------------------ */
/*  Vocabulary                                                        */
/* ------------------------------------------------------------------ */

export type MarkupTag = 'b' | 'i' | 'u' | 'sup' | 'sub' | 'null' | 'bar';

const TEX_OPEN: Record<MarkupTag, string> = {
    b: '\\textbf{',
    i: '\\textit{',
    u: '\\underline{',
    sup: '^{',
    sub: '_{',
    null: '{\\O',
    bar: '^{\\prime',
};

const TEX_CLOSE = '}';
const MATH_DELIMITER = '$';

/** Tags that only typeset inside math mode. */
const MATH_TAGS: ReadonlySet<MarkupTag> = new Set(['sup', 'sub', 'null', 'bar']);

/** Tags that stand for a word in identifiers. */
const IDENTIFIER_WORDS: Partial<Record<MarkupTag, string>> = {
    null: 'Null',
    bar: 'Bar',
};

export function isMarkupTag(tag: string): tag is MarkupTag {
    return Object.prototype.hasOwnProperty.call(TEX_OPEN, tag);
}

/* ------------------------------------------------------------------ */
/*  Tokenizer                                                         */
/* ------------------------------------------------------------------ */

export type MarkupToken =
    | { kind: 'text'; text: string }
    | { kind: 'open'; tag: string; hasAttributes: boolean }
    | { kind: 'close'; tag: string };

export interface ScanResult {
    tokens: MarkupToken[];
    /** Unconsumed tail (an incomplete tag) to prepend to the next chunk. */
    rest: string;
}

const START_TAG = /^([a-zA-Z][^\s/>]*)([\s\S]*)$/;
const END_TAG = /^\/([a-zA-Z][^\s/>]*)/;
const COMMENT_OPEN = '<!--';
const COMMENT_CLOSE = '-->';

const NAMED_REFERENCES: Record<string, string> = {
    amp: '&',
    lt: '<',
    gt: '>',
    quot: '"',
    apos: "'",
    nbsp: '\u00a0',
};

const CHARACTER_REFERENCE = /&(?:#(\d+)|#[xX]([0-9a-fA-F]+)|([a-zA-Z][a-zA-Z0-9]*));/g;
/** A reference cut off by the end of a chunk. */
const PARTIAL_REFERENCE = /&(?:#[xX]?[0-9a-fA-F]*|[a-zA-Z][a-zA-Z0-9]*)?$/;
const REPLACEMENT_CHARACTER = '\ufffd';

function fromCodePoint(codePoint: number): string {
    if (codePoint === 0 || codePoint > 0x10ffff || (codePoint >= 0xd800 && codePoint <= 0xdfff)) {
        return REPLACEMENT_CHARACTER;
    }
    return String.fromCodePoint(codePoint);
}

/** Replace `&name;`, `&#NN;` and `&#xHH;` with the characters they stand for; unknown names stay as written. */
export function decodeCharacterReferences(text: string): string {
    return text.replace(CHARACTER_REFERENCE, (match, decimal?: string, hex?: string, name?: string) => {
        if (decimal !== undefined) return fromCodePoint(Number.parseInt(decimal, 10));
        if (hex !== undefined) return fromCodePoint(Number.parseInt(hex, 16));
        if (name !== undefined && Object.prototype.hasOwnProperty.call(NAMED_REFERENCES, name)) {
            return NAMED_REFERENCES[name];
        }
        return match;
    });
}

/**
 * Split `input` into tokens. With `final` false, an unterminated tag,
 * comment or character reference at the end is returned in `rest`; with
 * `final` true it becomes text. Self-closing tags yield an open token
 * immediately followed by a close. Comments are dropped and character
 * references in text are decoded.
 */
export function scanMarkup(input: string, final: boolean): ScanResult {
    const tokens: MarkupToken[] = [];
    let text = '';
    let i = 0;

    const flushText = (): void => {
        if (text.length > 0) {
            tokens.push({ kind: 'text', text: decodeCharacterReferences(text) });
            text = '';
        }
    };

    while (i < input.length) {
        const lt = input.indexOf('<', i);
        if (lt === -1) {
            const tail = input.slice(i);
            const partial = final ? null : PARTIAL_REFERENCE.exec(tail);
            if (partial) {
                text += tail.slice(0, partial.index);
                flushText();
                return { tokens, rest: tail.slice(partial.index) };
            }
            text += tail;
            break;
        }
        text += input.slice(i, lt);

        if (input.startsWith(COMMENT_OPEN, lt)) {
            const commentEnd = input.indexOf(COMMENT_CLOSE, lt + COMMENT_OPEN.length);
            if (commentEnd !== -1) {
                i = commentEnd + COMMENT_CLOSE.length;
                continue;
            }
            if (!final) {
                flushText();
                return { tokens, rest: input.slice(lt) };
            }
        } else if (!final && COMMENT_OPEN.startsWith(input.slice(lt))) {
            flushText();
            return { tokens, rest: input.slice(lt) };
        }

        const next = input.charAt(lt + 1);
        const startsTag = /[a-zA-Z]/.test(next) || (next === '/' && /[a-zA-Z]/.test(input.charAt(lt + 2)));
        if (!startsTag) {
            if (lt + 1 >= input.length && !final) {
                flushText();
                return { tokens, rest: input.slice(lt) };
            }
            if (next === '/' && lt + 2 >= input.length && !final) {
                flushText();
                return { tokens, rest: input.slice(lt) };
            }
            text += '<';
            i = lt + 1;
            continue;
        }

        const gt = input.indexOf('>', lt);
        if (gt === -1) {
            if (final) {
                text += input.slice(lt);
                break;
            }
            flushText();
            return { tokens, rest: input.slice(lt) };
        }

        flushText();
        const body = input.slice(lt + 1, gt);
        const end = END_TAG.exec(body);
        if (end) {
            tokens.push({ kind: 'close', tag: end[1].toLowerCase() });
        } else {
            const start = START_TAG.exec(body);
            if (start) {
                const tag = start[1].toLowerCase();
                let attributes = start[2].trimEnd();
                const selfClosing = attributes.endsWith('/');
                if (selfClosing) attributes = attributes.slice(0, -1);
                tokens.push({ kind: 'open', tag, hasAttributes: attributes.trim().length > 0 });
                if (selfClosing) tokens.push({ kind: 'close', tag });
            }
        }
        i = gt + 1;
    }

    flushText();
    return { tokens, rest: '' };
}

/* ------------------------------------------------------------------ */
/*  Translator                                                        */
/* ------------------------------------------------------------------ */

export interface TranslationResult {
    /** Raw input as fed. */
    source: string;
    /** Typesetting source; only meaningful when `valid`. */
    markup: string;
    /** Identifier-safe text. */
    plainText: string;
    valid: boolean;
}

export class MarkupTranslator {
    private tagStack: MarkupTag[] = [];
    private mathDepth = 0;
    private pending = '';
    private source = '';
    private translatedText = '';
    private plainText = '';
    private valid = true;

    /** Forget everything fed so far. */
    reset(): void {
        this.tagStack = [];
        this.mathDepth = 0;
        this.pending = '';
        this.source = '';
        this.translatedText = '';
        this.plainText = '';
        this.valid = true;
    }

    feed(chunk: string): void {
        this.source += chunk;
        const { tokens, rest } = scanMarkup(this.pending + chunk, false);
        this.pending = rest;
        for (const token of tokens) this.consume(token);
    }

    /** Finish the input; unclosed tags invalidate it. */
    close(): TranslationResult {
        if (this.pending.length > 0) {
            const { tokens } = scanMarkup(this.pending, true);
            this.pending = '';
            for (const token of tokens) this.consume(token);
        }
        if (this.tagStack.length > 0) {
            this.valid = false;
        }
        return {
            source: this.source,
            markup: this.translatedText,
            plainText: this.plainText,
            valid: this.valid,
        };
    }

    private consume(token: MarkupToken): void {
        switch (token.kind) {
            case 'text':
                this.translatedText += token.text;
                this.plainText += token.text;
                return;
            case 'open':
                this.openTag(token.tag, token.hasAttributes);
                return;
            case 'close':
                this.closeTag(token.tag);
                return;
        }
    }

    private openTag(tag: string, hasAttributes: boolean): void {
        if (hasAttributes) {
            this.valid = false;
        }
        if (!isMarkupTag(tag)) {
            this.valid = false;
            this.translatedText += `<${tag}>`;
            return;
        }
        this.tagStack.push(tag);
        if (MATH_TAGS.has(tag)) {
            // Nested math tags share one pair of delimiters.
            if (this.mathDepth === 0) this.translatedText += MATH_DELIMITER;
            this.mathDepth += 1;
        }
        this.translatedText += TEX_OPEN[tag];
        const word = IDENTIFIER_WORDS[tag];
        if (word !== undefined) this.plainText += word;
    }

    private closeTag(tag: string): void {
        const top = this.tagStack.pop();
        if (top === undefined || top !== tag) {
            this.valid = false;
        }
        if (!isMarkupTag(tag)) {
            this.translatedText += `</${tag}>`;
            return;
        }
        this.translatedText += TEX_CLOSE;
        if (MATH_TAGS.has(tag) && this.mathDepth > 0) {
            this.mathDepth -= 1;
            if (this.mathDepth === 0) this.translatedText += MATH_DELIMITER;
        }
    }
}

/* ------------------------------------------------------------------ */
/*  One-shot helpers                                                  */
/* ------------------------------------------------------------------ */

export function translateMarkup(input: string, translator: MarkupTranslator = new MarkupTranslator()): TranslationResult {
    translator.reset();
    translator.feed(input);
    return translator.close();
}

/** Typesetting source for `input`, or `input` itself when it is not valid markup. */
export function renderMarkup(input: string, translator?: MarkupTranslator): string {
    const result = translateMarkup(input, translator);
    return result.valid ? result.markup : input;
}

export function isValidMarkup(input: string, translator?: MarkupTranslator): boolean {
    return translateMarkup(input, translator).valid;
}
