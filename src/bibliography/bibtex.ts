/**
 * BibTeX parser.
 *
 * Supports `@type{key, field = value, ...}` entries delimited by braces or
 * parentheses, braced/quoted/numeric values, `@string` macros, `#`
 * concatenation, and skips `@comment` / `@preamble` blocks. Text outside
 * entries is ignored, as BibTeX itself does.
 */

export interface BibtexEntry {
    /** Citation key, e.g. "smith2019" */
    key: string;
    /** Lowercased entry type, e.g. "article" */
    type: string;
    /** Lowercased field name → value after macro expansion (braces kept) */
    fields: { [name: string]: string };
    /** 1-based line where the entry starts */
    line: number;
}

/**
 * Syntax error with its position in the source text.
 */
export class BibtexParseError extends Error {
    constructor(
        message: string,
        public readonly line: number,
        public readonly column: number
    ) {
        super(`${message} (line ${line}, column ${column})`);
        this.name = 'BibtexParseError';
    }
}

const MONTH_MACROS: Record<string, string> = {
    jan: 'January',
    feb: 'February',
    mar: 'March',
    apr: 'April',
    may: 'May',
    jun: 'June',
    jul: 'July',
    aug: 'August',
    sep: 'September',
    oct: 'October',
    nov: 'November',
    dec: 'December',
};

const IDENTIFIER = /[^\s"#%'(),={}]/;

class BibtexParser {
    private pos = 0;
    private readonly macros = new Map<string, string>(Object.entries(MONTH_MACROS));

    constructor(private readonly text: string) {}

    parse(): BibtexEntry[] {
        const entries: BibtexEntry[] = [];
        const seen = new Set<string>();

        while (this.seekEntry()) {
            const start = this.pos;
            this.pos++; // '@'
            this.skipWhitespace();
            const type = this.readIdentifier('entry type').toLowerCase();
            this.skipWhitespace();
            const close = this.readOpening();

            if (type === 'comment') {
                this.skipGroup(close);
                continue;
            }
            if (type === 'preamble') {
                this.skipWhitespace();
                this.readValue();
                this.skipWhitespace();
                this.expect(close);
                continue;
            }
            if (type === 'string') {
                this.readMacro(close);
                continue;
            }

            const entry = this.readEntry(type, close, this.lineAt(start));
            if (seen.has(entry.key)) {
                throw this.error(`Repeated entry key "${entry.key}"`, start);
            }
            seen.add(entry.key);
            entries.push(entry);
        }

        return entries;
    }

    // ─── Blocks ───────────────────────────────────────────────

    private readEntry(type: string, close: string, line: number): BibtexEntry {
        this.skipWhitespace();
        const key = this.readKey();
        const fields: { [name: string]: string } = {};

        for (;;) {
            this.skipWhitespace();
            if (this.peek() === close) {
                this.pos++;
                break;
            }
            this.expect(',');
            this.skipWhitespace();
            if (this.peek() === close) {
                this.pos++;
                break;
            }

            const fieldStart = this.pos;
            const name = this.readIdentifier('field name').toLowerCase();
            this.skipWhitespace();
            this.expect('=');
            this.skipWhitespace();
            const value = this.readValue();

            if (Object.hasOwn(fields, name)) {
                throw this.error(`Repeated field "${name}" in entry "${key}"`, fieldStart);
            }
            fields[name] = value;
        }

        return { key, type, fields, line };
    }

    private readMacro(close: string): void {
        this.skipWhitespace();
        const name = this.readIdentifier('macro name').toLowerCase();
        this.skipWhitespace();
        this.expect('=');
        this.skipWhitespace();
        const value = this.readValue();
        this.skipWhitespace();
        this.expect(close);
        this.macros.set(name, value);
    }

    // ─── Values ───────────────────────────────────────────────

    /**
     * A value is one or more parts joined with `#`.
     */
    private readValue(): string {
        let value = this.readValuePart();
        for (;;) {
            const mark = this.pos;
            this.skipWhitespace();
            if (this.peek() !== '#') {
                this.pos = mark;
                break;
            }
            this.pos++;
            this.skipWhitespace();
            value += this.readValuePart();
        }
        return value.replace(/\s+/g, ' ').trim();
    }

    private readValuePart(): string {
        const ch = this.peek();
        if (ch === '{') {
            this.pos++;
            return this.readBalanced('}');
        }
        if (ch === '"') {
            this.pos++;
            return this.readQuoted();
        }
        if (ch !== undefined && /[0-9]/.test(ch)) {
            const start = this.pos;
            while (/[0-9]/.test(this.peek() ?? '')) this.pos++;
            return this.text.slice(start, this.pos);
        }

        const start = this.pos;
        const name = this.readIdentifier('value').toLowerCase();
        const expansion = this.macros.get(name);
        if (expansion === undefined) {
            throw this.error(`Undefined macro "${name}"`, start);
        }
        return expansion;
    }

    /**
     * Read up to the matching closer, keeping nested braces in the result.
     */
    private readBalanced(closer: string): string {
        const start = this.pos;
        let depth = 0;
        while (this.pos < this.text.length) {
            const ch = this.text[this.pos];
            if (ch === '{') depth++;
            else if (ch === '}' && depth > 0) depth--;
            else if (ch === closer && depth === 0) {
                const value = this.text.slice(start, this.pos);
                this.pos++;
                return value;
            }
            this.pos++;
        }
        throw this.error('Unbalanced braces', start - 1);
    }

    private readQuoted(): string {
        const start = this.pos;
        let depth = 0;
        while (this.pos < this.text.length) {
            const ch = this.text[this.pos];
            if (ch === '{') depth++;
            else if (ch === '}') depth = Math.max(0, depth - 1);
            else if (ch === '"' && depth === 0) {
                const value = this.text.slice(start, this.pos);
                this.pos++;
                return value;
            }
            this.pos++;
        }
        throw this.error('Unterminated quoted value', start - 1);
    }

    // ─── Tokens ───────────────────────────────────────────────

    private seekEntry(): boolean {
        const next = this.text.indexOf('@', this.pos);
        if (next === -1) return false;
        this.pos = next;
        return true;
    }

    private readOpening(): string {
        const ch = this.peek();
        if (ch === '{') {
            this.pos++;
            return '}';
        }
        if (ch === '(') {
            this.pos++;
            return ')';
        }
        throw this.error('Expected "{" or "("', this.pos);
    }

    private readKey(): string {
        const start = this.pos;
        while (this.pos < this.text.length) {
            const ch = this.text[this.pos] ?? '';
            if (ch === ',' || ch === '}' || ch === ')' || /\s/.test(ch)) break;
            this.pos++;
        }
        const key = this.text.slice(start, this.pos);
        if (key === '') throw this.error('Missing entry key', start);
        return key;
    }

    private readIdentifier(what: string): string {
        const start = this.pos;
        while (IDENTIFIER.test(this.peek() ?? ' ')) this.pos++;
        if (this.pos === start) throw this.error(`Expected ${what}`, start);
        return this.text.slice(start, this.pos);
    }

    private skipGroup(close: string): void {
        this.readBalanced(close);
    }

    private skipWhitespace(): void {
        while (/\s/.test(this.peek() ?? '')) this.pos++;
    }

    private expect(ch: string): void {
        if (this.peek() !== ch) {
            const found = this.peek();
            throw this.error(`Expected "${ch}" but found ${found === undefined ? 'end of input' : `"${found}"`}`, this.pos);
        }
        this.pos++;
    }

    private peek(): string | undefined {
        return this.text[this.pos];
    }

    private lineAt(offset: number): number {
        let line = 1;
        for (let i = 0; i < offset && i < this.text.length; i++) {
            if (this.text[i] === '\n') line++;
        }
        return line;
    }

    private error(message: string, offset: number): BibtexParseError {
        const line = this.lineAt(offset);
        const lineStart = this.text.lastIndexOf('\n', offset - 1) + 1;
        return new BibtexParseError(message, line, offset - lineStart + 1);
    }
}

/**
 * Parse BibTeX text into entries, in source order.
 * Throws BibtexParseError on malformed input or a repeated entry key.
 */
export function parseBibtex(text: string): BibtexEntry[] {
    return new BibtexParser(text).parse();
}

/**
 * Serialize one entry back to BibTeX, with fields in their stored order.
 */
export function formatBibtexEntry(entry: Pick<BibtexEntry, 'key' | 'type' | 'fields'>): string {
    const lines = Object.entries(entry.fields).map(([name, value]) => `  ${name} = {${value}}`);
    return `@${entry.type}{${entry.key},\n${lines.join(',\n')}\n}`;
}
