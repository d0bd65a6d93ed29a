import { GuardSyntaxError } from "../errors";

export type TokenType = "number" | "string" | "identifier" | "operator" | "eof";

export interface Token {
    type: TokenType;
    /** Raw operator / identifier text, or the decoded string literal. */
    text: string;
    /** Parsed value for number tokens. */
    value?: number;
    position: number;
}

// Longest first so that "<=" wins over "<".
const OPERATORS = [
    "==", "!=", "<=", ">=", "&&", "||",
    "<", ">", "!", "+", "-", "*", "/", "%", "(", ")", "[", "]", ".", ",",
];

const ESCAPES: Record<string, string> = {
    "n": "\n",
    "t": "\t",
    "r": "\r",
    "\\": "\\",
    "'": "'",
    "\"": "\"",
};

const isDigit = (char: string): boolean => char >= "0" && char <= "9";
const isIdentifierStart = (char: string): boolean => /[A-Za-z_$]/.test(char);
const isIdentifierPart = (char: string): boolean => /[A-Za-z0-9_$]/.test(char);

/**
 * Splits a guard expression into tokens.
 * The token stream always ends with a single `eof` token.
 *
 * @throws {GuardSyntaxError} On unterminated strings or characters outside the grammar
 */
export function tokenize(source: string): Token[] {
    const tokens: Token[] = [];
    let index = 0;

    while (index < source.length) {
        const char = source.charAt(index);

        if (/\s/.test(char)) {
            index++;
            continue;
        }

        if (isDigit(char) || (char === "." && isDigit(source.charAt(index + 1)))) {
            const match = /^(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/.exec(source.slice(index));
            const text = match ? match[0] : char;
            tokens.push({ type: "number", text, value: Number(text), position: index });
            index += text.length;
            continue;
        }

        if (char === "'" || char === "\"") {
            const start = index;
            let text = "";
            index++;
            let closed = false;
            while (index < source.length) {
                const current = source.charAt(index);
                if (current === char) {
                    closed = true;
                    index++;
                    break;
                }
                if (current === "\\") {
                    const escaped = source.charAt(index + 1);
                    const replacement = ESCAPES[escaped];
                    if (replacement === undefined) {
                        throw new GuardSyntaxError(`Unknown escape sequence '\\${escaped}'`, index);
                    }
                    text += replacement;
                    index += 2;
                    continue;
                }
                text += current;
                index++;
            }
            if (!closed) {
                throw new GuardSyntaxError("Unterminated string literal", start);
            }
            tokens.push({ type: "string", text, position: start });
            continue;
        }

        if (isIdentifierStart(char)) {
            const start = index;
            while (index < source.length && isIdentifierPart(source.charAt(index))) {
                index++;
            }
            tokens.push({ type: "identifier", text: source.slice(start, index), position: start });
            continue;
        }

        const operator = OPERATORS.find((candidate) => source.startsWith(candidate, index));
        if (operator === undefined) {
            throw new GuardSyntaxError(`Unexpected character '${char}'`, index);
        }
        tokens.push({ type: "operator", text: operator, position: index });
        index += operator.length;
    }

    tokens.push({ type: "eof", text: "", position: source.length });
    return tokens;
}
