import { GuardSyntaxError } from "../errors";
import {
    type ArithmeticOperator,
    type ComparisonOperator,
    type Expression,
} from "./ast";
import { type Token, tokenize } from "./lexer";

const COMPARISON_OPERATORS: readonly string[] = ["==", "!=", "<", "<=", ">", ">="];
const MAX_DEPTH = 64;

function isComparison(text: string): text is ComparisonOperator {
    return COMPARISON_OPERATORS.includes(text);
}

function isAdditive(text: string): text is Extract<ArithmeticOperator, "+" | "-"> {
    return text === "+" || text === "-";
}

function isMultiplicative(text: string): text is Extract<ArithmeticOperator, "*" | "/" | "%"> {
    return text === "*" || text === "/" || text === "%";
}

/**
 * Recursive-descent parser for guard expressions.
 *
 * Precedence, loosest first: `||`/`or`, `&&`/`and`, `!`/`not`, comparison
 * (non-associative), `+ -`, `* / %`, unary `-`, member access.
 * Bare identifiers are shorthand for keys of the run state, so `count < 3`
 * and `state.count < 3` and `state["count"] < 3` are the same guard.
 * Function calls are rejected, with the single exception of the lookup form
 * `record.get(key, fallback)`.
 */
class Parser {
    private index = 0;
    private depth = 0;

    constructor(private readonly tokens: Token[]) { }

    parse(): Expression {
        const expression = this.parseOr();
        const token = this.peek();
        if (token.type !== "eof") {
            throw new GuardSyntaxError(`Unexpected token '${token.text}'`, token.position);
        }
        return expression;
    }

    private peek(): Token {
        const token = this.tokens[this.index];
        if (token === undefined) {
            throw new GuardSyntaxError("Unexpected end of expression", this.tokens.length);
        }
        return token;
    }

    private advance(): Token {
        const token = this.peek();
        if (token.type !== "eof") {
            this.index++;
        }
        return token;
    }

    private matchOperator(...texts: string[]): Token | undefined {
        const token = this.peek();
        if (token.type === "operator" && texts.includes(token.text)) {
            return this.advance();
        }
        return undefined;
    }

    private matchKeyword(keyword: string): boolean {
        const token = this.peek();
        if (token.type === "identifier" && token.text === keyword) {
            this.advance();
            return true;
        }
        return false;
    }

    private expectOperator(text: string): Token {
        const token = this.peek();
        if (token.type !== "operator" || token.text !== text) {
            throw new GuardSyntaxError(
                `Expected '${text}' but found ${token.type === "eof" ? "end of expression" : `'${token.text}'`}`,
                token.position,
            );
        }
        return this.advance();
    }

    private nested<T>(parse: () => T): T {
        if (++this.depth > MAX_DEPTH) {
            throw new GuardSyntaxError("Expression is nested too deeply", this.peek().position);
        }
        try {
            return parse();
        } finally {
            this.depth--;
        }
    }

    private parseOr(): Expression {
        let left = this.parseAnd();
        while (this.matchOperator("||") || this.matchKeyword("or")) {
            left = { kind: "logical", operator: "||", left, right: this.parseAnd() };
        }
        return left;
    }

    private parseAnd(): Expression {
        let left = this.parseNot();
        while (this.matchOperator("&&") || this.matchKeyword("and")) {
            left = { kind: "logical", operator: "&&", left, right: this.parseNot() };
        }
        return left;
    }

    private parseNot(): Expression {
        if (this.matchOperator("!") || this.matchKeyword("not")) {
            return this.nested<Expression>(() => ({ kind: "unary", operator: "!", operand: this.parseNot() }));
        }
        return this.parseComparison();
    }

    private parseComparison(): Expression {
        const left = this.parseAdditive();
        const token = this.peek();
        if (token.type === "operator" && isComparison(token.text)) {
            this.advance();
            return { kind: "binary", operator: token.text, left, right: this.parseAdditive() };
        }
        return left;
    }

    private parseAdditive(): Expression {
        let left = this.parseMultiplicative();
        for (;;) {
            const token = this.peek();
            if (token.type !== "operator" || !isAdditive(token.text)) {
                return left;
            }
            this.advance();
            left = { kind: "binary", operator: token.text, left, right: this.parseMultiplicative() };
        }
    }

    private parseMultiplicative(): Expression {
        let left = this.parseUnary();
        for (;;) {
            const token = this.peek();
            if (token.type !== "operator" || !isMultiplicative(token.text)) {
                return left;
            }
            this.advance();
            left = { kind: "binary", operator: token.text, left, right: this.parseUnary() };
        }
    }

    private parseUnary(): Expression {
        if (this.matchOperator("-")) {
            return this.nested<Expression>(() => ({ kind: "unary", operator: "-", operand: this.parseUnary() }));
        }
        return this.parsePostfix();
    }

    private parsePostfix(): Expression {
        let expression = this.parsePrimary();
        for (;;) {
            if (this.matchOperator(".")) {
                const name = this.advance();
                if (name.type !== "identifier") {
                    throw new GuardSyntaxError("Expected a key name after '.'", name.position);
                }
                if (name.text === "get" && this.matchOperator("(")) {
                    expression = this.parseGetCall(expression);
                    continue;
                }
                expression = { kind: "member", object: expression, property: { kind: "literal", value: name.text } };
                continue;
            }
            if (this.matchOperator("[")) {
                const property = this.nested<Expression>(() => this.parseOr());
                this.expectOperator("]");
                expression = { kind: "member", object: expression, property };
                continue;
            }
            const token = this.peek();
            if (token.type === "operator" && token.text === "(") {
                throw new GuardSyntaxError("Function calls are not allowed in guards", token.position);
            }
            return expression;
        }
    }

    private parseGetCall(object: Expression): Expression {
        const key = this.nested<Expression>(() => this.parseOr());
        let fallback: Expression | undefined;
        if (this.matchOperator(",")) {
            fallback = this.nested<Expression>(() => this.parseOr());
        }
        this.expectOperator(")");
        return fallback === undefined ? { kind: "get", object, key } : { kind: "get", object, key, fallback };
    }

    private parsePrimary(): Expression {
        const token = this.advance();
        switch (token.type) {
            case "number":
                return { kind: "literal", value: token.value ?? Number(token.text) };
            case "string":
                return { kind: "literal", value: token.text };
            case "identifier":
                return this.identifier(token);
            case "operator":
                if (token.text === "(") {
                    const inner = this.nested<Expression>(() => this.parseOr());
                    this.expectOperator(")");
                    return inner;
                }
                throw new GuardSyntaxError(`Unexpected token '${token.text}'`, token.position);
            case "eof":
                throw new GuardSyntaxError("Unexpected end of expression", token.position);
        }
    }

    private identifier(token: Token): Expression {
        switch (token.text) {
            case "true":
            case "True":
                return { kind: "literal", value: true };
            case "false":
            case "False":
                return { kind: "literal", value: false };
            case "null":
            case "None":
                return { kind: "literal", value: null };
            case "state":
                return { kind: "state" };
            case "and":
            case "or":
            case "not":
                throw new GuardSyntaxError(`Unexpected keyword '${token.text}'`, token.position);
            default:
                return { kind: "member", object: { kind: "state" }, property: { kind: "literal", value: token.text } };
        }
    }
}

/**
 * Parses a guard into its expression tree.
 *
 * @throws {GuardSyntaxError} If the text is not a valid guard
 *
 * @example
 * ```typescript
 * parseGuard("state.get('quality_score', 0) < state.get('threshold', 80)");
 * parseGuard("attempts < 3 and not done");
 * ```
 */
export function parseGuard(source: string): Expression {
    if (source.trim() === "") {
        throw new GuardSyntaxError("Guard expression is empty", 0);
    }
    return new Parser(tokenize(source)).parse();
}
