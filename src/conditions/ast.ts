export type LiteralValue = number | string | boolean | null;

export type ComparisonOperator = "==" | "!=" | "<" | "<=" | ">" | ">=";
export type ArithmeticOperator = "+" | "-" | "*" | "/" | "%";
export type BinaryOperator = ComparisonOperator | ArithmeticOperator;
export type LogicalOperator = "&&" | "||";
export type UnaryOperator = "!" | "-";

export interface LiteralExpression {
    kind: "literal";
    value: LiteralValue;
}

/** The run state itself. */
export interface StateExpression {
    kind: "state";
}

/** `object.key` or `object[key]`. */
export interface MemberExpression {
    kind: "member";
    object: Expression;
    property: Expression;
}

/** `object.get(key, fallback?)`: lookup that never fails on a missing key. */
export interface GetExpression {
    kind: "get";
    object: Expression;
    key: Expression;
    fallback?: Expression;
}

export interface UnaryExpression {
    kind: "unary";
    operator: UnaryOperator;
    operand: Expression;
}

export interface BinaryExpression {
    kind: "binary";
    operator: BinaryOperator;
    left: Expression;
    right: Expression;
}

export interface LogicalExpression {
    kind: "logical";
    operator: LogicalOperator;
    left: Expression;
    right: Expression;
}

export type Expression =
    | LiteralExpression
    | StateExpression
    | MemberExpression
    | GetExpression
    | UnaryExpression
    | BinaryExpression
    | LogicalExpression;
