import { GuardEvaluationError } from "../errors";
import { type State } from "../types";
import { isRecord } from "../util/is-record";
import { type BinaryOperator, type Expression } from "./ast";

function describeType(value: unknown): string {
    if (value === null) {
        return "null";
    }
    if (Array.isArray(value)) {
        return "array";
    }
    if (isRecord(value)) {
        return "record";
    }
    return typeof value;
}

/**
 * Guard truthiness: `false`, `null`, `undefined`, `0`, `NaN`, `""`, `[]` and
 * `{}` are false, everything else is true.
 */
export function isTruthy(value: unknown): boolean {
    if (Array.isArray(value)) {
        return value.length > 0;
    }
    if (isRecord(value)) {
        return Object.keys(value).length > 0;
    }
    return Boolean(value);
}

/**
 * Structural equality over plain data: arrays element-wise, records key-wise,
 * everything else with `===`.
 */
export function deepEqual(left: unknown, right: unknown): boolean {
    if (left === right) {
        return true;
    }
    if (Array.isArray(left) && Array.isArray(right)) {
        return left.length === right.length && left.every((item, index) => deepEqual(item, right[index]));
    }
    if (isRecord(left) && isRecord(right)) {
        const keys = Object.keys(left);
        return keys.length === Object.keys(right).length
            && keys.every((key) => Object.hasOwn(right, key) && deepEqual(left[key], right[key]));
    }
    return false;
}

function lookup(object: unknown, key: unknown): { found: true, value: unknown } | { found: false } {
    if (Array.isArray(object)) {
        if (typeof key !== "number" || !Number.isInteger(key)) {
            throw new GuardEvaluationError(`Array index must be an integer, got ${describeType(key)}`);
        }
        const index = key < 0 ? object.length + key : key;
        return index >= 0 && index < object.length ? { found: true, value: object[index] } : { found: false };
    }
    if (isRecord(object)) {
        if (typeof key !== "string") {
            throw new GuardEvaluationError(`Record key must be a string, got ${describeType(key)}`);
        }
        return Object.hasOwn(object, key) ? { found: true, value: object[key] } : { found: false };
    }
    throw new GuardEvaluationError(`Cannot look up '${String(key)}' on ${describeType(object)}`);
}

function expectNumber(value: unknown, operator: string): number {
    if (typeof value !== "number") {
        throw new GuardEvaluationError(`Operator '${operator}' expects numbers, got ${describeType(value)}`);
    }
    return value;
}

function compareOrdered(operator: "<" | "<=" | ">" | ">=", left: unknown, right: unknown): boolean {
    let order: number;
    if (typeof left === "number" && typeof right === "number") {
        order = left < right ? -1 : left > right ? 1 : left === right ? 0 : NaN;
    } else if (typeof left === "string" && typeof right === "string") {
        order = left < right ? -1 : left > right ? 1 : 0;
    } else {
        throw new GuardEvaluationError(
            `Cannot compare ${describeType(left)} ${operator} ${describeType(right)}`,
        );
    }
    switch (operator) {
        case "<": return order < 0;
        case "<=": return order <= 0;
        case ">": return order > 0;
        case ">=": return order >= 0;
    }
}

function applyBinary(operator: BinaryOperator, left: unknown, right: unknown): unknown {
    switch (operator) {
        case "==":
            return deepEqual(left, right);
        case "!=":
            return !deepEqual(left, right);
        case "<":
        case "<=":
        case ">":
        case ">=":
            return compareOrdered(operator, left, right);
        case "+":
            if (typeof left === "string" && typeof right === "string") {
                return left + right;
            }
            return expectNumber(left, operator) + expectNumber(right, operator);
        case "-":
            return expectNumber(left, operator) - expectNumber(right, operator);
        case "*":
            return expectNumber(left, operator) * expectNumber(right, operator);
        case "/":
        case "%": {
            const dividend = expectNumber(left, operator);
            const divisor = expectNumber(right, operator);
            if (divisor === 0) {
                throw new GuardEvaluationError("Division by zero");
            }
            return operator === "/" ? dividend / divisor : dividend % divisor;
        }
    }
}

/**
 * Evaluates an expression tree against the run state.
 * Only reads `state`; there is no access to any other scope.
 *
 * @throws {GuardEvaluationError} On missing keys, mismatched operand types or division by zero
 */
export function evaluate(expression: Expression, state: Readonly<State>): unknown {
    switch (expression.kind) {
        case "literal":
            return expression.value;
        case "state":
            return state;
        case "member": {
            const object = evaluate(expression.object, state);
            const key = evaluate(expression.property, state);
            const result = lookup(object, key);
            if (!result.found) {
                throw new GuardEvaluationError(`Key '${String(key)}' not found`);
            }
            return result.value;
        }
        case "get": {
            const object = evaluate(expression.object, state);
            const result = lookup(object, evaluate(expression.key, state));
            if (result.found) {
                return result.value;
            }
            return expression.fallback === undefined ? null : evaluate(expression.fallback, state);
        }
        case "unary": {
            const operand = evaluate(expression.operand, state);
            return expression.operator === "!" ? !isTruthy(operand) : -expectNumber(operand, "-");
        }
        case "logical": {
            const left = isTruthy(evaluate(expression.left, state));
            if (expression.operator === "&&") {
                return left && isTruthy(evaluate(expression.right, state));
            }
            return left || isTruthy(evaluate(expression.right, state));
        }
        case "binary":
            return applyBinary(
                expression.operator,
                evaluate(expression.left, state),
                evaluate(expression.right, state),
            );
    }
}
