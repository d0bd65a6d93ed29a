import { type State } from "../types";

/**
 * True for plain objects (object literals, `Object.create(null)`), false for
 * arrays, class instances and primitives.
 */
export function isRecord(value: unknown): value is State {
    if (typeof value !== "object" || value === null || Array.isArray(value)) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
}
