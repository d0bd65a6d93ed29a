/**
 * Deep copy used for run state, tool inputs and log snapshots.
 * Values must be structured-cloneable; functions and class instances with
 * private slots make this throw a `DataCloneError`.
 */
export function cloneState<T>(value: T): T {
    return structuredClone(value);
}

/**
 * Freezes an object graph in place and returns it.
 */
export function deepFreeze<T>(value: T): T {
    if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const key of Reflect.ownKeys(value)) {
            deepFreeze(Reflect.get(value, key));
        }
    }
    return value;
}
