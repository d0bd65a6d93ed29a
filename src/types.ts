/**
 * The run state: string keys mapped to structured-cloneable values.
 * Tools read it and return a partial update of the same shape.
 */
export type State = Record<string, unknown>;

