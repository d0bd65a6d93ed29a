export { type Expression } from "./ast";
export { tokenize, type Token } from "./lexer";
export { parseGuard } from "./parser";
export { evaluate, isTruthy, deepEqual } from "./evaluator";
export { Guard, UnparsableGuard, type GuardLike } from "./guard";
export { selectEdge, type GuardedEdge, type GuardSkipHandler } from "./select-edge";
