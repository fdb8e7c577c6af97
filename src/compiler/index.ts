/**
 * Compiler: description documents to canonical dataset.
 */

export { compile, compileOrThrow, type CompileOptions, type CompileResult } from "./compiler.js";
export { CompileError, formatCompileIssue, type CompileIssue, type CompileIssueKind } from "./errors.js";
export { deriveSolveTime, deriveKey, inferKeySource } from "./derive.js";
