export { GraphCompiler, createGraphCompiler, compile } from "./compiler.js";
export type { CompilerOptions, CompilationResult } from "./types.js";
