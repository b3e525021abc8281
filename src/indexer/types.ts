/**
 * Dependency indexer types
 */

/** A C function definition as seen by the indexer */
export interface CFunction {
  /** Function name */
  name: string;
  /** Normalized return type, e.g. "float", "char *", "const uint8_t *" */
  returnType: string;
  /** Single-line signature, e.g. "float read_temp(void)" */
  signature: string;
}

/** A definition located in a piece of C text */
export interface FunctionDefinition extends CFunction {
  /** 1-indexed line of the definition header */
  line: number;
  /** Offset of the header start */
  start: number;
  /** Offset just past the closing brace */
  end: number;
  /** Text between the outer braces, comments and literals blanked */
  body: string;
}

/** Per-file facts, recomputed fresh for every file */
export interface FileAnalysis {
  /** Absolute path of the source file */
  filePath: string;
  /** Raw source text */
  source: string;
  /** Functions defined in the file */
  functions: CFunction[];
  /** Called symbols with no definition in this file, in first-call order */
  calledButUndefinedSymbols: string[];
  /** Include names in declaration order */
  includes: string[];
}
