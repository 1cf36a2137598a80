export interface WeftConfig {
  /** Entry source file. */
  file: string;
  /** Directory dotted import paths resolve against; the entry's by default. */
  root?: string;
  color: boolean;
  emitParserAst: boolean;
}
