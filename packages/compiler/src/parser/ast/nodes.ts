import type { SourceSpan } from "../../diagnostics/index.js";
import type { NumericLiteral } from "../token.js";

let currentSyntaxId = 0;

/** Program-wide node ids, so tables keyed by node stay unique across modules. */
export const getSyntaxId = () => currentSyntaxId++;

export type NodeId = number;

interface NodeBase {
  readonly id: NodeId;
  readonly span: SourceSpan;
}

export type Visibility = "public" | "private" | "protected" | "default";

export interface Identifier {
  readonly name: string;
  readonly span: SourceSpan;
}

// Types

export interface NamedTypeNode extends NodeBase {
  readonly kind: "named-type";
  readonly name: string;
}

export interface ArrayTypeNode extends NodeBase {
  readonly kind: "array-type";
  readonly element: TypeNode;
}

export interface NullableTypeNode extends NodeBase {
  readonly kind: "nullable-type";
  readonly inner: TypeNode;
}

export type TypeNode = NamedTypeNode | ArrayTypeNode | NullableTypeNode;

// Expressions

export type LiteralValue =
  | { readonly type: "number"; readonly value: NumericLiteral }
  | { readonly type: "string"; readonly value: string }
  | { readonly type: "char"; readonly value: string }
  | { readonly type: "bool"; readonly value: boolean }
  | { readonly type: "null" };

export interface IdentifierExpr extends NodeBase {
  readonly kind: "identifier";
  readonly name: string;
}

export interface SelfExpr extends NodeBase {
  readonly kind: "self";
}

export interface LiteralExpr extends NodeBase {
  readonly kind: "literal";
  readonly literal: LiteralValue;
  readonly text: string;
}

export type UnaryOperator = "!" | "-" | "++" | "--";

export interface UnaryExpr extends NodeBase {
  readonly kind: "unary";
  readonly operator: UnaryOperator;
  readonly fixity: "prefix" | "postfix";
  readonly operand: Expr;
}

export type BinaryOperator =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "&&"
  | "||";

export interface BinaryExpr extends NodeBase {
  readonly kind: "binary";
  readonly operator: BinaryOperator;
  readonly left: Expr;
  readonly right: Expr;
}

/** Expressions that may appear on the left of `=` and compound assignments. */
export type AssignmentTarget = IdentifierExpr | MemberExpr;

export interface AssignmentExpr extends NodeBase {
  readonly kind: "assignment";
  readonly target: AssignmentTarget;
  readonly value: Expr;
}

export type CompoundOperator = "+=" | "-=" | "*=" | "/=" | "%=";

export interface CompoundAssignmentExpr extends NodeBase {
  readonly kind: "compound-assignment";
  readonly operator: CompoundOperator;
  readonly target: AssignmentTarget;
  readonly value: Expr;
}

export interface CallExpr extends NodeBase {
  readonly kind: "call";
  readonly callee: Expr;
  readonly args: readonly Expr[];
}

export interface IndexExpr extends NodeBase {
  readonly kind: "index";
  readonly target: Expr;
  readonly index: Expr;
}

export interface MemberExpr extends NodeBase {
  readonly kind: "member";
  readonly target: Expr;
  readonly member: Identifier;
}

export interface ProjectionField {
  readonly name: Identifier;
  readonly alias?: Identifier;
}

export interface ProjectionExpr extends NodeBase {
  readonly kind: "projection";
  readonly target: Expr;
  readonly fields: readonly ProjectionField[];
}

export interface CastExpr extends NodeBase {
  readonly kind: "cast";
  readonly expr: Expr;
  readonly type: TypeNode;
}

export interface TernaryExpr extends NodeBase {
  readonly kind: "ternary";
  readonly condition: Expr;
  readonly whenTrue: Expr;
  readonly whenFalse: Expr;
}

export interface ArrayLiteralExpr extends NodeBase {
  readonly kind: "array-literal";
  readonly elements: readonly Expr[];
}

export interface StructLiteralField {
  readonly name: Identifier;
  readonly value: Expr;
  readonly span: SourceSpan;
}

export interface StructLiteralExpr extends NodeBase {
  readonly kind: "struct-literal";
  readonly name: Identifier;
  readonly fields: readonly StructLiteralField[];
}

export type Expr =
  | IdentifierExpr
  | SelfExpr
  | LiteralExpr
  | UnaryExpr
  | BinaryExpr
  | AssignmentExpr
  | CompoundAssignmentExpr
  | CallExpr
  | IndexExpr
  | MemberExpr
  | ProjectionExpr
  | CastExpr
  | TernaryExpr
  | ArrayLiteralExpr
  | StructLiteralExpr;

// Statements

export interface BlockStmt extends NodeBase {
  readonly kind: "block";
  readonly statements: readonly Stmt[];
}

export interface ExpressionStmt extends NodeBase {
  readonly kind: "expression";
  readonly expression: Expr;
}

export interface ReturnStmt extends NodeBase {
  readonly kind: "return";
  readonly value?: Expr;
}

export interface BreakStmt extends NodeBase {
  readonly kind: "break";
}

export interface ContinueStmt extends NodeBase {
  readonly kind: "continue";
}

export interface VariableStmt extends NodeBase {
  readonly kind: "variable";
  readonly name: Identifier;
  readonly mutable: boolean;
  readonly final: boolean;
  readonly type?: TypeNode;
  readonly initializer?: Expr;
}

export interface ElifClause {
  readonly condition: Expr;
  readonly body: BlockStmt;
}

export interface IfStmt extends NodeBase {
  readonly kind: "if";
  readonly condition: Expr;
  readonly then: BlockStmt;
  readonly elifs: readonly ElifClause[];
  readonly otherwise?: BlockStmt;
}

export interface WhileStmt extends NodeBase {
  readonly kind: "while";
  readonly condition: Expr;
  readonly body: BlockStmt;
}

export interface DoWhileStmt extends NodeBase {
  readonly kind: "do-while";
  readonly body: BlockStmt;
  readonly condition: Expr;
}

export interface ForStmt extends NodeBase {
  readonly kind: "for";
  readonly initializer?: VariableStmt | ExpressionStmt;
  readonly condition?: Expr;
  readonly update?: Expr;
  readonly body: BlockStmt;
}

export interface LoopStmt extends NodeBase {
  readonly kind: "loop";
  readonly variable: Identifier;
  readonly start: Expr;
  readonly end: Expr;
  readonly inclusive: boolean;
  readonly step?: Expr;
  readonly reverse: boolean;
  readonly body: BlockStmt;
}

export type Stmt =
  | BlockStmt
  | ExpressionStmt
  | ReturnStmt
  | BreakStmt
  | ContinueStmt
  | VariableStmt
  | IfStmt
  | WhileStmt
  | DoWhileStmt
  | ForStmt
  | LoopStmt;

export type LoopingStmt = WhileStmt | DoWhileStmt | ForStmt | LoopStmt;

// Declarations

export interface Modifiers {
  readonly visibility: Visibility;
  readonly final: boolean;
}

export interface ModuleDecl extends NodeBase {
  readonly kind: "module";
  readonly path: readonly string[];
}

export type ImportForm =
  | { readonly kind: "symbol"; readonly alias?: Identifier }
  | { readonly kind: "group"; readonly entries: readonly ImportEntry[] }
  | { readonly kind: "wildcard" };

export interface ImportEntry {
  readonly name: Identifier;
  readonly alias?: Identifier;
}

export interface ImportDecl extends NodeBase {
  readonly kind: "import";
  readonly path: readonly Identifier[];
  readonly form: ImportForm;
  readonly visibility: Visibility;
}

export interface Parameter extends NodeBase {
  readonly kind: "parameter";
  readonly name: Identifier;
  readonly type: TypeNode;
}

export interface FunctionDecl extends NodeBase, Modifiers {
  readonly kind: "function";
  readonly name: Identifier;
  readonly params: readonly Parameter[];
  readonly returnType?: TypeNode;
  readonly body: BlockStmt;
}

export interface ConstructorDecl extends NodeBase {
  readonly kind: "constructor";
  readonly params: readonly Parameter[];
  readonly body: BlockStmt;
  readonly visibility: Visibility;
}

export interface FieldDecl extends NodeBase, Modifiers {
  readonly kind: "field";
  readonly name: Identifier;
  readonly mutable: boolean;
  readonly type: TypeNode;
  readonly initializer?: Expr;
}

/** Members shared by class, struct and enum bodies. */
export interface ContainerBody {
  readonly fields: readonly FieldDecl[];
  readonly methods: readonly FunctionDecl[];
  readonly constructors: readonly ConstructorDecl[];
}

export interface ClassDecl extends NodeBase, Modifiers, ContainerBody {
  readonly kind: "class";
  readonly name: Identifier;
  readonly superclass?: TypeNode;
}

export interface StructDecl extends NodeBase, Modifiers, ContainerBody {
  readonly kind: "struct";
  readonly name: Identifier;
}

export interface EnumConstant extends NodeBase {
  readonly kind: "enum-constant";
  readonly name: Identifier;
  /** `undefined` when the constant is written without parentheses. */
  readonly args?: readonly Expr[];
}

export interface EnumDecl extends NodeBase, Modifiers, ContainerBody {
  readonly kind: "enum";
  readonly name: Identifier;
  readonly constants: readonly EnumConstant[];
}

export interface GlobalDecl extends NodeBase {
  readonly kind: "global";
  readonly variable: VariableStmt;
  readonly visibility: Visibility;
}

export type ContainerDecl = ClassDecl | StructDecl | EnumDecl;

export type Decl =
  | ImportDecl
  | FunctionDecl
  | ClassDecl
  | StructDecl
  | EnumDecl
  | GlobalDecl;

export interface FileNode extends NodeBase {
  readonly kind: "file";
  readonly path: string;
  readonly module?: ModuleDecl;
  readonly imports: readonly ImportDecl[];
  readonly declarations: readonly Exclude<Decl, ImportDecl>[];
}

export const isContainerDecl = (decl: Decl): decl is ContainerDecl =>
  decl.kind === "class" || decl.kind === "struct" || decl.kind === "enum";

export const isAssignmentTarget = (expr: Expr): expr is AssignmentTarget =>
  expr.kind === "identifier" || expr.kind === "member";

export const formatTypeNode = (type: TypeNode): string => {
  switch (type.kind) {
    case "named-type":
      return type.name;
    case "array-type":
      return `${formatTypeNode(type.element)}[]`;
    case "nullable-type":
      return `${formatTypeNode(type.inner)}?`;
  }
};
