import type {
  DiagnosticHint,
  DiagnosticPhase,
  DiagnosticSeverity,
} from "./types.js";

type DiagnosticMessage<P> = (params: P) => string;

export type DiagnosticDefinition<P> = {
  code: string;
  message: DiagnosticMessage<P>;
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  hints?: readonly DiagnosticHint[];
};

const immutableBindingHint: DiagnosticHint = {
  message: "Declare the binding with 'var' (and without 'final') to allow reassignment.",
};

type DiagnosticParamsMap = {
  LX0001:
    | { kind: "unterminated-string" }
    | { kind: "unterminated-char" }
    | { kind: "unterminated-comment" };
  LX0002: { kind: "unexpected-character"; character: string };
  LX0003:
    | { kind: "invalid-char-literal"; text: string }
    | { kind: "invalid-escape"; sequence: string };
  LX0004: { kind: "malformed-number"; text: string };
  PS0001: { kind: "unexpected-token"; expected: string; found: string };
  PS0002: { kind: "invalid-assignment-target"; operator: string };
  PS0003:
    | { kind: "expected-declaration"; found: string }
    | { kind: "dangling-modifier"; modifier: string; found: string };
  PS0004:
    | { kind: "empty-projection" }
    | { kind: "expected-projection-field"; found: string }
    | { kind: "unclosed-projection"; found: string };
  PS0005: { kind: "invalid-modifier"; modifier: string; declaration: string };
  PS0006: { kind: "expected-expression"; found: string };
  PS0007:
    | { kind: "misplaced-module-declaration" }
    | { kind: "duplicate-module-declaration" };
  PS0008: { kind: "expected-type"; found: string };
  MD0001: { kind: "missing-module"; path: string; candidates: readonly string[] };
  MD0002: { kind: "import-cycle"; chain: readonly string[] };
  MD0003: { kind: "unreadable-module"; path: string; reason: string };
  BD0001:
    | { kind: "duplicate-declaration"; name: string }
    | { kind: "previous-declaration"; name: string };
  BD0002: { kind: "undefined-symbol"; name: string };
  BD0003:
    | { kind: "not-exported"; moduleName: string; name: string }
    | { kind: "hidden-export"; moduleName: string; name: string; access: string };
  BD0004: { kind: "jump-outside-loop"; keyword: "break" | "continue" };
  BD0005: { kind: "self-outside-type" };
  BD0006: { kind: "duplicate-constructor"; typeName: string };
  TY0001: { kind: "unknown-type"; name: string };
  TY0002: {
    kind: "type-mismatch";
    context: string;
    expected: string;
    actual: string;
  };
  TY0003:
    | { kind: "binary-operands"; operator: string; left: string; right: string }
    | { kind: "unary-operand"; operator: string; operand: string };
  TY0004: { kind: "non-bool-condition"; construct: string; actual: string };
  TY0005: { kind: "incompatible-branches"; left: string; right: string };
  TY0006: { kind: "missing-field"; field: string; struct: string };
  TY0007: { kind: "unexpected-field"; field: string; struct: string };
  TY0008: { kind: "duplicate-field"; field: string; struct: string };
  TY0009:
    | { kind: "missing-constructor"; enumName: string }
    | { kind: "mixed-parameters"; enumName: string }
    | {
        kind: "constant-arity";
        enumName: string;
        constant: string;
        expected: number;
        actual: number;
      };
  TY0010: { kind: "argument-count"; callee: string; expected: number; actual: number };
  TY0011: { kind: "not-callable"; type: string };
  TY0012: { kind: "unknown-member"; member: string; receiver: string };
  TY0013: {
    kind: "access-violation";
    member: string;
    receiver: string;
    access: string;
  };
  TY0014:
    | { kind: "missing-return"; functionName: string; expected: string }
    | { kind: "missing-return-value"; functionName: string; expected: string }
    | { kind: "unexpected-return-value"; functionName: string };
  TY0015:
    | { kind: "float-with-integer-suffix"; text: string; suffix: string }
    | { kind: "unknown-suffix"; text: string; suffix: string }
    | { kind: "literal-out-of-range"; text: string; type: string };
  TY0016: { kind: "immutable-assignment"; name: string };
  TY0017: { kind: "projection-target"; type: string };
  TY0018: { kind: "invalid-cast"; from: string; to: string };
  TY0019:
    | { kind: "missing-type-and-initializer"; name: string }
    | { kind: "null-initializer"; name: string }
    | { kind: "void-initializer"; name: string };
  TY0020:
    | { kind: "not-indexable"; type: string }
    | { kind: "non-integer-index"; type: string };
  TY0021:
    | { kind: "superclass-not-class"; className: string; superclass: string }
    | { kind: "final-superclass"; className: string; superclass: string }
    | { kind: "inheritance-cycle"; className: string }
    | { kind: "final-method-override"; className: string; method: string };
  TY0022: { kind: "not-a-struct"; name: string };
  TY0023: { kind: "incompatible-elements"; first: string; other: string };
  TY0024: { kind: "nullable-member-access"; member: string; receiver: string };
  TY0025: { kind: "void-value"; context: string };
};

export type DiagnosticCode = keyof DiagnosticParamsMap;
export type DiagnosticParams<K extends DiagnosticCode> = DiagnosticParamsMap[K];

const diagnosticsRegistry: {
  [K in DiagnosticCode]: DiagnosticDefinition<DiagnosticParamsMap[K]>;
} = {
  LX0001: {
    code: "LX0001",
    message: (params) => {
      switch (params.kind) {
        case "unterminated-string":
          return "unterminated string literal";
        case "unterminated-char":
          return "unterminated character literal";
        case "unterminated-comment":
          return "unterminated block comment";
      }
    },
    severity: "error",
    phase: "lexing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0001"]>,
  LX0002: {
    code: "LX0002",
    message: (params) => `unexpected character '${params.character}'`,
    severity: "error",
    phase: "lexing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0002"]>,
  LX0003: {
    code: "LX0003",
    message: (params) =>
      params.kind === "invalid-char-literal"
        ? `character literal ${params.text} must contain exactly one character`
        : `invalid escape sequence '${params.sequence}'`,
    severity: "error",
    phase: "lexing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0003"]>,
  LX0004: {
    code: "LX0004",
    message: (params) => `malformed number literal '${params.text}'`,
    severity: "error",
    phase: "lexing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["LX0004"]>,
  PS0001: {
    code: "PS0001",
    message: (params) => `expected ${params.expected} but found ${params.found}`,
    severity: "error",
    phase: "parsing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0001"]>,
  PS0002: {
    code: "PS0002",
    message: (params) =>
      `invalid target for '${params.operator}': only identifiers and member accesses can be assigned`,
    severity: "error",
    phase: "parsing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0002"]>,
  PS0003: {
    code: "PS0003",
    message: (params) =>
      params.kind === "expected-declaration"
        ? `expected a declaration but found ${params.found}`
        : `modifier '${params.modifier}' must be followed by a declaration, found ${params.found}`,
    severity: "error",
    phase: "parsing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0003"]>,
  PS0004: {
    code: "PS0004",
    message: (params) => {
      switch (params.kind) {
        case "empty-projection":
          return "projection must select at least one field";
        case "expected-projection-field":
          return `expected a field name in projection but found ${params.found}`;
        case "unclosed-projection":
          return `expected ',' or ')' to continue projection but found ${params.found}`;
      }
    },
    severity: "error",
    phase: "parsing",
    hints: [{ message: "Projections take the form value.(field, other as alias)." }],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0004"]>,
  PS0005: {
    code: "PS0005",
    message: (params) =>
      `modifier '${params.modifier}' cannot be applied to ${params.declaration}`,
    severity: "error",
    phase: "parsing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0005"]>,
  PS0006: {
    code: "PS0006",
    message: (params) => `expected an expression but found ${params.found}`,
    severity: "error",
    phase: "parsing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0006"]>,
  PS0007: {
    code: "PS0007",
    message: (params) =>
      params.kind === "misplaced-module-declaration"
        ? "module declaration must come before all other declarations"
        : "a file can only declare its module once",
    severity: "error",
    phase: "parsing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0007"]>,
  PS0008: {
    code: "PS0008",
    message: (params) => `expected a type but found ${params.found}`,
    severity: "error",
    phase: "parsing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["PS0008"]>,
  MD0001: {
    code: "MD0001",
    message: (params) => `unable to find module ${params.path}`,
    severity: "error",
    phase: "module-graph",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MD0001"]>,
  MD0002: {
    code: "MD0002",
    message: (params) => `import cycle detected: ${params.chain.join(" -> ")}`,
    severity: "error",
    phase: "module-graph",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MD0002"]>,
  MD0003: {
    code: "MD0003",
    message: (params) => `unable to read module ${params.path}: ${params.reason}`,
    severity: "error",
    phase: "module-graph",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["MD0003"]>,
  BD0001: {
    code: "BD0001",
    message: (params) =>
      params.kind === "duplicate-declaration"
        ? `'${params.name}' is already declared in this scope`
        : `previous declaration of '${params.name}' is here`,
    severity: "error",
    phase: "binder",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0001"]>,
  BD0002: {
    code: "BD0002",
    message: (params) => `undefined symbol '${params.name}'`,
    severity: "error",
    phase: "binder",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0002"]>,
  BD0003: {
    code: "BD0003",
    message: (params) =>
      params.kind === "not-exported"
        ? `module ${params.moduleName} does not export '${params.name}'`
        : `'${params.name}' is ${params.access} in module ${params.moduleName} and cannot be imported`,
    severity: "error",
    phase: "binder",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0003"]>,
  BD0004: {
    code: "BD0004",
    message: (params) => `'${params.keyword}' can only be used inside a loop`,
    severity: "error",
    phase: "binder",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0004"]>,
  BD0005: {
    code: "BD0005",
    message: () => "'self' can only be used inside a method or constructor",
    severity: "error",
    phase: "binder",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0005"]>,
  BD0006: {
    code: "BD0006",
    message: (params) => `'${params.typeName}' already declares a constructor`,
    severity: "error",
    phase: "binder",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["BD0006"]>,
  TY0001: {
    code: "TY0001",
    message: (params) => `unknown type '${params.name}'`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0001"]>,
  TY0002: {
    code: "TY0002",
    message: (params) =>
      `type mismatch in ${params.context}: expected ${params.expected}, found ${params.actual}`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0002"]>,
  TY0003: {
    code: "TY0003",
    message: (params) =>
      params.kind === "binary-operands"
        ? `operator '${params.operator}' cannot be applied to ${params.left} and ${params.right}`
        : `operator '${params.operator}' cannot be applied to ${params.operand}`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0003"]>,
  TY0004: {
    code: "TY0004",
    message: (params) =>
      `${params.construct} condition must be bool, found ${params.actual}`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0004"]>,
  TY0005: {
    code: "TY0005",
    message: (params) =>
      `ternary branches have incompatible types ${params.left} and ${params.right}`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0005"]>,
  TY0006: {
    code: "TY0006",
    message: (params) =>
      `missing field '${params.field}' when constructing '${params.struct}'`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0006"]>,
  TY0007: {
    code: "TY0007",
    message: (params) =>
      `'${params.struct}' has no field '${params.field}'`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0007"]>,
  TY0008: {
    code: "TY0008",
    message: (params) =>
      `field '${params.field}' of '${params.struct}' is given more than once`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0008"]>,
  TY0009: {
    code: "TY0009",
    message: (params) => {
      switch (params.kind) {
        case "missing-constructor":
          return `enum '${params.enumName}' has constants with arguments but declares no constructor`;
        case "mixed-parameters":
          return `enum '${params.enumName}' mixes constants with and without arguments`;
        case "constant-arity":
          return `enum constant '${params.enumName}.${params.constant}' expects ${params.expected} argument(s), found ${params.actual}`;
      }
    },
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0009"]>,
  TY0010: {
    code: "TY0010",
    message: (params) =>
      `'${params.callee}' expects ${params.expected} argument(s), found ${params.actual}`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0010"]>,
  TY0011: {
    code: "TY0011",
    message: (params) => `value of type ${params.type} is not callable`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0011"]>,
  TY0012: {
    code: "TY0012",
    message: (params) => `${params.receiver} has no member '${params.member}'`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0012"]>,
  TY0013: {
    code: "TY0013",
    message: (params) =>
      `member '${params.member}' of ${params.receiver} is ${params.access} and not accessible here`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0013"]>,
  TY0014: {
    code: "TY0014",
    message: (params) => {
      switch (params.kind) {
        case "missing-return":
          return `function '${params.functionName}' must return a value of type ${params.expected}`;
        case "missing-return-value":
          return `function '${params.functionName}' must return a value of type ${params.expected} here`;
        case "unexpected-return-value":
          return `function '${params.functionName}' returns void and cannot return a value`;
      }
    },
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0014"]>,
  TY0015: {
    code: "TY0015",
    message: (params) => {
      switch (params.kind) {
        case "float-with-integer-suffix":
          return `type mismatch: float literal ${params.text} cannot take integer suffix '${params.suffix}'`;
        case "unknown-suffix":
          return `unknown numeric suffix '${params.suffix}' on ${params.text}`;
        case "literal-out-of-range":
          return `literal ${params.text} does not fit in ${params.type}`;
      }
    },
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0015"]>,
  TY0016: {
    code: "TY0016",
    message: (params) => `cannot assign to immutable '${params.name}'`,
    severity: "error",
    phase: "typing",
    hints: [immutableBindingHint],
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0016"]>,
  TY0017: {
    code: "TY0017",
    message: (params) =>
      `projection requires an enum value, found ${params.type}`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0017"]>,
  TY0018: {
    code: "TY0018",
    message: (params) => `cannot cast ${params.from} to ${params.to}`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0018"]>,
  TY0019: {
    code: "TY0019",
    message: (params) => {
      switch (params.kind) {
        case "missing-type-and-initializer":
          return `cannot infer the type of '${params.name}' without an annotation or initializer`;
        case "null-initializer":
          return `cannot infer the type of '${params.name}' from null; add a nullable annotation`;
        case "void-initializer":
          return `cannot initialize '${params.name}' with a void value`;
      }
    },
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0019"]>,
  TY0020: {
    code: "TY0020",
    message: (params) =>
      params.kind === "not-indexable"
        ? `value of type ${params.type} cannot be indexed`
        : `index must be an integer, found ${params.type}`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0020"]>,
  TY0021: {
    code: "TY0021",
    message: (params) => {
      switch (params.kind) {
        case "superclass-not-class":
          return `class '${params.className}' cannot extend '${params.superclass}', which is not a class`;
        case "final-superclass":
          return `class '${params.className}' cannot extend final class '${params.superclass}'`;
        case "inheritance-cycle":
          return `class '${params.className}' inherits from itself`;
        case "final-method-override":
          return `class '${params.className}' cannot redeclare final method '${params.method}'`;
      }
    },
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0021"]>,
  TY0022: {
    code: "TY0022",
    message: (params) => `'${params.name}' is not a struct`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0022"]>,
  TY0023: {
    code: "TY0023",
    message: (params) =>
      `array elements have incompatible types ${params.first} and ${params.other}`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0023"]>,
  TY0024: {
    code: "TY0024",
    message: (params) =>
      `cannot access '${params.member}' on nullable ${params.receiver}`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0024"]>,
  TY0025: {
    code: "TY0025",
    message: (params) => `void value cannot be used as ${params.context}`,
    severity: "error",
    phase: "typing",
  } satisfies DiagnosticDefinition<DiagnosticParamsMap["TY0025"]>,
};

export const formatDiagnosticMessage = <K extends DiagnosticCode>(
  code: K,
  params: DiagnosticParams<K>,
): string => {
  const definition: DiagnosticDefinition<DiagnosticParams<K>> =
    diagnosticsRegistry[code];
  return definition.message(params);
};

export const getDiagnosticDefinition = <K extends DiagnosticCode>(
  code: K,
): DiagnosticDefinition<DiagnosticParams<K>> => diagnosticsRegistry[code];

const isDiagnosticCode = (value: string): value is DiagnosticCode =>
  Object.prototype.hasOwnProperty.call(diagnosticsRegistry, value);

export const diagnosticCodes = (): DiagnosticCode[] =>
  Object.keys(diagnosticsRegistry).filter(isDiagnosticCode);
