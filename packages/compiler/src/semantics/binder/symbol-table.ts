import type { ScopeId, SymbolId, TypeId } from "../ids.js";
import type {
  DeclareResult,
  ScopeInfo,
  ScopeKind,
  SymbolInput,
  SymbolRecord,
  SymbolTableInit,
} from "./types.js";

interface ScopeBucket {
  info: ScopeInfo;
  locals: SymbolId[];
  nameIndex: Map<string, SymbolId>;
}

const ensureScopeExists = (
  bucket: ScopeBucket | undefined,
  scope: ScopeId,
): ScopeBucket => {
  if (!bucket) {
    throw new Error(`symbol table scope ${scope} does not exist`);
  }

  return bucket;
};

/**
 * Lexical scopes for one module. The root scope holds the prelude; the module
 * scope and everything below it are created by the analysis passes.
 */
export class SymbolTable {
  private nextScope: ScopeId = 0;
  private nextSymbol: SymbolId = 0;
  private readonly scopeBuckets: ScopeBucket[] = [];
  private readonly symbolRecords: SymbolRecord[] = [];
  private readonly scopeStack: ScopeId[] = [];
  readonly rootScope: ScopeId;

  constructor(init: SymbolTableInit) {
    this.rootScope = this.createBucket({
      parent: null,
      kind: "prelude",
      owner: init.rootOwner,
    });
    this.scopeStack.push(this.rootScope);
  }

  private createBucket(info: Omit<ScopeInfo, "id">): ScopeId {
    if (typeof info.parent === "number" && !this.scopeBuckets[info.parent]) {
      throw new Error(
        `cannot create scope without registering parent ${info.parent}`,
      );
    }

    const id = this.nextScope++;
    this.scopeBuckets[id] = {
      info: { ...info, id },
      locals: [],
      nameIndex: new Map(),
    };
    return id;
  }

  private record(id: SymbolId): SymbolRecord {
    const record = this.symbolRecords[id];
    if (!record) {
      throw new Error(`symbol ${id} does not exist`);
    }
    return record;
  }

  get currentScope(): ScopeId {
    const scope = this.scopeStack.at(-1);
    if (scope === undefined) {
      throw new Error("symbol table scope stack underflow");
    }

    return scope;
  }

  createScope(info: Omit<ScopeInfo, "id">): ScopeId {
    return this.createBucket(info);
  }

  /** Creates a child of the current scope and makes it current. */
  enter(kind: ScopeKind, owner: ScopeInfo["owner"]): ScopeId {
    const scope = this.createBucket({ parent: this.currentScope, kind, owner });
    this.scopeStack.push(scope);
    return scope;
  }

  enterScope(scope: ScopeId): void {
    ensureScopeExists(this.scopeBuckets[scope], scope);
    this.scopeStack.push(scope);
  }

  exitScope(): void {
    if (this.scopeStack.length <= 1) {
      throw new Error("attempted to exit root scope");
    }

    this.scopeStack.pop();
  }

  /**
   * Adds a symbol unless the scope already holds one with the same name.
   * Shadowing a name from an enclosing scope is always allowed.
   */
  declare(
    symbol: SymbolInput,
    scope: ScopeId = this.currentScope,
  ): DeclareResult {
    const bucket = ensureScopeExists(this.scopeBuckets[scope], scope);
    const existing = bucket.nameIndex.get(symbol.name);
    if (existing !== undefined) {
      return { ok: false, existing };
    }

    const id = this.nextSymbol++;
    this.symbolRecords[id] = { ...symbol, id, scope };
    bucket.locals.push(id);
    bucket.nameIndex.set(symbol.name, id);
    return { ok: true, id };
  }

  getScope(id: ScopeId): Readonly<ScopeInfo> {
    return { ...ensureScopeExists(this.scopeBuckets[id], id).info };
  }

  getSymbol(id: SymbolId): Readonly<SymbolRecord> {
    return { ...this.record(id) };
  }

  setSymbolType(id: SymbolId, type: TypeId): void {
    this.record(id).type = type;
  }

  /** Walks outward from `fromScope` and returns the nearest declaration. */
  resolve(
    name: string,
    fromScope: ScopeId = this.currentScope,
  ): SymbolId | undefined {
    let scope: ScopeId | null = fromScope;
    while (scope !== null) {
      const bucket = ensureScopeExists(this.scopeBuckets[scope], scope);
      const hit = bucket.nameIndex.get(name);
      if (hit !== undefined) {
        return hit;
      }

      scope = bucket.info.parent;
    }

    return undefined;
  }

  resolveLocal(name: string, scope: ScopeId): SymbolId | undefined {
    return ensureScopeExists(this.scopeBuckets[scope], scope).nameIndex.get(
      name,
    );
  }

  *symbolsInScope(scope: ScopeId): IterableIterator<SymbolId> {
    const bucket = ensureScopeExists(this.scopeBuckets[scope], scope);
    yield* bucket.locals;
  }
}
