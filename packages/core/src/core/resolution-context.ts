/*
 * ResolutionContext
 * -----------------
 * The chain of lexical scopes a test unit is declared in, innermost first:
 *
 *   method → its class → enclosing class → ... → root class
 *
 * The core only reads it. Host bindings build it once per unit from whatever the
 * runtime exposes about lexical nesting (see engine/context-builder.ts for the
 * decorator-registry binding).
 *
 * Annotations are exposed per scope through the AnnotationSource capability. A
 * repeatable annotation declared through its container (`@SetEnvironmentVariables([...])`)
 * is flattened here, so consumers only ever see one sequence per scope.
 */
import type { AnnotationKind, AttributeBag, KindId } from './annotation-kind.js';

/**
 * Read-only view of the annotations directly present on one scope.
 */
export interface AnnotationSource {
  /**
   * All instances of `kind` directly present on the scope, in declaration order.
   * Empty when the scope does not carry the annotation.
   */
  instancesOf(kind: AnnotationKind): readonly AttributeBag[];
}

/** One annotation instance as declared. */
export interface AnnotationInstance {
  readonly kind: AnnotationKind;
  readonly attributes: AttributeBag;
}

/** A container annotation holding several instances of a repeatable kind. */
export interface ContainerInstance {
  readonly kind: AnnotationKind;
  readonly repeated: readonly AttributeBag[];
}

export type DeclaredAnnotation = AnnotationInstance | ContainerInstance;

const EMPTY: readonly AttributeBag[] = Object.freeze([]);

function isContainer(a: DeclaredAnnotation): a is ContainerInstance {
  return 'repeated' in a;
}

/**
 * AnnotationSource over a fixed list of declared annotations.
 */
export class StaticAnnotationSource implements AnnotationSource {
  private readonly byKind = new Map<KindId, AttributeBag[]>();

  constructor(declared: Iterable<DeclaredAnnotation> = []) {
    for (const annotation of declared) {
      const bags = isContainer(annotation) ? annotation.repeated : [annotation.attributes];
      let list = this.byKind.get(annotation.kind.id);
      if (!list) {
        list = [];
        this.byKind.set(annotation.kind.id, list);
      }
      for (const bag of bags) list.push(Object.freeze({ ...bag }));
    }
  }

  instancesOf(kind: AnnotationKind): readonly AttributeBag[] {
    return this.byKind.get(kind.id) ?? EMPTY;
  }
}

/** Shape of a test method's parameter list. */
export interface UnitSignature {
  /** Number of declared parameters */
  readonly parameterCount: number;
  /** Declared parameter names, when the host knows them */
  readonly parameterNames?: readonly string[];
}

export type ScopeType = 'method' | 'class';

/**
 * One lexical declaration level.
 */
export interface ScopeDescriptor {
  /** Human-readable name used in diagnostics (`MyTests`, `MyTests#works`) */
  readonly name: string;
  readonly type: ScopeType;
  readonly annotations: AnnotationSource;
  /** Enclosing scope, or undefined for the outermost one */
  readonly parent?: ScopeDescriptor;
  /** Present on method scopes */
  readonly signature?: UnitSignature;
}

/**
 * A resolution context is its innermost scope; outer scopes are reached via `parent`.
 */
export type ResolutionContext = ScopeDescriptor;

export interface ScopeInit {
  name: string;
  type?: ScopeType;
  annotations?: Iterable<DeclaredAnnotation> | AnnotationSource;
  signature?: UnitSignature;
}

function isAnnotationSource(x: unknown): x is AnnotationSource {
  return (
    typeof x === 'object' &&
    x !== null &&
    typeof (x as AnnotationSource).instancesOf === 'function'
  );
}

/**
 * Build a frozen context from scopes given innermost first.
 *
 * @example
 * ```typescript
 * const context = createResolutionContext([
 *   { name: 'Tests#works', type: 'method', annotations: [{ kind: SetK, attributes: { key: 'A', value: '1' } }] },
 *   { name: 'Tests', annotations: [] },
 * ]);
 * ```
 */
export function createResolutionContext(scopes: readonly ScopeInit[]): ResolutionContext {
  let parent: ScopeDescriptor | undefined;
  for (let i = scopes.length - 1; i >= 0; i--) {
    const init = scopes[i];
    const annotations = isAnnotationSource(init.annotations)
      ? init.annotations
      : new StaticAnnotationSource(init.annotations ?? []);
    const scope: ScopeDescriptor = Object.freeze({
      name: init.name,
      type: init.type ?? 'class',
      annotations,
      parent,
      signature: init.signature,
    });
    parent = scope;
  }
  if (!parent) throw new Error('A resolution context needs at least one scope.');
  return parent;
}

/**
 * Iterate a context from the innermost scope outward.
 */
export function* walkOutward(context: ResolutionContext): IterableIterator<ScopeDescriptor> {
  for (let scope: ScopeDescriptor | undefined = context; scope; scope = scope.parent) {
    yield scope;
  }
}

/**
 * The nearest method scope, if the context belongs to a method.
 */
export function methodScopeOf(context: ResolutionContext): ScopeDescriptor | undefined {
  for (const scope of walkOutward(context)) {
    if (scope.type === 'method') return scope;
  }
  return undefined;
}
