import {
  StaticAnnotationSource,
  type AnnotationSource,
  type DeclaredAnnotation,
} from '../core/resolution-context.js';
import type { AnnotationKind, AttributeBag } from '../core/annotation-kind.js';
import { isConstructor, type Constructor } from '../types/types.js';
import type { VintageOptions } from '../extensions/vintage.js';

/**
 * How a method is run by the engine.
 *
 * - test: plain test, invoked once without arguments
 * - parameterized: invoked once per argument row
 * - vintage: invoked once, with expected-error and timeout rules
 */
export type TestDeclaration =
  | { readonly type: 'test' }
  | { readonly type: 'parameterized'; readonly parameterNames?: readonly string[] }
  | { readonly type: 'vintage'; readonly options: VintageOptions };

export interface TestMethod {
  readonly name: string;
  readonly declaration: TestDeclaration;
}

/**
 * Mutable record for one decorated method.
 *
 * Fields:
 * - annotations: in source order (decorators run bottom-up and are prepended)
 * - declaration: set by @Test / @ParameterizedTest / @VintageTest
 */
type MethodRecord = {
  annotations: DeclaredAnnotation[];
  declaration?: TestDeclaration;
};

/**
 * Mutable record for one decorated class.
 *
 * Fields:
 * - annotations: class-level annotations in source order
 * - methods: in declaration order
 * - enclosing: lazy reference to the outer class, from @Nested
 */
type ClassRecord = {
  annotations: DeclaredAnnotation[];
  methods: Map<string, MethodRecord>;
  enclosing?: () => Constructor;
};

/**
 * Fields:
 * - classes: WeakMap for garbage collection of unused constructors
 * - keys: Strong references in registration order, for nested-class discovery
 */
type RegistryBag = {
  classes: WeakMap<Constructor, ClassRecord>;
  keys: Set<Constructor>;
};

/**
 * Global symbol for storing the annotation registry on globalThis.
 *
 * This ensures a single registry instance per process, even if the module
 * is loaded more than once.
 */
const GLOBAL_SYMBOL = Symbol.for('pinion.annotationRegistry');

type GlobalWithRegistry = typeof globalThis & { [GLOBAL_SYMBOL]?: RegistryBag };

/**
 * Annotations of one declaration along a class hierarchy, nearest class first.
 * For each kind, the nearest class declaring it supplies every instance; a
 * subclass redeclaring a kind hides the inherited ones.
 */
class InheritedAnnotationSource implements AnnotationSource {
  constructor(private readonly layers: readonly AnnotationSource[]) {}

  instancesOf(kind: AnnotationKind): readonly AttributeBag[] {
    for (const layer of this.layers) {
      const instances = layer.instancesOf(kind);
      if (instances.length > 0) return instances;
    }
    return [];
  }
}

function createBag(): RegistryBag {
  return { classes: new WeakMap(), keys: new Set() };
}

function ensureBag(): RegistryBag {
  const g: GlobalWithRegistry = globalThis;
  return (g[GLOBAL_SYMBOL] ??= createBag());
}

/**
 * Global registry for decorator-declared annotations.
 *
 * Architecture:
 * - Decorators call record*() / declare*() at module load time
 * - The engine's context builder reads sources and test methods back
 *
 * Legacy decorators on one declaration run bottom-up, so records prepend to
 * keep `annotations` in the order they appear in source.
 */
export class AnnotationRegistry {
  /**
   * Record an annotation declared on a class.
   */
  static recordClassAnnotation(target: Constructor, annotation: DeclaredAnnotation): void {
    this.classRecord(target).annotations.unshift(annotation);
  }

  /**
   * Record an annotation declared on a method.
   */
  static recordMethodAnnotation(target: Constructor, method: string, annotation: DeclaredAnnotation): void {
    this.methodRecord(target, method).annotations.unshift(annotation);
  }

  /**
   * Mark a method as a test.
   *
   * @throws Error if the method was already declared as a test
   */
  static declareTest(target: Constructor, method: string, declaration: TestDeclaration): void {
    const rec = this.methodRecord(target, method);
    if (rec.declaration) {
      throw new Error(
        `${target.name}#${method} is already declared as a ${rec.declaration.type} test; use a single test decorator.`
      );
    }
    rec.declaration = declaration;
  }

  /**
   * Record the class `target` is nested in.
   */
  static declareEnclosing(target: Constructor, enclosing: () => Constructor): void {
    this.classRecord(target).enclosing = enclosing;
  }

  static has(target: Constructor): boolean {
    return ensureBag().classes.has(target);
  }

  /**
   * Class-level annotations of `target`, including those inherited from its
   * superclasses.
   */
  static sourceForClass(target: Constructor): AnnotationSource {
    return new InheritedAnnotationSource(
      this.lineage(target).map((rec) => new StaticAnnotationSource(rec.annotations))
    );
  }

  /**
   * Annotations of method `method`, including those declared on the same method
   * of a superclass.
   */
  static sourceForMethod(target: Constructor, method: string): AnnotationSource {
    const layers: AnnotationSource[] = [];
    for (const rec of this.lineage(target)) {
      const annotations = rec.methods.get(method)?.annotations;
      if (annotations) layers.push(new StaticAnnotationSource(annotations));
    }
    return new InheritedAnnotationSource(layers);
  }

  /**
   * Test methods of `target` and its superclasses: inherited ones first, each in
   * declaration order. A subclass redeclaring a test replaces its declaration.
   */
  static testMethods(target: Constructor): TestMethod[] {
    const declared = new Map<string, TestDeclaration>();
    for (const rec of this.lineage(target).reverse()) {
      for (const [name, method] of rec.methods) {
        if (method.declaration) declared.set(name, method.declaration);
      }
    }
    return [...declared].map(([name, declaration]) => ({ name, declaration }));
  }

  /**
   * The enclosing class of a @Nested class, or undefined for a top-level one.
   */
  static enclosingOf(target: Constructor): Constructor | undefined {
    return ensureBag().classes.get(target)?.enclosing?.();
  }

  /**
   * @Nested classes declared inside `target`, in registration order.
   */
  static nestedIn(target: Constructor): Constructor[] {
    const bag = ensureBag();
    const out: Constructor[] = [];
    for (const key of bag.keys) {
      const enclosing = bag.classes.get(key)?.enclosing;
      if (enclosing && enclosing() === target) out.push(key);
    }
    return out;
  }

  /**
   * Test helper to reset the registry.
   *
   * ⚠️ For test environments only. Alias for reset().
   */
  static resetForTests(): void {
    this.reset();
  }

  /**
   * Drop every record.
   *
   * ⚠️ Classes decorated before the reset are forgotten; re-import them to
   * register them again.
   */
  static reset(): void {
    const g: GlobalWithRegistry = globalThis;
    g[GLOBAL_SYMBOL] = createBag();
  }

  // ---- internals ----

  /**
   * Records of `target` and of every registered superclass, nearest first.
   */
  private static lineage(target: Constructor): ClassRecord[] {
    const bag = ensureBag();
    const out: ClassRecord[] = [];
    for (let cls: unknown = target; isConstructor(cls); cls = Object.getPrototypeOf(cls)) {
      const rec = bag.classes.get(cls);
      if (rec) out.push(rec);
    }
    return out;
  }

  private static classRecord(target: Constructor): ClassRecord {
    const bag = ensureBag();
    let rec = bag.classes.get(target);
    if (!rec) {
      rec = { annotations: [], methods: new Map() };
      bag.classes.set(target, rec);
      bag.keys.add(target);
    }
    return rec;
  }

  private static methodRecord(target: Constructor, method: string): MethodRecord {
    const methods = this.classRecord(target).methods;
    let rec = methods.get(method);
    if (!rec) {
      rec = { annotations: [] };
      methods.set(method, rec);
    }
    return rec;
  }
}
