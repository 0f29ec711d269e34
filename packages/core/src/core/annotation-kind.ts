/**
 * Branded type for canonical annotation kind identifiers.
 * Prevents accidental use of raw strings as kind IDs.
 */
export type KindId = string & { __brand: 'KindId' };

/**
 * Phantom type brand for compile-time type safety.
 * Associates a kind with the attribute shape of its instances.
 */
declare const ATTRIBUTES_BRAND: unique symbol;

/**
 * Attributes of a single annotation instance, as recorded by its decorator.
 */
export type AttributeBag = Readonly<Record<string, unknown>>;

/**
 * Identity of an annotation type.
 *
 * Kinds are what the locator asks an {@link AnnotationSource} for. The attribute
 * type parameter only exists at compile time.
 *
 * @template A - Attribute shape of instances of this kind
 */
export interface AnnotationKind<A extends AttributeBag = AttributeBag> {
  /** Discriminant for runtime type checking */
  readonly kind: 'annotation-kind';

  /** Unique canonical identifier (ann_1, ann_2, etc.) */
  readonly id: KindId;

  /** Annotation name as written by users, without the `@` */
  readonly name: string;

  /**
   * Whether a single scope may carry more than one instance.
   * Instances of a non-repeatable kind found twice at one scope are a configuration error.
   */
  readonly repeatable: boolean;

  /** Phantom type brand - associates the kind with its attribute shape */
  readonly [ATTRIBUTES_BRAND]: A;
}

export interface AnnotationKindOptions {
  repeatable?: boolean;
}

let _kindCounter = 0;

/**
 * Create a new annotation kind.
 *
 * @example
 * ```typescript
 * const SetEnvironmentVariableK = annotationKind<{ key: string; value: string }>(
 *   'SetEnvironmentVariable',
 *   { repeatable: true }
 * );
 * ```
 */
export function annotationKind<A extends AttributeBag = AttributeBag>(
  name: string,
  options: AnnotationKindOptions = {}
): AnnotationKind<A> {
  const id = `ann_${++_kindCounter}` as KindId;
  return Object.freeze({
    kind: 'annotation-kind',
    id,
    name,
    repeatable: options.repeatable ?? false,
  }) as AnnotationKind<A>;
}

/**
 * Runtime type guard to check if a value is a valid AnnotationKind.
 */
export function isAnnotationKind(x: unknown): x is AnnotationKind {
  return (
    typeof x === 'object' &&
    x !== null &&
    (x as AnnotationKind).kind === 'annotation-kind' &&
    typeof (x as AnnotationKind).id === 'string' &&
    typeof (x as AnnotationKind).name === 'string' &&
    typeof (x as AnnotationKind).repeatable === 'boolean'
  );
}
