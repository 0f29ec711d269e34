import type { AnnotationKind, AttributeBag } from '../core/annotation-kind.js';
import type { DeclaredAnnotation } from '../core/resolution-context.js';
import { AnnotationRegistry } from '../registry/annotation-registry.js';
import { isConstructor, type Constructor } from '../types/types.js';

/**
 * Decorator usable on a class and on its instance methods.
 */
export type ScopeDecorator = ClassDecorator & MethodDecorator;

/**
 * Resolve the class a legacy decorator was applied to.
 *
 * Class decorators receive the constructor; instance-method decorators receive
 * its prototype. Static members are rejected since tests run on instances.
 */
export function decoratedClass(
  decorator: string,
  target: unknown,
  propertyKey?: string | symbol
): Constructor {
  if (typeof target === 'function') {
    if (propertyKey !== undefined) {
      throw new Error(`@${decorator} cannot decorate static member '${String(propertyKey)}'.`);
    }
    if (isConstructor(target)) return target;
  } else if (typeof target === 'object' && target !== null && isConstructor(target.constructor)) {
    return target.constructor;
  }
  throw new Error(`@${decorator} can only decorate classes and their instance methods.`);
}

export function methodName(decorator: string, propertyKey: string | symbol): string {
  if (typeof propertyKey !== 'string') {
    throw new Error(`@${decorator} cannot decorate symbol-keyed method ${String(propertyKey)}.`);
  }
  return propertyKey;
}

/**
 * A decorator recording `declared` on whichever class or method it is applied to.
 */
export function scopeAnnotation(decorator: string, declared: DeclaredAnnotation): ScopeDecorator {
  return (target: unknown, propertyKey?: string | symbol): void => {
    const cls = decoratedClass(decorator, target, propertyKey);
    if (propertyKey === undefined) {
      AnnotationRegistry.recordClassAnnotation(cls, declared);
    } else {
      AnnotationRegistry.recordMethodAnnotation(cls, methodName(decorator, propertyKey), declared);
    }
  };
}

/**
 * A decorator recording one instance of `kind` on a method only.
 */
export function methodAnnotation<A extends AttributeBag>(
  kind: AnnotationKind<A>,
  attributes: A
): MethodDecorator {
  return (target: unknown, propertyKey: string | symbol): void => {
    const cls = decoratedClass(kind.name, target, propertyKey);
    AnnotationRegistry.recordMethodAnnotation(cls, methodName(kind.name, propertyKey), {
      kind,
      attributes,
    });
  };
}
