/*
 * Builds ResolutionContexts from the annotation registry.
 *
 * The enclosing chain of a class comes from @Nested; a class without it is
 * top-level. Method scopes carry the method's signature so argument filters can
 * check their targets.
 */
import { createResolutionContext, type ResolutionContext, type ScopeInit } from '../core/resolution-context.js';
import { AnnotationRegistry, type TestMethod } from '../registry/annotation-registry.js';
import type { Constructor } from '../types/types.js';

/**
 * `cls` and its enclosing classes, outermost first.
 *
 * @throws Error if the @Nested chain loops back on itself
 */
export function classChain(cls: Constructor): Constructor[] {
  const chain: Constructor[] = [];
  for (let current: Constructor | undefined = cls; current; current = AnnotationRegistry.enclosingOf(current)) {
    if (chain.includes(current)) {
      const path = [...chain, current].map((c) => c.name).join(' → ');
      throw new Error(`Circular @Nested declaration: ${path}`);
    }
    chain.push(current);
  }
  return chain.reverse();
}

function classScopes(cls: Constructor): ScopeInit[] {
  return classChain(cls)
    .reverse()
    .map((c): ScopeInit => ({ name: c.name, type: 'class', annotations: AnnotationRegistry.sourceForClass(c) }));
}

export function contextForClass(cls: Constructor): ResolutionContext {
  return createResolutionContext(classScopes(cls));
}

export function contextForMethod(cls: Constructor, method: TestMethod): ResolutionContext {
  const fn: unknown = Reflect.get(cls.prototype, method.name);
  const parameterNames =
    method.declaration.type === 'parameterized' ? method.declaration.parameterNames : undefined;

  return createResolutionContext([
    {
      name: `${cls.name}#${method.name}`,
      type: 'method',
      annotations: AnnotationRegistry.sourceForMethod(cls, method.name),
      signature: {
        parameterCount: typeof fn === 'function' ? fn.length : 0,
        parameterNames,
      },
    },
    ...classScopes(cls),
  ]);
}
