import type { VintageOptions } from '../extensions/vintage.js';
import { AnnotationRegistry, type TestDeclaration } from '../registry/annotation-registry.js';
import type { Constructor } from '../types/types.js';
import { decoratedClass, methodName } from './annotate.js';

function declare(decorator: string, declaration: TestDeclaration): MethodDecorator {
  return (target: unknown, propertyKey: string | symbol): void => {
    const cls = decoratedClass(decorator, target, propertyKey);
    AnnotationRegistry.declareTest(cls, methodName(decorator, propertyKey), declaration);
  };
}

/** Marks a method as a test. */
export function Test(): MethodDecorator {
  return declare('Test', { type: 'test' });
}

export interface ParameterizedTestOptions {
  /**
   * Parameter names, in order. Needed for `@DisableIfParameter({ name })`,
   * since names are not available at run time.
   */
  parameters?: readonly string[];
}

/**
 * Marks a method as a parameterized test, run once per row of its argument source.
 *
 * @example
 * ```typescript
 * @ParameterizedTest({ parameters: ['city', 'zip'] })
 * @MethodSource(() => [['Lyon', '69001'], ['Graz', '8010']])
 * @DisableIfParameter({ name: 'zip', matches: '8\\d+' })
 * knowsCity(city: string, zip: string) {}
 * ```
 */
export function ParameterizedTest(options: ParameterizedTestOptions = {}): MethodDecorator {
  return declare('ParameterizedTest', { type: 'parameterized', parameterNames: options.parameters });
}

/**
 * Old-style test with an expected error class and a time limit.
 *
 * @example
 * ```typescript
 * @VintageTest({ expected: RangeError })
 * rejectsNegative() { new Array(-1); }
 * ```
 */
export function VintageTest(options: VintageOptions = {}): MethodDecorator {
  return declare('VintageTest', { type: 'vintage', options });
}

/**
 * Declares a class as nested in `enclosing`, so it inherits the enclosing
 * class's annotations and runs inside its container.
 *
 * A thunk is used because the enclosing class is usually not initialised yet
 * when the nested class is decorated.
 */
export function Nested(enclosing: () => Constructor): ClassDecorator {
  return (target) => {
    AnnotationRegistry.declareEnclosing(decoratedClass('Nested', target), enclosing);
  };
}
