import { beforeEach, describe, expect, it } from 'vitest';

import { InMemoryKeyValueStore } from '../src/core/external-store.js';
import { LifecycleBinder } from '../src/core/lifecycle-binder.js';
import { createResolutionContext, type DeclaredAnnotation } from '../src/core/resolution-context.js';
import { ConfigurationError, ResolutionError } from '../src/errors/errors.js';
import {
  DisableIfAllParametersKind,
  DisableIfAnyParameterKind,
  DisableIfParameterKind,
  describeMatch,
  type DisableIfParameterAttributes,
} from '../src/extensions/disable-if-parameter.js';

type Content = { contains?: string | string[]; matches?: string | string[] };

const single = (attributes: DisableIfParameterAttributes): DeclaredAnnotation => ({
  kind: DisableIfParameterKind,
  attributes,
});
const anyOf = (attributes: Content): DeclaredAnnotation => ({ kind: DisableIfAnyParameterKind, attributes });
const allOf = (attributes: Content): DeclaredAnnotation => ({ kind: DisableIfAllParametersKind, attributes });

function invocation(
  annotations: DeclaredAnnotation[],
  parameterCount: number,
  options: { names?: string[]; cls?: DeclaredAnnotation[] } = {}
) {
  return createResolutionContext([
    {
      name: 'Poems#recite',
      type: 'method',
      annotations,
      signature: { parameterCount, parameterNames: options.names },
    },
    { name: 'Poems', annotations: options.cls ?? [] },
  ]);
}

describe('argument filters', () => {
  let binder: LifecycleBinder;

  beforeEach(() => {
    binder = new LifecycleBinder({ config: { environment: new InMemoryKeyValueStore() } });
  });

  describe('@DisableIfAnyParameter', () => {
    const context = invocation([anyOf({ contains: 'She' })], 2);

    it('continues when no argument contains the value (case-sensitive)', () => {
      const decision = binder.filterInvocation(context, ['Tread lightly, she is near', 'Under the snow,']);
      expect(decision).toEqual({ action: 'continue' });
    });

    it('aborts when one argument contains the value', () => {
      const decision = binder.filterInvocation(context, ['She that was young and fair', 'Fallen to dust.']);
      expect(decision).toEqual({
        action: 'abort',
        reason: "Invocation disabled by @DisableIfAnyParameter: argument [0] 'She that was young and fair' contains 'She'.",
      });
    });

    it('accepts several values', () => {
      const several = invocation([anyOf({ contains: ['snow', 'dust'] })], 2);
      const decision = binder.filterInvocation(several, ['Under the sky', 'Fallen to dust.']);
      expect(decision).toEqual({
        action: 'abort',
        reason: "Invocation disabled by @DisableIfAnyParameter: argument [1] 'Fallen to dust.' contains 'dust'.",
      });
    });

    it('compares non-string arguments by their string form', () => {
      const numeric = invocation([anyOf({ contains: '4' })], 1);
      expect(binder.filterInvocation(numeric, [42]).action).toBe('abort');
      expect(binder.filterInvocation(numeric, [17]).action).toBe('continue');
    });
  });

  describe('@DisableIfAllParameters', () => {
    const context = invocation([allOf({ contains: 'e' })], 2);

    it('aborts only when every argument matches', () => {
      expect(binder.filterInvocation(context, ['one', 'three'])).toEqual({
        action: 'abort',
        reason: 'Invocation disabled by @DisableIfAllParameters: every argument matched.',
      });
      expect(binder.filterInvocation(context, ['one', 'two'])).toEqual({ action: 'continue' });
    });

    it('continues for an empty argument row', () => {
      expect(binder.filterInvocation(context, [])).toEqual({ action: 'continue' });
    });
  });

  describe('@DisableIfParameter', () => {
    it('targets the first argument by default', () => {
      const context = invocation([single({ contains: 'fair' })], 2);

      expect(binder.filterInvocation(context, ['young and fair', 'fallen'])).toEqual({
        action: 'abort',
        reason: "Invocation disabled by @DisableIfParameter: argument [0] 'young and fair' contains 'fair'.",
      });
      expect(binder.filterInvocation(context, ['fallen', 'young and fair'])).toEqual({ action: 'continue' });
    });

    it('targets an explicit index', () => {
      const context = invocation([single({ index: 1, contains: 'dust' })], 2);
      expect(binder.filterInvocation(context, ['dust', 'snow']).action).toBe('continue');
      expect(binder.filterInvocation(context, ['snow', 'dust']).action).toBe('abort');
    });

    it('targets a parameter by name', () => {
      const context = invocation([single({ name: 'author', matches: 'Anon.*' })], 2, {
        names: ['line', 'author'],
      });

      expect(binder.filterInvocation(context, ['Under the snow', 'Anonymous'])).toEqual({
        action: 'abort',
        reason: "Invocation disabled by @DisableIfParameter: argument 'author' 'Anonymous' matches 'Anon.*'.",
      });
    });

    it('requires a pattern to match the whole argument', () => {
      const context = invocation([single({ matches: 'fair' })], 1);
      expect(binder.filterInvocation(context, ['young and fair']).action).toBe('continue');
      expect(binder.filterInvocation(context, ['fair']).action).toBe('abort');
    });

    it('supports back-references in patterns', () => {
      const context = invocation([single({ matches: '.*(Peace, )\\1.*' })], 1);
      expect(binder.filterInvocation(context, ['Peace, Peace, be still']).action).toBe('abort');
      expect(binder.filterInvocation(context, ['Peace, be still']).action).toBe('continue');
    });

    it('stops at the first matching directive', () => {
      const context = invocation([single({ index: 0, contains: 'a' }), single({ index: 1, contains: 'b' })], 2);
      const decision = binder.filterInvocation(context, ['a', 'b']);
      expect(decision.action === 'abort' && decision.reason).toBe(
        "Invocation disabled by @DisableIfParameter: argument [0] 'a' contains 'a'."
      );
    });

    it('fails for an index beyond the actual arguments', () => {
      const context = invocation([single({ index: 1, contains: 'her' })], 1);
      expect(() => binder.filterInvocation(context, ['Tread lightly'])).toThrow(ConfigurationError);
      expect(() => binder.filterInvocation(context, ['Tread lightly'])).toThrow(
        'Annotation has invalid index [1] but only 1 argument(s) were provided.'
      );
    });

    it('fails for an unknown parameter name', () => {
      const context = invocation([single({ name: 'title', contains: 'x' })], 2, { names: ['line', 'author'] });
      expect(() => binder.filterInvocation(context, ['a', 'b'])).toThrow(ResolutionError);
      expect(() => binder.filterInvocation(context, ['a', 'b'])).toThrow("Could not resolve parameter named 'title'.");
    });
  });

  it('accumulates filters from enclosing classes', () => {
    const context = invocation([single({ contains: 'zzz' })], 1, { cls: [anyOf({ contains: 'x' })] });
    expect(binder.filterInvocation(context, ['x'])).toEqual({
      action: 'abort',
      reason: "Invocation disabled by @DisableIfAnyParameter: argument [0] 'x' contains 'x'.",
    });
  });

  it('continues when no filter is declared', () => {
    expect(binder.filterInvocation(invocation([], 1), ['anything'])).toEqual({ action: 'continue' });
  });

  describe('configuration errors', () => {
    it('rejects a filter on a test without parameters', () => {
      const context = invocation([anyOf({ contains: 'x' })], 0);
      expect(() => binder.filterInvocation(context, ['x'])).toThrow(
        "Can't disable based on arguments, because method Poems#recite had no parameters."
      );
    });

    it('requires exactly one of contains and matches', () => {
      const neither = invocation([anyOf({})], 1);
      const both = invocation([allOf({ contains: 'a', matches: 'b' })], 1);

      expect(() => binder.filterInvocation(neither, ['x'])).toThrow(
        'DisableIfAnyParameter requires that either `contains` or `matches` is set.'
      );
      expect(() => binder.filterInvocation(both, ['x'])).toThrow(
        'DisableIfAllParameters requires that either `contains` or `matches` is set.'
      );
    });

    it('rejects name and index together', () => {
      const context = invocation([single({ index: 0, name: 'line', contains: 'x' })], 1, { names: ['line'] });
      expect(() => binder.filterInvocation(context, ['x'])).toThrow(
        'Using both name and index parameter targeting in a single @DisableIfParameter is not permitted.'
      );
    });

    it('rejects a negative index', () => {
      const context = invocation([single({ index: -1, contains: 'x' })], 1);
      expect(() => binder.filterInvocation(context, ['x'])).toThrow('Annotation has invalid index [-1].');
    });

    it('rejects an invalid pattern', () => {
      const context = invocation([single({ matches: '(' })], 1);
      expect(() => binder.filterInvocation(context, ['x'])).toThrow("Invalid pattern '('");
    });

    it('rejects an unknown attribute', () => {
      const context = invocation([{ kind: DisableIfAnyParameterKind, attributes: { index: 0, contains: 'x' } }], 1);
      expect(() => binder.filterInvocation(context, ['x'])).toThrow(ConfigurationError);
    });
  });

  describe('describeMatch', () => {
    it('names the value or pattern that matched', () => {
      expect(describeMatch({ type: 'contains', values: ['a', 'b'] }, 'cab')).toBe("contains 'a'");
      expect(describeMatch({ type: 'contains', values: ['z'] }, 'cab')).toBeUndefined();
      expect(describeMatch({ type: 'matches', sources: ['c.b'], patterns: [/^(?:c.b)$/] }, 'cab')).toBe(
        "matches 'c.b'"
      );
    });
  });
});
