import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import { annotationKind, type AnnotationKind } from '../src/core/annotation-kind.js';
import { AnnotationLocator } from '../src/core/annotation-locator.js';
import {
  createResolutionContext,
  type DeclaredAnnotation,
  type ScopeInit,
} from '../src/core/resolution-context.js';
import { ConfigurationError } from '../src/errors/errors.js';
import { DirectiveKind, ResolutionPolicy, type AnnotationFamily } from '../src/types/types.js';

const TagKind = annotationKind<{ tag: string }>('Tag', { repeatable: true });
const MarkKind = annotationKind<{ tag: string }>('Mark', { repeatable: true });
const SoloKind = annotationKind<{ tag: string }>('Solo');

type TagFamily = AnnotationFamily<typeof DirectiveKind.PublishReportEntry, string>;

function familyOf(kind: AnnotationKind, policy: ResolutionPolicy, name = 'tags'): TagFamily {
  return {
    family: name,
    annotation: kind,
    directive: DirectiveKind.PublishReportEntry,
    policy,
    translate: (attributes) => String(attributes.tag),
  };
}

const stopAtFirst = familyOf(TagKind, ResolutionPolicy.StopAtFirst);
const accumulate = familyOf(TagKind, ResolutionPolicy.Accumulate);

const tag = (value: string, kind: AnnotationKind = TagKind): DeclaredAnnotation => ({
  kind,
  attributes: { tag: value },
});

/** Levels are given innermost first. */
function contextOf(levels: readonly (readonly DeclaredAnnotation[])[]) {
  return createResolutionContext(
    levels.map(
      (annotations, i): ScopeInit => ({
        name: `scope${i}`,
        type: i === 0 ? 'method' : 'class',
        annotations,
      })
    )
  );
}

const tagsContext = (levels: readonly (readonly string[])[]) =>
  contextOf(levels.map((tags) => tags.map((t) => tag(t))));

describe('AnnotationLocator', () => {
  const locator = new AnnotationLocator();

  it('stops at the first scope carrying the annotation', () => {
    const directives = locator.locate(tagsContext([[], ['a', 'b'], ['z']]), stopAtFirst);

    expect(directives.map((d) => d.payload)).toEqual(['a', 'b']);
    expect(directives.map((d) => d.scopeLevel)).toEqual([1, 1]);
    expect(directives.map((d) => d.scopeName)).toEqual(['scope1', 'scope1']);
  });

  it('prefers the innermost scope under StopAtFirst', () => {
    const directives = locator.locate(tagsContext([['x'], ['a']]), stopAtFirst);
    expect(directives.map((d) => d.payload)).toEqual(['x']);
  });

  it('collects every scope innermost first under Accumulate', () => {
    const directives = locator.locate(tagsContext([['x'], [], ['a', 'b']]), accumulate);

    expect(directives.map((d) => d.payload)).toEqual(['x', 'a', 'b']);
    expect(directives.map((d) => d.scopeLevel)).toEqual([0, 2, 2]);
  });

  it('returns an empty list when no scope carries the annotation', () => {
    expect(locator.locate(tagsContext([[], []]), stopAtFirst)).toEqual([]);
    expect(locator.locate(tagsContext([[], []]), accumulate)).toEqual([]);
  });

  it('honours an explicit policy argument over the family default', () => {
    const directives = locator.locate(tagsContext([['x'], ['a']]), stopAtFirst, ResolutionPolicy.Accumulate);
    expect(directives.map((d) => d.payload)).toEqual(['x', 'a']);
  });

  it('flattens container annotations into the scope sequence', () => {
    const context = contextOf([[{ kind: TagKind, repeated: [{ tag: 'a' }, { tag: 'b' }] }, tag('c')]]);
    expect(locator.locate(context, stopAtFirst).map((d) => d.payload)).toEqual(['a', 'b', 'c']);
  });

  it('produces frozen directives tagged with their annotation', () => {
    const [directive] = locator.locate(tagsContext([['a']]), stopAtFirst);

    expect(Object.isFrozen(directive)).toBe(true);
    expect(directive.annotation).toBe('Tag');
    expect(directive.kind).toBe(DirectiveKind.PublishReportEntry);
  });

  it('rejects a non-repeatable annotation declared twice on one scope', () => {
    const solo = familyOf(SoloKind, ResolutionPolicy.StopAtFirst);
    const context = contextOf([[tag('a', SoloKind), tag('b', SoloKind)]]);

    expect(() => locator.locate(context, solo)).toThrow(ConfigurationError);
    expect(() => locator.locate(context, solo)).toThrow('@Solo is not repeatable but is declared 2 times on scope0.');
  });

  it('propagates translator failures before returning', () => {
    const failing: TagFamily = {
      ...stopAtFirst,
      translate: () => {
        throw new ConfigurationError('Tag', 'tag is malformed');
      },
    };
    expect(() => locator.locate(tagsContext([['a']]), failing)).toThrow('tag is malformed');
  });

  describe('policy overrides', () => {
    it('uses the family default without configuration', () => {
      expect(locator.policyFor(stopAtFirst)).toBe(ResolutionPolicy.StopAtFirst);
      expect(locator.policyFor(accumulate)).toBe(ResolutionPolicy.Accumulate);
    });

    it('prefers a per-family override over the global default', () => {
      const configured = new AnnotationLocator({
        policies: { tags: ResolutionPolicy.Accumulate },
        defaultPolicy: ResolutionPolicy.StopAtFirst,
      });
      const other = familyOf(TagKind, ResolutionPolicy.Accumulate, 'other');

      expect(configured.policyFor(stopAtFirst)).toBe(ResolutionPolicy.Accumulate);
      expect(configured.policyFor(other)).toBe(ResolutionPolicy.StopAtFirst);
    });
  });

  describe('locateAll', () => {
    const marks = familyOf(MarkKind, ResolutionPolicy.StopAtFirst);

    it('stops at the first scope carrying any kind of the group', () => {
      const context = contextOf([[tag('m', MarkKind)], [tag('a')]]);
      const directives = locator.locateAll(context, [stopAtFirst, marks]);

      expect(directives.map((d) => `${d.annotation}:${d.payload}`)).toEqual(['Mark:m']);
    });

    it('orders a scope by family, then by declaration', () => {
      const context = contextOf([[tag('m1', MarkKind), tag('t1'), tag('m2', MarkKind)]]);
      const directives = locator.locateAll(context, [stopAtFirst, marks]);

      expect(directives.map((d) => d.payload)).toEqual(['t1', 'm1', 'm2']);
    });
  });

  describe('properties', () => {
    const levels = fc.array(fc.array(fc.string({ maxLength: 6 }), { maxLength: 4 }), {
      minLength: 1,
      maxLength: 6,
    });

    it('Accumulate yields every instance of every scope, innermost first', () => {
      fc.assert(
        fc.property(levels, (tags) => {
          const payloads = locator.locate(tagsContext(tags), accumulate).map((d) => d.payload);
          expect(payloads).toEqual(tags.flat());
        })
      );
    });

    it('StopAtFirst yields exactly the first non-empty scope', () => {
      fc.assert(
        fc.property(levels, (tags) => {
          const directives = locator.locate(tagsContext(tags), stopAtFirst);
          const first = tags.findIndex((t) => t.length > 0);

          expect(directives.map((d) => d.payload)).toEqual(first === -1 ? [] : tags[first]);
          expect(directives.every((d) => d.scopeLevel === first)).toBe(true);
        })
      );
    });
  });
});
