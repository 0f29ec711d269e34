import { beforeEach, describe, expect, it } from 'vitest';

import {
  ClearEnvironmentVariable,
  ClearEnvironmentVariables,
  Nested,
  ParameterizedTest,
  ReportEntry,
  SetEnvironmentVariable,
  SetEnvironmentVariables,
  Test,
  VintageTest,
} from '../src/decorators/index.js';
import { classChain, contextForClass, contextForMethod } from '../src/engine/context-builder.js';
import { ClearEnvironmentVariableKind, SetEnvironmentVariableKind } from '../src/extensions/environment.js';
import { ReportEntryKind } from '../src/extensions/report-entry.js';
import { AnnotationRegistry } from '../src/registry/annotation-registry.js';

describe('decorators', () => {
  beforeEach(() => {
    AnnotationRegistry.resetForTests();
  });

  it('records method annotations in source order', () => {
    class Ordered {
      @Test()
      @SetEnvironmentVariable('A', '1')
      @SetEnvironmentVariables([
        { key: 'B', value: '2' },
        { key: 'C', value: '3' },
      ])
      @SetEnvironmentVariable('D', '4')
      run() {}
    }

    const source = AnnotationRegistry.sourceForMethod(Ordered, 'run');

    expect(source.instancesOf(SetEnvironmentVariableKind).map((a) => a.key)).toEqual(['A', 'B', 'C', 'D']);
    expect(source.instancesOf(ClearEnvironmentVariableKind)).toEqual([]);
  });

  it('records class annotations separately from method annotations', () => {
    @ClearEnvironmentVariable('TOKEN')
    @ClearEnvironmentVariables(['USER', 'HOME'])
    class Cleared {
      @Test()
      @ClearEnvironmentVariable('LANG')
      run() {}
    }

    expect(AnnotationRegistry.sourceForClass(Cleared).instancesOf(ClearEnvironmentVariableKind)).toEqual([
      { key: 'TOKEN' },
      { key: 'USER' },
      { key: 'HOME' },
    ]);
    expect(AnnotationRegistry.sourceForMethod(Cleared, 'run').instancesOf(ClearEnvironmentVariableKind)).toEqual([
      { key: 'LANG' },
    ]);
  });

  it('lists only declared tests, in declaration order', () => {
    class Mixed {
      @ParameterizedTest({ parameters: ['word'] })
      second(_word: string) {}

      @ReportEntry('helper only')
      helper() {}

      @VintageTest({ timeout: 50 })
      third() {}

      @Test()
      first() {}
    }

    expect(AnnotationRegistry.testMethods(Mixed)).toEqual([
      { name: 'second', declaration: { type: 'parameterized', parameterNames: ['word'] } },
      { name: 'third', declaration: { type: 'vintage', options: { timeout: 50 } } },
      { name: 'first', declaration: { type: 'test' } },
    ]);
    expect(AnnotationRegistry.sourceForMethod(Mixed, 'helper').instancesOf(ReportEntryKind)).toEqual([
      { value: 'helper only' },
    ]);
  });

  it('rejects two test decorators on one method', () => {
    expect(() => {
      class Twice {
        @Test()
        @ParameterizedTest()
        run() {}
      }
      return Twice;
    }).toThrow('Twice#run is already declared as a parameterized test; use a single test decorator.');
  });

  it('rejects static members', () => {
    expect(() => {
      class WithStatic {
        @SetEnvironmentVariable('A', '1')
        static helper() {}
      }
      return WithStatic;
    }).toThrow("@SetEnvironmentVariable cannot decorate static member 'helper'.");
  });

  it('rejects static test methods and method-only annotations', () => {
    expect(() => {
      class StaticTest {
        @Test()
        static run() {}
      }
      return StaticTest;
    }).toThrow("@Test cannot decorate static member 'run'.");

    expect(() => {
      class StaticEntry {
        @ReportEntry('note')
        static describe() {}
      }
      return StaticEntry;
    }).toThrow("@ReportEntry cannot decorate static member 'describe'.");
  });

  it('inherits class annotations unless the subclass declares the same kind', () => {
    @ClearEnvironmentVariable('BASE_ONLY')
    class BaseSuite {}

    @ClearEnvironmentVariable('SUB_ONLY')
    class Redeclaring extends BaseSuite {}

    class Plain extends BaseSuite {}

    expect(AnnotationRegistry.sourceForClass(Redeclaring).instancesOf(ClearEnvironmentVariableKind)).toEqual([
      { key: 'SUB_ONLY' },
    ]);
    expect(AnnotationRegistry.sourceForClass(Plain).instancesOf(ClearEnvironmentVariableKind)).toEqual([
      { key: 'BASE_ONLY' },
    ]);
  });

  it('inherits test methods and their annotations', () => {
    class BaseSuite {
      @Test()
      @ReportEntry('base')
      run() {}

      @Test()
      check() {}
    }

    class Derived extends BaseSuite {
      @ReportEntry('derived')
      run() {}

      @ParameterizedTest()
      extra(_n: number) {}
    }

    expect(AnnotationRegistry.testMethods(Derived)).toEqual([
      { name: 'run', declaration: { type: 'test' } },
      { name: 'check', declaration: { type: 'test' } },
      { name: 'extra', declaration: { type: 'parameterized', parameterNames: undefined } },
    ]);
    expect(AnnotationRegistry.sourceForMethod(Derived, 'run').instancesOf(ReportEntryKind)).toEqual([
      { value: 'derived' },
    ]);
    expect(AnnotationRegistry.sourceForMethod(Derived, 'check').instancesOf(ReportEntryKind)).toEqual([]);
    expect(AnnotationRegistry.testMethods(BaseSuite).map((m) => m.name)).toEqual(['run', 'check']);
  });

  it('forgets every class on reset', () => {
    class Forgotten {
      @Test()
      run() {}
    }
    expect(AnnotationRegistry.has(Forgotten)).toBe(true);

    AnnotationRegistry.reset();

    expect(AnnotationRegistry.has(Forgotten)).toBe(false);
    expect(AnnotationRegistry.testMethods(Forgotten)).toEqual([]);
  });
});

describe('context builder', () => {
  beforeEach(() => {
    AnnotationRegistry.resetForTests();
  });

  it('chains nested classes outermost first', () => {
    @SetEnvironmentVariable('LEVEL', 'outer')
    class Outer {}

    @Nested(() => Outer)
    class Middle {}

    @Nested(() => Middle)
    @SetEnvironmentVariable('LEVEL', 'inner')
    class Inner {
      @Test()
      run() {}
    }

    expect(classChain(Inner)).toEqual([Outer, Middle, Inner]);
    expect(AnnotationRegistry.nestedIn(Outer)).toEqual([Middle]);
    expect(AnnotationRegistry.nestedIn(Middle)).toEqual([Inner]);

    const context = contextForClass(Inner);
    expect(context.name).toBe('Inner');
    expect(context.parent?.name).toBe('Middle');
    expect(context.parent?.parent?.name).toBe('Outer');
    expect(context.parent?.parent?.parent).toBeUndefined();
  });

  it('rejects circular nesting', () => {
    @Nested(() => Second)
    class First {}

    @Nested(() => First)
    class Second {}

    expect(() => classChain(First)).toThrow('Circular @Nested declaration: First → Second → First');
  });

  it('gives method scopes their signature', () => {
    class Signed {
      @ParameterizedTest({ parameters: ['city', 'zip'] })
      lookup(_city: string, _zip: string) {}
    }

    const [method] = AnnotationRegistry.testMethods(Signed);
    const context = contextForMethod(Signed, method);

    expect(context.name).toBe('Signed#lookup');
    expect(context.type).toBe('method');
    expect(context.signature).toEqual({ parameterCount: 2, parameterNames: ['city', 'zip'] });
    expect(context.parent?.name).toBe('Signed');
  });
});
