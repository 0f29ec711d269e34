const IS_PROD = typeof process !== 'undefined' && process.env?.NODE_ENV === 'production';

const join = (lines: string[]): string => lines.join('\n');
const format = (prod: string, devLines: string[]): string => (IS_PROD ? prod : join(devLines));

/**
 * An annotation's own attributes are invalid: mutually exclusive options both set,
 * a required option missing, an index out of range, or a zero-parameter test targeted.
 *
 * Always raised before any external state is mutated.
 */
export class ConfigurationError extends Error {
  constructor(
    public annotation: string,
    public reason: string
  ) {
    const dev = [
      `Invalid @${annotation} configuration`,
      '',
      reason,
      '',
      'Fix the annotation attributes; they are never defaulted silently.',
    ];
    super(format(reason, dev));
    this.name = 'ConfigurationError';
  }
}

/**
 * Two directives of one resolution target the same external key.
 */
export class ConflictError extends Error {
  constructor(
    public domain: string,
    public key: string,
    public annotations: string[]
  ) {
    const dev = [
      'Conflicting state directives',
      '',
      `Key '${key}' in domain '${domain}' is targeted more than once within one test unit.`,
      ...(annotations.length > 0
        ? ['', 'Declared by:', ...annotations.map((a) => `  - ${a}`)]
        : []),
      '',
      'To fix this:',
      `  1. Keep a single @Set/@Clear annotation for '${key}' per scope`,
      `  2. Move the override to a nested scope (method or nested class)`,
    ];
    super(format(`Key '${key}' in domain '${domain}' is targeted more than once.`, dev));
    this.name = 'ConflictError';
  }
}

/**
 * A parameter targeted by name does not exist in the test's signature.
 */
export class ResolutionError extends Error {
  constructor(
    public parameter: string,
    public available: string[]
  ) {
    const parts: string[] = [`Could not resolve parameter named '${parameter}'.`, ''];

    if (available.length > 0) {
      parts.push('Declared parameters:');
      available.forEach((p) => parts.push(`  - ${p}`));
    } else {
      parts.push('The test declares no parameter names.');
      parts.push("Pass them with @ParameterizedTest({ parameters: ['a', 'b'] }).");
    }

    super(format(`Could not resolve parameter named '${parameter}'.`, parts));
    this.name = 'ResolutionError';
  }
}

/**
 * One or more saved entries could not be restored.
 *
 * Restoration is best-effort across entries: every entry is attempted before this
 * error is raised, and each individual failure is kept in `errors`.
 */
export class RestorationError extends Error {
  constructor(public errors: Error[]) {
    const errorList = errors.map((e, i) => `  ${i + 1}. ${e.message}`).join('\n');
    const dev = [
      'Restoration failed',
      '',
      `${errors.length} error(s) occurred while restoring external state:`,
      errorList,
      '',
      'Check the `errors` property for detailed information about each failure.',
    ];

    super(format(`${errors.length} restoration error(s) occurred.`, dev));
    this.name = 'RestorationError';
  }
}

/**
 * A mutation of a state domain was requested while another mutation of the same
 * domain was still in progress.
 */
export class DomainLockedError extends Error {
  constructor(public domain: string) {
    const dev = [
      `State domain '${domain}' is locked`,
      '',
      'A mutation of this domain re-entered the store while another one was running.',
      'Backing stores must not call back into the scoped state store.',
    ];
    super(format(`State domain '${domain}' is locked.`, dev));
    this.name = 'DomainLockedError';
  }
}

/**
 * Signals that a test unit was aborted (skipped at run time), not failed.
 */
export class TestAbortedError extends Error {
  constructor(public reason: string) {
    super(reason);
    this.name = 'TestAbortedError';
  }
}

export class ExpectedErrorNotThrownError extends Error {
  constructor(public expected: string) {
    super(`Expected exception ${expected} was not thrown.`);
    this.name = 'ExpectedErrorNotThrownError';
  }
}

export class TestTimeoutExceededError extends Error {
  constructor(
    public testName: string,
    public timeout: number,
    public elapsed: number
  ) {
    super(
      `Test ${testName} was supposed to run no longer than ${timeout} ms but ran ${elapsed} ms.`
    );
    this.name = 'TestTimeoutExceededError';
  }
}

/**
 * The configuration passed to the binder or the engine is malformed.
 */
export class InvalidConfigError extends Error {
  constructor(public reason: string) {
    const dev = [
      'Invalid pinion configuration',
      '',
      reason,
      '',
      "Valid policies are 'stop-at-first' and 'accumulate'.",
    ];
    super(format(reason, dev));
    this.name = 'InvalidConfigError';
  }
}
