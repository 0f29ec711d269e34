export type { ScopeDecorator } from './annotate.js';
export { DisableIfAllParameters, DisableIfAnyParameter, DisableIfParameter } from './disable-if.js';
export {
  ClearEnvironmentVariable,
  ClearEnvironmentVariables,
  SetEnvironmentVariable,
  SetEnvironmentVariables,
} from './environment.js';
export { ReportEntry } from './report-entry.js';
export { MethodSource, RangeSource, ValueSource } from './sources.js';
export { Nested, ParameterizedTest, Test, VintageTest } from './test.js';
export type { ParameterizedTestOptions } from './test.js';
