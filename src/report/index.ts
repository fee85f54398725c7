export { ConsoleReporter, default } from './console-reporter.js';
export type { ConsoleReporterOptions } from './console-reporter.js';
