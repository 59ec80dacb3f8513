/**
 * Event Scanning Domain
 * Exports all public interfaces and implementations
 */

export type { EventHandler, ScanConfig, TestEvent } from './types.js';
export { Action, isPackageEvent, testEventSchema } from './types.js';

export type { TestCase } from './execution.js';
export { Execution, isCoverageOutput, PackageResult } from './execution.js';

export { decodeTestEvent, scanTestOutput } from './scanner.js';
export { splitLines } from './line-splitter.js';
