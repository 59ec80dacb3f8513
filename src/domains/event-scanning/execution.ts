/**
 * Execution aggregate
 * Accumulates the events of one run, grouped by package
 */

import type { TestEvent } from './types.js';
import { Action, isPackageEvent } from './types.js';

/**
 * A single finished test
 */
export interface TestCase {
  readonly package: string;
  readonly test: string;
  /** Seconds */
  readonly elapsed: number;
}

/**
 * True for the `coverage: NN% of statements` line go test prints per package
 */
export const isCoverageOutput = (output: string): boolean =>
  output.startsWith('coverage:') && output.includes('% of statements');

/**
 * Results of one package
 */
export class PackageResult {
  private totalCount = 0;
  private readonly passedCases: TestCase[] = [];
  private readonly failedCases: TestCase[] = [];
  private readonly skippedCases: TestCase[] = [];
  private readonly outputByTest = new Map<string, string[]>();
  private packageAction: string | undefined;
  private packageElapsed = 0;
  private coverageLine = '';

  constructor(readonly name: string) {}

  get total(): number {
    return this.totalCount;
  }

  get passed(): readonly TestCase[] {
    return this.passedCases;
  }

  get failed(): readonly TestCase[] {
    return this.failedCases;
  }

  get skipped(): readonly TestCase[] {
    return this.skippedCases;
  }

  /** Final package action (pass, fail or skip), undefined while running */
  get action(): string | undefined {
    return this.packageAction;
  }

  /** Seconds */
  get elapsed(): number {
    return this.packageElapsed;
  }

  /** e.g. `coverage: 81.2% of statements`, empty when not reported */
  get coverage(): string {
    return this.coverageLine;
  }

  add(event: TestEvent): void {
    if (isPackageEvent(event)) {
      this.addPackageEvent(event);
      return;
    }

    switch (event.action) {
      case Action.Run:
        this.totalCount++;
        break;
      case Action.Output:
        this.appendOutput(event.test, event.output);
        break;
      case Action.Pass:
        this.passedCases.push(toTestCase(event));
        // output of passing tests is never reported
        this.outputByTest.delete(event.test);
        break;
      case Action.Fail:
        this.failedCases.push(toTestCase(event));
        break;
      case Action.Skip:
        this.skippedCases.push(toTestCase(event));
        break;
    }
  }

  /**
   * Output lines of a test; the empty test name selects package output
   */
  outputLines(test: string): readonly string[] {
    return this.outputByTest.get(test) ?? [];
  }

  private addPackageEvent(event: TestEvent): void {
    switch (event.action) {
      case Action.Pass:
      case Action.Fail:
      case Action.Skip:
        this.packageAction = event.action;
        this.packageElapsed = event.elapsed;
        break;
      case Action.Output:
        if (isCoverageOutput(event.output)) {
          this.coverageLine = event.output.trim();
        }
        this.appendOutput('', event.output);
        break;
    }
  }

  private appendOutput(test: string, output: string): void {
    const lines = this.outputByTest.get(test);
    if (lines) {
      lines.push(output);
    } else {
      this.outputByTest.set(test, [output]);
    }
  }
}

/**
 * Aggregate of all events of a run
 */
export class Execution {
  private readonly packages = new Map<string, PackageResult>();
  private readonly errorLines: string[] = [];
  private readonly started: number;

  constructor(private readonly clock: () => number = Date.now) {
    this.started = clock();
  }

  add(event: TestEvent): void {
    let pkg = this.packages.get(event.package);
    if (!pkg) {
      pkg = new PackageResult(event.package);
      this.packages.set(event.package, pkg);
    }
    pkg.add(event);
  }

  addError(line: string): void {
    this.errorLines.push(line);
  }

  package(name: string): PackageResult | undefined {
    return this.packages.get(name);
  }

  /**
   * Package names in sorted order
   */
  packageNames(): string[] {
    return [...this.packages.keys()].sort();
  }

  total(): number {
    return this.sortedPackages().reduce((sum, pkg) => sum + pkg.total, 0);
  }

  failed(): TestCase[] {
    return this.sortedPackages().flatMap((pkg) => [...pkg.failed]);
  }

  skipped(): TestCase[] {
    return this.sortedPackages().flatMap((pkg) => [...pkg.skipped]);
  }

  /**
   * Lines the test command wrote to stderr
   */
  errors(): readonly string[] {
    return this.errorLines;
  }

  /**
   * Milliseconds since the execution started
   */
  elapsed(): number {
    return this.clock() - this.started;
  }

  outputLines(packageName: string, test: string): readonly string[] {
    return this.packages.get(packageName)?.outputLines(test) ?? [];
  }

  output(packageName: string, test: string): string {
    return this.outputLines(packageName, test).join('');
  }

  private sortedPackages(): PackageResult[] {
    return this.packageNames().flatMap((name) => {
      const pkg = this.packages.get(name);
      return pkg ? [pkg] : [];
    });
  }
}

const toTestCase = (event: TestEvent): TestCase => ({
  package: event.package,
  test: event.test,
  elapsed: event.elapsed,
});
