/**
 * JUnit XML report
 */

import type { Result } from '../../shared/result.js';
import { failure, success } from '../../shared/result.js';
import type { DomainError } from '../../shared/errors.js';
import { createDomainError } from '../../shared/errors.js';
import type { Execution, PackageResult, TestCase } from '../event-scanning/execution.js';

/**
 * File writer interface
 */
export interface FileWriter {
  write(path: string, content: string): Promise<Result<void, Error>>;
}

/**
 * Write the JUnit report of an execution; an empty path writes nothing
 */
export const writeJunitFile = async (
  path: string,
  execution: Execution,
  writer: FileWriter,
): Promise<Result<void, DomainError>> => {
  if (path === '') {
    return success(undefined);
  }

  const written = await writer.write(path, generateJunitXml(execution));
  if (!written.ok) {
    return failure(createDomainError({
      domain: 'reporting',
      kind: 'JunitWriteFailed',
      message: `failed to write JUnit XML file ${path}: ${written.error.message}`,
      path,
      cause: written.error,
    }));
  }
  return success(undefined);
};

/**
 * One testsuite per package; failed, then skipped, then passed test cases
 */
export const generateJunitXml = (execution: Execution): string => {
  const packages = execution.packageNames().flatMap((name) => {
    const pkg = execution.package(name);
    return pkg ? [pkg] : [];
  });

  let xml = '<?xml version="1.0" encoding="UTF-8"?>\n';
  xml += `<testsuites tests="${execution.total()}" `;
  xml += `failures="${execution.failed().length}" `;
  xml += `time="${(execution.elapsed() / 1000).toFixed(3)}">\n`;

  for (const pkg of packages) {
    xml += generateTestSuite(execution, pkg);
  }

  xml += '</testsuites>\n';
  return xml;
};

const generateTestSuite = (execution: Execution, pkg: PackageResult): string => {
  let xml = `  <testsuite name="${escapeXml(pkg.name)}" `;
  xml += `tests="${pkg.total}" `;
  xml += `failures="${pkg.failed.length}" `;
  xml += `skipped="${pkg.skipped.length}" `;
  xml += `time="${pkg.elapsed.toFixed(3)}">\n`;

  for (const testCase of pkg.failed) {
    const output = execution.output(testCase.package, testCase.test);
    xml += openTestCase(testCase) + '>\n';
    xml += `      <failure message="Failed" type="">${escapeXml(output)}</failure>\n`;
    xml += '    </testcase>\n';
  }

  for (const testCase of pkg.skipped) {
    const output = execution.output(testCase.package, testCase.test);
    xml += openTestCase(testCase) + '>\n';
    xml += `      <skipped message="${escapeXml(output)}"/>\n`;
    xml += '    </testcase>\n';
  }

  for (const testCase of pkg.passed) {
    xml += openTestCase(testCase) + '/>\n';
  }

  xml += '  </testsuite>\n';
  return xml;
};

const openTestCase = (testCase: TestCase): string =>
  `    <testcase classname="${escapeXml(testCase.package)}" ` +
  `name="${escapeXml(testCase.test)}" time="${testCase.elapsed.toFixed(3)}"`;

export const escapeXml = (str: string): string =>
  str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
