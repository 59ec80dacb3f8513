/**
 * The current version of go-test-sum, kept in step with package.json.
 * @module
 */
export const VERSION = '0.1.0';

/**
 * Returns version information object.
 */
export function getVersionInfo(): {
  version: string;
  name: string;
  description: string;
} {
  return {
    version: VERSION,
    name: 'go-test-sum',
    description: 'Runs go test with -json and prints formatted results and a summary',
  };
}
