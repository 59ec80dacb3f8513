/**
 * System Environment Adapter
 * Implements system environment access
 */

import type { SystemEnvironment } from '../../domains/application-control/types.js';

/**
 * process based system environment adapter
 */
class NodeSystemEnvironment implements SystemEnvironment {
  constructor(private readonly env: NodeJS.ProcessEnv) {}

  getEnv(name: string): string | undefined {
    return this.env[name];
  }
}

/**
 * Create system environment adapter
 */
export function createSystemEnvironment(
  env: NodeJS.ProcessEnv = process.env,
): SystemEnvironment {
  return new NodeSystemEnvironment(env);
}
