import type { NodeOutcome } from '../../types/core-types.js';
import { successOutcome } from '../../types/core-types.js';
import type { NodeHandler } from '../NodeHandler.js';

/**
 * Marks a graph endpoint; no computation
 */
export class PassthroughNodeHandler implements NodeHandler {
  readonly nodeType = 'terminal-pass';
  readonly external = false;

  async invoke(): Promise<NodeOutcome> {
    return successOutcome({});
  }
}
