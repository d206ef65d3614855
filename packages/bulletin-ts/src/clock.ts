import type { LogicalTimestamp, NodeId } from "./index.js";
import { assertNodeId } from "./ids.js";

/**
 * Lamport clock for one node.
 *
 * `next()` is strictly increasing under `(counter, nodeId)` order and always
 * exceeds every counter passed to `observe()`.
 */
export class LamportClock {
  private counter: number;

  constructor(
    readonly nodeId: NodeId,
    initialCounter = 0
  ) {
    assertNodeId(nodeId);
    if (!Number.isSafeInteger(initialCounter) || initialCounter < 0) {
      throw new Error(`invalid initial counter: ${initialCounter}`);
    }
    this.counter = initialCounter;
  }

  next(): LogicalTimestamp {
    this.counter += 1;
    return { counter: this.counter, nodeId: this.nodeId };
  }

  observe(counter: number): void {
    if (!Number.isSafeInteger(counter) || counter < 0) return;
    if (counter > this.counter) this.counter = counter;
  }

  current(): number {
    return this.counter;
  }
}
