import type { Logger } from "@bulletin/interface";
import { silentLogger } from "@bulletin/interface";

import type { ReconciliationReport, ReconciliationService } from "./reconcile.js";
import type { NodeState } from "./state.js";

/**
 * Simulated outages. Going offline only flips the flag; coming back online
 * flips it and then runs a full reconciliation round.
 */
export class FailureSimulator {
  constructor(
    private readonly state: NodeState,
    private readonly reconciliation: ReconciliationService,
    private readonly logger: Logger = silentLogger
  ) {}

  isOffline(): boolean {
    return this.state.isOffline();
  }

  /**
   * Returns false when the node was already offline. In-flight pushes are
   * left to finish.
   */
  goOffline(): boolean {
    const changed = this.state.transition("offline");
    if (changed) this.logger.warn("node offline (simulated)", { nodeId: this.state.nodeId });
    return changed;
  }

  /**
   * Resolves with the catch-up reconciliation report, or `null` when the node
   * was already online and nothing ran.
   */
  async goOnline(): Promise<ReconciliationReport | null> {
    if (!this.state.transition("online")) return null;
    this.logger.info("node online, reconciling", { nodeId: this.state.nodeId });
    // A round started before the outage pulled stale snapshots; do not join it.
    return this.reconciliation.reconcileAll({ fresh: true });
  }
}
