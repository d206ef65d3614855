import type { NodeId } from "@bulletin/interface";
import { assertNodeId } from "@bulletin/interface";

import type { Unsubscribe } from "./transport.js";

export type NodeMode = "online" | "offline";

export type NodeTransitionListener = (from: NodeMode, to: NodeMode) => void;

/**
 * Per-node self-state: `online ⇄ offline`. Read before every network attempt.
 */
export class NodeState {
  private current: NodeMode;
  private readonly listeners = new Set<NodeTransitionListener>();

  constructor(
    readonly nodeId: NodeId,
    initial: NodeMode = "online"
  ) {
    assertNodeId(nodeId);
    this.current = initial;
  }

  get mode(): NodeMode {
    return this.current;
  }

  isOffline(): boolean {
    return this.current === "offline";
  }

  /**
   * Move to `to`. Returns false (and notifies nobody) when already there.
   */
  transition(to: NodeMode): boolean {
    const from = this.current;
    if (from === to) return false;
    this.current = to;
    for (const listener of Array.from(this.listeners)) listener(from, to);
    return true;
  }

  onTransition(listener: NodeTransitionListener): Unsubscribe {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }
}
