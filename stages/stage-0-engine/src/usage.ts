/**
 * Usage tracker: aggregate token usage and cost per engine id.
 * The registry records every completed forward; previews are not counted.
 */

import type {
  EngineMetadata,
  UsageSnapshot,
  UsageTracker,
} from "./types.js";

function round4(x: number): number {
  return Math.round(x * 10000) / 10000;
}

function zeroSnapshot(): UsageSnapshot {
  return {
    callCount: 0,
    inputTokens: 0,
    outputTokens: 0,
    totalTokens: 0,
    totalCents: 0,
  };
}

function addUsage(snap: UsageSnapshot, metadata: EngineMetadata): UsageSnapshot {
  return {
    callCount: snap.callCount + 1,
    inputTokens: snap.inputTokens + (metadata.usage?.inputTokens ?? 0),
    outputTokens: snap.outputTokens + (metadata.usage?.outputTokens ?? 0),
    totalTokens: snap.totalTokens + (metadata.usage?.totalTokens ?? 0),
    totalCents: round4(snap.totalCents + (metadata.cost?.totalCents ?? 0)),
  };
}

export function createUsageTracker(): UsageTracker {
  const byEngine = new Map<string, UsageSnapshot>();
  let total = zeroSnapshot();

  return {
    record(metadata: EngineMetadata): void {
      if (metadata.preview) return;
      const current = byEngine.get(metadata.engineId) ?? zeroSnapshot();
      byEngine.set(metadata.engineId, addUsage(current, metadata));
      total = addUsage(total, metadata);
    },

    getEngineUsage(engineId: string): UsageSnapshot {
      return { ...(byEngine.get(engineId) ?? zeroSnapshot()) };
    },

    getTotalUsage(): UsageSnapshot {
      return { ...total };
    },

    reset(): void {
      byEngine.clear();
      total = zeroSnapshot();
    },
  };
}
