import type { CascadeRecord } from "../types.js";
import { mean } from "../stats/descriptive.js";

export interface CascadeSummary {
  readonly entityId: string;
  /** Mean strength of cascades this entity triggered; 0 when none. */
  readonly influence: number;
  /** Mean strength of cascades targeting this entity; 0 when none. */
  readonly susceptibility: number;
  readonly triggeredCount: number;
  readonly receivedCount: number;
  /** Most frequent target, ties broken by the lower entity id. */
  readonly primaryTarget: PartnerStats | null;
  /** Most frequent trigger, same tie rule. */
  readonly primaryTrigger: PartnerStats | null;
  /** Share of triggered cascades tagged "immediate". */
  readonly immediateShare: number;
}

export interface PartnerStats {
  readonly entityId: string;
  readonly entityLabel: string;
  readonly count: number;
  readonly meanDelayMinutes: number;
}

export function summarizeCascades(entityId: string, cascades: readonly CascadeRecord[]): CascadeSummary {
  const triggered = cascades.filter((c) => c.triggerEntityId === entityId);
  const received = cascades.filter((c) => c.targetEntityId === entityId);

  return {
    entityId,
    influence: mean(triggered.map((c) => c.strength)),
    susceptibility: mean(received.map((c) => c.strength)),
    triggeredCount: triggered.length,
    receivedCount: received.length,
    primaryTarget: topPartner(triggered, (c) => [c.targetEntityId, c.targetEntityLabel]),
    primaryTrigger: topPartner(received, (c) => [c.triggerEntityId, c.triggerEntityLabel]),
    immediateShare: triggered.length > 0
      ? triggered.filter((c) => c.timing === "immediate").length / triggered.length
      : 0,
  };
}

/** One summary per entity appearing in any cascade, sorted by entity id. */
export function summarizeAll(cascades: readonly CascadeRecord[]): CascadeSummary[] {
  const ids = new Set<string>();
  for (const c of cascades) {
    ids.add(c.triggerEntityId);
    ids.add(c.targetEntityId);
  }
  return [...ids].sort().map((id) => summarizeCascades(id, cascades));
}

function topPartner(
  records: readonly CascadeRecord[],
  partnerOf: (c: CascadeRecord) => readonly [string, string],
): PartnerStats | null {
  const groups = new Map<string, { label: string; delays: number[] }>();
  for (const record of records) {
    const [id, label] = partnerOf(record);
    const group = groups.get(id);
    if (group) group.delays.push(record.delayMinutes);
    else groups.set(id, { label, delays: [record.delayMinutes] });
  }

  let best: PartnerStats | null = null;
  for (const [id, group] of groups) {
    const count = group.delays.length;
    if (!best || count > best.count || (count === best.count && id < best.entityId)) {
      best = { entityId: id, entityLabel: group.label, count, meanDelayMinutes: mean(group.delays) };
    }
  }
  return best;
}
