import type { EntityLocation } from "../types.js";
import { haversineKm, isValidCoordinate } from "../stats/geo.js";

/**
 * Undirected proximity graph: two entities are adjacent when their
 * great-circle distance is within `maxDistanceKm`. Entities without a
 * (valid) location have no edges.
 */
export class ProximityGraph {
  private readonly edges = new Map<string, Map<string, number>>();

  private constructor(readonly maxDistanceKm: number) {}

  static build(locations: readonly EntityLocation[], maxDistanceKm: number): ProximityGraph {
    const graph = new ProximityGraph(maxDistanceKm);

    // Last location wins for an entity listed twice.
    const byEntity = new Map<string, EntityLocation>();
    for (const loc of locations) {
      if (loc.entityId && isValidCoordinate(loc)) byEntity.set(loc.entityId, loc);
    }

    const nodes = [...byEntity.values()];
    for (let i = 0; i < nodes.length; i++) {
      for (let j = i + 1; j < nodes.length; j++) {
        const a = nodes[i];
        const b = nodes[j];
        const distance = haversineKm(a, b);
        if (distance <= maxDistanceKm) {
          graph.link(a.entityId, b.entityId, distance);
          graph.link(b.entityId, a.entityId, distance);
        }
      }
    }
    return graph;
  }

  /** Distance in km when adjacent, null otherwise. */
  distance(a: string, b: string): number | null {
    return this.edges.get(a)?.get(b) ?? null;
  }

  neighbors(entityId: string): string[] {
    return [...(this.edges.get(entityId)?.keys() ?? [])];
  }

  get edgeCount(): number {
    let total = 0;
    for (const adj of this.edges.values()) total += adj.size;
    return total / 2;
  }

  private link(from: string, to: string, distance: number): void {
    let adj = this.edges.get(from);
    if (!adj) {
      adj = new Map();
      this.edges.set(from, adj);
    }
    adj.set(to, distance);
  }
}
