import type { AnalyticsRecord, CascadeRecord, ComputeTier, Forecast } from "../types.js";
import type { SpanwiseConfig } from "../config/types.js";
import type { Logger } from "../logging/logger.js";
import type { Snapshot } from "../io/snapshot.js";
import { aggregate } from "../analytics/aggregator.js";
import { detectCascades } from "../cascade/detector.js";
import { forecast } from "../prediction/engine.js";
import { MemoCache } from "./cache.js";
import { fingerprint } from "./fingerprint.js";
import { aggregateOptions, cascadeOptions, forecastOptions } from "./options.js";
import { sampleMostRecent } from "./sampling.js";

export interface AnalyzeOptions {
  /** Entities to forecast; every entity with events when omitted. */
  readonly entityIds?: readonly string[];
  readonly tier?: ComputeTier;
  readonly now?: number;
  readonly signal?: AbortSignal;
}

export interface AnalysisResult {
  readonly fingerprint: string;
  readonly sampledEvents: number;
  readonly droppedBySampling: number;
  readonly analytics: AnalyticsRecord[];
  readonly cascades: CascadeRecord[];
  readonly forecasts: Forecast[];
}

export interface SpanwiseEngineDeps {
  config: SpanwiseConfig;
  logger: Logger;
  cacheSize?: number;
}

/**
 * Runs aggregation, cascade detection and forecasting over a snapshot.
 * Identical requests share one computation unless they carry an abort
 * signal; the core itself stays pure.
 */
export class SpanwiseEngine {
  private readonly config: SpanwiseConfig;
  private readonly logger: Logger;
  private readonly cache: MemoCache<AnalysisResult>;

  constructor(deps: SpanwiseEngineDeps) {
    this.config = deps.config;
    this.logger = deps.logger;
    this.cache = new MemoCache(deps.cacheSize);
  }

  analyze(snapshot: Snapshot, options: AnalyzeOptions = {}): Promise<AnalysisResult> {
    const events = sampleMostRecent(snapshot.events, this.config.sampling.maxEvents);
    const tier = options.tier ?? this.config.prediction.tier;
    const key = fingerprint({
      events,
      locations: snapshot.locations,
      entityIds: options.entityIds ? [...options.entityIds].sort() : null,
      tier,
      now: options.now ?? null,
      config: this.config,
    });

    const compute = () =>
      this.run(key, { events, locations: snapshot.locations }, snapshot.events.length - events.length, tier, options);
    // A cancellable run may end partial, so it neither joins nor seeds the cache.
    if (options.signal) return compute();
    return this.cache.getOrCompute(key, compute);
  }

  clearCache(): void {
    this.cache.clear();
  }

  private async run(
    key: string,
    snapshot: Snapshot,
    droppedBySampling: number,
    tier: ComputeTier,
    options: AnalyzeOptions,
  ): Promise<AnalysisResult> {
    // Start on a later tick; the core calls below are synchronous.
    await Promise.resolve();
    const signal = options.signal;
    const started = Date.now();

    const analytics = aggregate(snapshot.events, { ...aggregateOptions(this.config), signal, logger: this.logger });
    const cascades = detectCascades(snapshot.events, snapshot.locations, {
      ...cascadeOptions(this.config),
      signal,
      logger: this.logger,
    });

    const entityIds = options.entityIds ?? [...new Set(snapshot.events.map((e) => e.entityId))].sort();
    const forecasts: Forecast[] = [];
    for (const entityId of entityIds) {
      if (signal?.aborted) break;
      const result = forecast(entityId, snapshot.events, analytics, cascades, tier, {
        ...forecastOptions(this.config),
        now: options.now,
        signal,
        logger: this.logger,
      });
      if (result) forecasts.push(result);
    }

    this.logger.info(
      {
        events: snapshot.events.length,
        analytics: analytics.length,
        cascades: cascades.length,
        forecasts: forecasts.length,
        aborted: signal?.aborted ?? false,
        ms: Date.now() - started,
      },
      "Analysis complete",
    );

    return {
      fingerprint: key,
      sampledEvents: snapshot.events.length,
      droppedBySampling,
      analytics,
      cascades,
      forecasts,
    };
  }
}
