import { Command, Option } from "clipanion";
import type { SpanwiseConfig } from "../../config/types.js";
import type { Logger } from "../../logging/logger.js";
import type { Snapshot } from "../../io/snapshot.js";
import { aggregate } from "../../analytics/aggregator.js";
import { assessImpacts } from "../../analytics/impact.js";
import { decompose } from "../../analytics/seasonal.js";
import { detectCascades } from "../../cascade/detector.js";
import { summarizeAll } from "../../cascade/summary.js";
import { cascadeAlerts } from "../../cascade/alerts.js";
import { SpanwiseEngine } from "../../engine/engine.js";
import { aggregateOptions, cascadeOptions } from "../../engine/options.js";
import { resolveTier } from "../../prediction/tiers.js";
import { SnapshotCommand } from "./base.js";

export class AggregateCommand extends SnapshotCommand {
  static override paths = [["aggregate"]];

  static override usage = Command.Usage({
    description: "Aggregate events into per-entity calendar buckets",
    examples: [["Aggregate a snapshot", "spanwise aggregate ./events.json"]],
  });

  seasonal = Option.Boolean("--seasonal", false, {
    description: "Also print the trend/seasonal decomposition",
  });

  protected override async run(snapshot: Snapshot, config: SpanwiseConfig, logger: Logger): Promise<void> {
    const records = aggregate(snapshot.events, { ...aggregateOptions(config), logger });
    this.writeJson(this.seasonal ? { records, seasonal: decompose(records) } : records);
  }
}

export class CascadesCommand extends SnapshotCommand {
  static override paths = [["cascades"]];

  static override usage = Command.Usage({
    description: "Detect cascades between nearby entities",
    examples: [
      ["List cascades", "spanwise cascades ./events.json"],
      ["Per-entity influence summary", "spanwise cascades ./events.json --summary"],
    ],
  });

  summary = Option.Boolean("--summary", false, {
    description: "Print per-entity influence and susceptibility instead of records",
  });

  protected override async run(snapshot: Snapshot, config: SpanwiseConfig, logger: Logger): Promise<void> {
    const cascades = detectCascades(snapshot.events, snapshot.locations, { ...cascadeOptions(config), logger });
    this.writeJson(this.summary ? summarizeAll(cascades) : cascades);
  }
}

export class AlertsCommand extends SnapshotCommand {
  static override paths = [["alerts"]];

  static override usage = Command.Usage({
    description: "List openings expected within 15 minutes from recent cascade triggers",
    examples: [["Alerts at a given time", "spanwise alerts ./events.json --now 2024-06-03T17:20:00Z"]],
  });

  now = Option.String("--now", { description: "Reference time (ISO-8601 or epoch ms); default current time" });

  protected override async run(snapshot: Snapshot, config: SpanwiseConfig, logger: Logger): Promise<void> {
    const now = this.resolveNow(this.now);
    if (now === null) return;
    const cascades = detectCascades(snapshot.events, snapshot.locations, { ...cascadeOptions(config), logger });
    this.writeJson(cascadeAlerts(snapshot.events, cascades, now ?? Date.now()));
  }
}

export class ImpactCommand extends SnapshotCommand {
  static override paths = [["impact"]];

  static override usage = Command.Usage({
    description: "Classify closed events by impact severity",
    examples: [["Impact levels", "spanwise impact ./events.json"]],
  });

  protected override async run(snapshot: Snapshot, config: SpanwiseConfig): Promise<void> {
    const assessed = assessImpacts(snapshot.events, config.analytics.timeZone);
    this.writeJson(
      assessed.map(({ event, level }) => ({ entityId: event.entityId, openTime: event.openTime, level })),
    );
  }
}

export class AnalyzeCommand extends SnapshotCommand {
  static override paths = [["analyze"]];

  static override usage = Command.Usage({
    description: "Run aggregation, cascade detection and forecasts for every entity",
    examples: [["Full analysis", "spanwise analyze ./events.json --tier expert"]],
  });

  tier = Option.String("--tier", { description: "minimal | standard | advanced | expert" });
  now = Option.String("--now", { description: "Reference time (ISO-8601 or epoch ms)" });

  protected override async run(snapshot: Snapshot, config: SpanwiseConfig, logger: Logger): Promise<void> {
    const now = this.resolveNow(this.now);
    if (now === null) return;
    const engine = new SpanwiseEngine({ config, logger });
    const result = await engine.analyze(snapshot, {
      tier: this.tier === undefined ? undefined : resolveTier(this.tier),
      now,
    });
    this.writeJson(result);
  }
}
