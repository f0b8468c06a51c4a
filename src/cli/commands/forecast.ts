import { Command, Option } from "clipanion";
import type { SpanwiseConfig } from "../../config/types.js";
import type { Logger } from "../../logging/logger.js";
import type { Snapshot } from "../../io/snapshot.js";
import { aggregate } from "../../analytics/aggregator.js";
import { cascadeInsights, seasonalInsights } from "../../analytics/insights.js";
import { detectCascades } from "../../cascade/detector.js";
import { aggregateOptions, cascadeOptions, forecastOptions } from "../../engine/options.js";
import { forecast } from "../../prediction/engine.js";
import { describeForecast } from "../../prediction/format.js";
import { isComputeTier } from "../../prediction/tiers.js";
import { SnapshotCommand } from "./base.js";

export class ForecastCommand extends SnapshotCommand {
  static override paths = [["forecast"]];

  static override usage = Command.Usage({
    description: "Forecast the next opening of one entity",
    examples: [
      ["Standard tier", "spanwise forecast ./events.json --entity north-gate"],
      ["Expert tier at a fixed time", "spanwise forecast ./events.json --entity north-gate --tier expert --now 1717430400000"],
    ],
  });

  entity = Option.String("--entity", { required: true, description: "Entity id" });
  tier = Option.String("--tier", { description: "minimal | standard | advanced | expert" });
  now = Option.String("--now", { description: "Reference time (ISO-8601 or epoch ms); default latest opening" });
  text = Option.Boolean("--text", false, { description: "Print a sentence instead of JSON" });

  protected override async run(snapshot: Snapshot, config: SpanwiseConfig, logger: Logger): Promise<void> {
    const now = this.resolveNow(this.now);
    if (now === null) return;
    if (this.tier !== undefined && !isComputeTier(this.tier)) {
      logger.warn({ tier: this.tier }, "Unknown tier, using standard");
    }

    const analytics = aggregate(snapshot.events, { ...aggregateOptions(config), logger });
    const cascades = detectCascades(snapshot.events, snapshot.locations, { ...cascadeOptions(config), logger });

    const result = forecast(this.entity, snapshot.events, analytics, cascades, this.tier ?? config.prediction.tier, {
      ...forecastOptions(config),
      now,
      logger,
    });

    if (this.text) {
      this.context.stdout.write(
        (result ? describeForecast(result) : `${this.entity}: not enough history to forecast`) + "\n",
      );
      return;
    }
    this.writeJson(result);
  }
}

export class InsightsCommand extends SnapshotCommand {
  static override paths = [["insights"]];

  static override usage = Command.Usage({
    description: "Describe seasonal and cascade patterns of one entity",
    examples: [["Insights", "spanwise insights ./events.json --entity north-gate"]],
  });

  entity = Option.String("--entity", { required: true, description: "Entity id" });

  protected override async run(snapshot: Snapshot, config: SpanwiseConfig, logger: Logger): Promise<void> {
    const analytics = aggregate(snapshot.events, { ...aggregateOptions(config), logger });
    const cascades = detectCascades(snapshot.events, snapshot.locations, { ...cascadeOptions(config), logger });

    const lines = [...seasonalInsights(this.entity, analytics), ...cascadeInsights(this.entity, cascades)];
    if (lines.length === 0) {
      this.context.stdout.write(`No notable patterns for ${this.entity}\n`);
      return;
    }
    for (const line of lines) this.context.stdout.write(`- ${line}\n`);
  }
}
