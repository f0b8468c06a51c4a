import { Command, Option } from "clipanion";
import type { SpanwiseConfig } from "../../config/types.js";
import type { Logger } from "../../logging/logger.js";
import type { Snapshot } from "../../io/snapshot.js";
import { loadConfig } from "../../config/loader.js";
import { createLogger } from "../../logging/logger.js";
import { readSnapshot } from "../../io/snapshot.js";

/** Parses `--now`: epoch milliseconds or an ISO-8601 string. */
export function parseTime(value: string): number | null {
  if (/^-?\d+$/.test(value)) return Number(value);
  const parsed = Date.parse(value);
  return Number.isNaN(parsed) ? null : parsed;
}

/**
 * Commands that read a snapshot file. Subclasses implement `run`; load and
 * validation failures are reported on stderr with exit code 1.
 */
export abstract class SnapshotCommand extends Command {
  file = Option.String({ name: "file" });

  configPath = Option.String("--config", {
    description: "Config file (default: $SPANWISE_CONFIG_PATH or spanwise.config.json)",
  });

  /** Set before `execute` to bypass the configured logger. */
  logger: Logger | undefined;

  protected abstract run(snapshot: Snapshot, config: SpanwiseConfig, logger: Logger): Promise<void>;

  override async execute(): Promise<void> {
    let config: SpanwiseConfig;
    let snapshot: Snapshot;
    try {
      config = loadConfig(this.configPath);
      snapshot = await readSnapshot(this.file);
    } catch (err) {
      this.fail(err instanceof Error ? err.message : String(err));
      return;
    }

    const logger = this.logger ?? createLogger(config.logging);
    logger.debug({ file: this.file, events: snapshot.events.length }, "Snapshot loaded");
    await this.run(snapshot, config, logger);
  }

  protected writeJson(value: unknown): void {
    this.context.stdout.write(JSON.stringify(value, null, 2) + "\n");
  }

  protected fail(message: string): void {
    this.context.stderr.write(`${message}\n`);
    process.exitCode = 1;
  }

  protected resolveNow(value: string | undefined): number | null | undefined {
    if (value === undefined) return undefined;
    const now = parseTime(value);
    if (now === null) this.fail(`Invalid --now value: ${value}`);
    return now;
  }
}
