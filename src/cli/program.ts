import { Builtins, Cli } from "clipanion";
import {
  AggregateCommand,
  AlertsCommand,
  AnalyzeCommand,
  CascadesCommand,
  ImpactCommand,
} from "./commands/analyze.js";
import { ForecastCommand, InsightsCommand } from "./commands/forecast.js";
import {
  ConfigShowCommand,
  ConfigValidateCommand,
} from "./commands/config-cmd.js";

export const VERSION = "0.1.0";

export function createCli(): Cli {
  const cli = new Cli({
    binaryLabel: "Spanwise",
    binaryName: "spanwise",
    binaryVersion: VERSION,
  });

  cli.register(Builtins.HelpCommand);
  cli.register(Builtins.VersionCommand);

  // Analysis
  cli.register(AggregateCommand);
  cli.register(CascadesCommand);
  cli.register(AlertsCommand);
  cli.register(ImpactCommand);
  cli.register(AnalyzeCommand);

  // Per-entity
  cli.register(ForecastCommand);
  cli.register(InsightsCommand);

  // Config
  cli.register(ConfigShowCommand);
  cli.register(ConfigValidateCommand);

  return cli;
}
