import { Command, Option } from "clipanion";
import { readFileSync } from "node:fs";
import { loadConfig, parseConfigText } from "../../config/loader.js";
import { getConfigPath } from "../../config/paths.js";

export class ConfigShowCommand extends Command {
  static override paths = [["config", "show"]];

  static override usage = Command.Usage({
    description: "Show the effective configuration, defaults included",
    examples: [["Show config", "spanwise config show"]],
  });

  configFile = Option.String({ name: "path", required: false });

  override async execute(): Promise<void> {
    try {
      const config = loadConfig(this.configFile);
      this.context.stdout.write(JSON.stringify(config, null, 2) + "\n");
    } catch (err) {
      this.context.stdout.write(
        `Failed to load config: ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
    }
  }
}

export class ConfigValidateCommand extends Command {
  static override paths = [["config", "validate"]];

  static override usage = Command.Usage({
    description: "Validate a configuration file",
    examples: [
      ["Validate default config", "spanwise config validate"],
      ["Validate specific file", "spanwise config validate ./my-config.json"],
    ],
  });

  configFile = Option.String({ name: "path", required: false });

  override async execute(): Promise<void> {
    const configPath = this.configFile ?? getConfigPath();

    let content: string;
    try {
      content = readFileSync(configPath, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        this.context.stdout.write(`Config file not found: ${configPath}\n`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }

    try {
      parseConfigText(content, configPath);
      this.context.stdout.write(`Config is valid: ${configPath}\n`);
    } catch (err) {
      this.context.stdout.write(
        `Config is INVALID: ${configPath}\n` +
          `  ${err instanceof Error ? err.message : String(err)}\n`,
      );
      process.exitCode = 1;
    }
  }
}
