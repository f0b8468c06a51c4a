export function getConfigPath(): string {
  return process.env["SPANWISE_CONFIG_PATH"] ?? "spanwise.config.json";
}
