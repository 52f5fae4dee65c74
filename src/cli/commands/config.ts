import pc from "picocolors";
import { loadConfig } from "../../config/loader";

export function validateConfig(configPath?: string): void {
  const result = loadConfig(configPath);
  if (result.success) {
    console.log(`${pc.green("✓")} Config check passed: ${result.path}`);
    return;
  }
  console.error(`${pc.red("✗")} Config check failed: ${pc.bold(result.path)}`);
  for (const error of result.errors ?? []) {
    console.error(`  - ${error}`);
  }
  process.exit(1);
}
