/**
 * stratum config command - View and create configuration
 */

import { Command } from "commander";
import { getConfigPath, getConfigValue, initConfig, loadConfig } from "../../config/loader.js";

export function registerConfigCommand(program: Command): void {
  const configCmd = program.command("config").description("View and create configuration");

  // Show config path
  configCmd
    .command("path")
    .description("Show config file path")
    .action(() => {
      console.log(getConfigPath());
    });

  // Show full config
  configCmd
    .command("show")
    .description("Show current configuration")
    .action(async () => {
      try {
        const config = await loadConfig();
        console.log(JSON.stringify(config, null, 2));
      } catch (error) {
        console.error(
          `Failed to load config: ${error instanceof Error ? error.message : String(error)}`,
        );
        process.exit(1);
      }
    });

  // Get a config value
  configCmd
    .command("get")
    .description("Get a config value")
    .argument("<key>", "Config key (dot notation, e.g., toolExec.timeoutMs)")
    .action(async (key: string) => {
      try {
        const config = await loadConfig();
        const value = getConfigValue(config, key);

        if (value === undefined) {
          console.error(`Key not found: ${key}`);
          process.exit(1);
        }

        if (typeof value === "object") {
          console.log(JSON.stringify(value, null, 2));
        } else {
          console.log(String(value));
        }
      } catch (error) {
        console.error(
          `Failed to get config: ${error instanceof Error ? error.message : String(error)}`,
        );
        process.exit(1);
      }
    });

  // Write the defaults
  configCmd
    .command("init")
    .description("Write a config file with the default settings")
    .action(async () => {
      try {
        const { configPath } = await initConfig();
        console.log(`✓ Created ${configPath}`);
      } catch (error) {
        console.error(
          `Failed to create config: ${error instanceof Error ? error.message : String(error)}`,
        );
        process.exit(1);
      }
    });
}
