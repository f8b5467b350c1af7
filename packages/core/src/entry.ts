#!/usr/bin/env node

import "dotenv/config";
import { Command } from "commander";

const program = new Command();

program
  .name("opspulse")
  .description("OpsPulse: infrastructure health gateway with a ChatOps assistant")
  .version("0.1.0");

// --- opspulse start ---
program
  .command("start")
  .description("Start the gateway server")
  .option("-c, --config <path>", "Path to a JSON5 config file")
  .option("-p, --port <number>", "Override gateway port")
  .action(async (options: { config?: string; port?: string }) => {
    const { loadConfig } = await import("./config/loader.js");
    const { createGateway } = await import("./gateway/server.js");
    const { createLogger, redactSensitive } = await import("./infra/logger.js");
    const { createServices } = await import("./services.js");

    let log = createLogger("opspulse");

    try {
      const config = loadConfig({ filePath: options.config });
      log = createLogger("opspulse", {
        level: config.logging.level,
        redact: config.logging.redactSecrets,
      });
      log.debug("Effective config", redactSensitive(config));
      if (options.port) {
        const port = parseInt(options.port, 10);
        if (Number.isNaN(port) || port < 0 || port > 65535) {
          throw new Error(`Invalid port: ${options.port}`);
        }
        config.server.port = port;
      }

      const services = createServices(config);
      const gateway = createGateway({ config, services });
      await gateway.listen();

      if (!config.model.model) {
        log.warn("GEMINI_MODEL is not set; chat and report calls will fail until it is.");
      }

      const shutdown = async () => {
        log.info("Shutting down...");
        await gateway.close();
        process.exit(0);
      };

      process.on("SIGINT", () => void shutdown());
      process.on("SIGTERM", () => void shutdown());
    } catch (err) {
      log.error(`Failed to start: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

// --- opspulse check ---
program
  .command("check")
  .description("Run one health aggregation and print it as JSON")
  .option("-c, --config <path>", "Path to a JSON5 config file")
  .action(async (options: { config?: string }) => {
    const { loadConfig } = await import("./config/loader.js");
    const { createServices } = await import("./services.js");

    try {
      const services = createServices(loadConfig({ filePath: options.config }));
      const snapshot = await services.health.aggregate();
      console.log(JSON.stringify(snapshot, null, 2));
      if (snapshot.summary.warnings > 0) {
        process.exitCode = 2;
      }
    } catch (err) {
      console.error(err instanceof Error ? err.message : String(err));
      process.exit(1);
    }
  });

// --- opspulse doctor ---
program
  .command("doctor")
  .description("Run diagnostic checks on the configuration")
  .option("-c, --config <path>", "Path to a JSON5 config file")
  .action(async (options: { config?: string }) => {
    const { runDoctorChecks, formatDoctorResults } = await import("./cli/doctor.js");

    const report = await runDoctorChecks({ configPath: options.config });
    console.log(formatDoctorResults(report));

    if (!report.ok) {
      process.exit(1);
    }
  });

program.parse();
