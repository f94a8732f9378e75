#!/usr/bin/env node
import "dotenv/config";
import { render } from "ink";
import { App } from "./app.js";
import { type BrowserConfig, loadConfig } from "./config.js";
import { BrowserController } from "./controller.js";
import { ConfigError, describeError } from "./errors.js";
import { createLogger } from "./logger.js";
import { HttpRegistryClient } from "./registry/client.js";

function readConfig(): BrowserConfig | null {
  try {
    return loadConfig();
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    process.stderr.write(`regscope: ${error.message}\n`);
    return null;
  }
}

async function main(): Promise<number> {
  const config = readConfig();
  if (!config) return 1;

  const logger = createLogger(config);
  const client = new HttpRegistryClient({
    baseUrl: config.registryUrl,
    credentials: config.credentials,
    pageSize: config.pageSize,
    logger,
  });
  const controller = new BrowserController({
    client,
    registryUrl: config.registryUrl,
    preferredPlatform: config.preferredPlatform,
    logger,
  });

  const failure: { error?: unknown } = {};
  const instance = render(
    <App
      controller={controller}
      onFatal={(error) => {
        failure.error = error;
      }}
    />,
    { exitOnCtrlC: false },
  );

  logger.info({ registry: config.registryUrl }, "browser started");
  void controller.start().catch((error: unknown) => {
    failure.error = error;
    instance.unmount();
  });

  await instance.waitUntilExit();

  if ("error" in failure) {
    logger.fatal({ err: failure.error }, "browser stopped on an unrecoverable error");
    logger.flush();
    process.stderr.write(`regscope: ${describeError(failure.error)}\n`);
    return 1;
  }
  logger.info("browser closed");
  logger.flush();
  return 0;
}

process.exitCode = await main();
