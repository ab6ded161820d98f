import React from "react";
import { render, Text } from "ink";
import { loadConfig, type AppConfig } from "../config.js";
import { createService, type ClubService } from "../service.js";
import { describeError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { runCommand } from "./commands.js";

const SHUTDOWN_SIGNALS = ["SIGINT", "SIGTERM"] as const;

// One-shot render: draw the final frame and let ink release stdout
async function print(node: React.ReactElement): Promise<void> {
  const instance = render(node);
  instance.unmount();
  await instance.waitUntilExit();
}

function waitForShutdown(): Promise<string> {
  return new Promise((resolve) => {
    const onSignal = (signal: string) => {
      for (const s of SHUTDOWN_SIGNALS) process.off(s, onSignal);
      resolve(signal);
    };
    for (const s of SHUTDOWN_SIGNALS) process.once(s, onSignal);
  });
}

export async function startCLI(argv: string[] = process.argv.slice(2)): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    await print(<Text color="red">{describeError(error)}</Text>);
    process.exitCode = 1;
    return;
  }

  const logger = createLogger({ level: config.logLevel });
  let service: ClubService | undefined;

  try {
    process.exitCode = await runCommand(argv, {
      config,
      logger,
      getService: () => {
        service ??= createService(config, { logger });
        return service;
      },
      print,
      waitForShutdown,
    });
  } catch (error) {
    logger.error(describeError(error));
    process.exitCode = 1;
  } finally {
    service?.close();
  }
}
