import { CommanderError } from "commander";

import { createConsoleLogger } from "@bulletin/interface";

import { parseNodeCliArgs } from "./cli.js";
import { startSyncServer } from "./server.js";

async function main() {
  const args = parseNodeCliArgs();
  const logger = createConsoleLogger("bulletin", { level: args.logLevel });
  const handle = await startSyncServer({ ...args, logger });

  console.log(`Bulletin node ${handle.nodeId} listening on http://${handle.host}:${handle.port}`);
  console.log(`- health: http://${handle.host}:${handle.port}/health`);
  console.log(`- messages: http://${handle.host}:${handle.port}/messages`);

  const shutdown = () => {
    handle.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error("shutdown failed", err);
        process.exit(1);
      }
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  if (err instanceof CommanderError) {
    process.exitCode = err.exitCode;
    if (err.code === "commander.helpDisplayed" || err.code === "commander.version") return;
  } else {
    process.exitCode = 1;
  }
  console.error(err instanceof Error ? err.message : err);
});
