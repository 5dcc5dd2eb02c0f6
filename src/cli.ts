#!/usr/bin/env node
import "dotenv/config";

import readline from "node:readline/promises";
import { loadConfig } from "./config.js";
import { errorMessage } from "./core/logger.js";
import { createRuntime } from "./runtime.js";

const EXIT_WORDS = new Set(["exit", "quit"]);
const CLI_SESSION_ID = "cli";

async function main(): Promise<void> {
  const { conductor } = createRuntime(loadConfig());
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  console.log("Media assistant ready. Type 'reset' to start over, 'exit' to quit.");
  try {
    while (true) {
      const line = (await rl.question("> ")).trim();
      if (!line) {
        continue;
      }
      if (EXIT_WORDS.has(line.toLowerCase())) {
        break;
      }
      if (line.toLowerCase() === "reset") {
        await conductor.reset(CLI_SESSION_ID);
        console.log("Conversation cleared.");
        continue;
      }

      const { output } = await conductor.chat(CLI_SESSION_ID, line);
      console.log(output);
    }
  } finally {
    rl.close();
  }
}

main().catch((error: unknown) => {
  console.error(`cli failed: ${errorMessage(error)}`);
  process.exitCode = 1;
});
