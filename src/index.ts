#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { run } from "./cli/program.js";

async function main() {
  const controller = new AbortController();
  // First Ctrl-C cancels pending requests and task waits; a second one falls through to the default handler.
  process.once("SIGINT", () => controller.abort(new Error("Interrupted")));

  process.exitCode = await run(hideBin(process.argv), { signal: controller.signal });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error("Fatal error", err);
  process.exit(1);
});
