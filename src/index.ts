#!/usr/bin/env node
import { runCli } from "./cli/program";

runCli().catch((error: unknown) => {
  console.error("\n❌ Fatal error:", error instanceof Error ? error.message : String(error));
  process.exit(1);
});
