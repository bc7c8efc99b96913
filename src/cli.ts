#!/usr/bin/env node
import { main } from "./lib/cli/main";

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error("[screw-data-prep] unexpected error", error);
    process.exitCode = 1;
  }
);
