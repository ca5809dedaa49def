#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { cli } from "./cli.js";

const rawArgs = hideBin(process.argv);

cli(rawArgs).catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
