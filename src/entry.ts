#!/usr/bin/env node
import { createDeviceLinkCli } from "./cli/devicelink-cli.js";
import { describeError } from "./infra/errors.js";

createDeviceLinkCli()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(`devicelink: ${describeError(err)}`);
    process.exitCode = 1;
  });
