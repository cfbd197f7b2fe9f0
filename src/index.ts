#!/usr/bin/env node
import "dotenv/config";
import chalk from "chalk";
import { createProgram } from "./cli.js";

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(chalk.red(err instanceof Error ? (err.stack ?? err.message) : String(err)));
    process.exit(1);
  });
