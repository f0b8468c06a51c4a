#!/usr/bin/env node
import { createCli } from "./program.js";

const cli = createCli();
await cli.runExit(process.argv.slice(2));
