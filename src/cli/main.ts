#!/usr/bin/env node
import { nodeIo, runCli } from "./program.js";

process.exitCode = await runCli(process.argv.slice(2), nodeIo());
