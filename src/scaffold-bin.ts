#!/usr/bin/env node
import path from "node:path";
import { fileURLToPath } from "node:url";
import { runScaffoldCli } from "./scaffold-cli.js";

const toolDir = path.dirname(fileURLToPath(import.meta.url));

process.exitCode = await runScaffoldCli(process.argv.slice(2), { toolDir });
