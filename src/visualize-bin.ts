#!/usr/bin/env node
import path from "node:path";
import { fileURLToPath } from "node:url";
import { runVisualizeCli } from "./visualize-cli.js";

const toolDir = path.dirname(fileURLToPath(import.meta.url));

process.exitCode = await runVisualizeCli(process.argv.slice(2), { toolDir });
