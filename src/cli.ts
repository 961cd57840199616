#!/usr/bin/env node

/**
 * gisnav-deploy CLI - Deploy GISNav Docker Compose services
 */

import { readFileSync } from "node:fs";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { createProgram } from "./program.js";

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: { version: string } = JSON.parse(readFileSync(join(__dirname, "../package.json"), "utf-8"));

createProgram(pkg.version).parse();
