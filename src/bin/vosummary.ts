#!/usr/bin/env node
// CLI entry point for vosummary

import { createProgram } from "../cli.js";

createProgram().parse(process.argv);
