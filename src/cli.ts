#!/usr/bin/env node
import { run } from "./driver";

process.exitCode = run(process.argv.slice(2));
