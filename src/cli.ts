#!/usr/bin/env node
import { run } from './kernel.js';

process.exitCode = await run(process.argv.slice(2));
