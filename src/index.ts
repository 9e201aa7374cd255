#!/usr/bin/env node
import process from 'node:process';
import { run } from './cli.js';

await run(process.argv);
