#!/usr/bin/env node
import { Console } from 'node:console';
import { run } from './main.js';

// Logs go to stderr; stdout carries only the document
globalThis.console = new Console({ stdout: process.stderr, stderr: process.stderr });

process.exitCode = await run(process.argv.slice(2));
