#!/usr/bin/env tsx
import 'dotenv/config';
import { runCli } from './cli';

process.exitCode = await runCli(process.argv);
