#!/usr/bin/env node
import dotenv from 'dotenv';
import { main } from './cli';

dotenv.config();

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
