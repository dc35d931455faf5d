#!/usr/bin/env node
import { config } from 'dotenv';
import { createProgram } from './cli.js';

config();

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : 'An unknown error occurred');
    process.exit(1);
  });
