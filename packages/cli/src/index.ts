#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   sysml-sql init-db model.db
 *   sysml-sql fetch model.db https://sysml.example.org:9000 --project-name Drone
 *   sysml-sql query model.db examples/queries/GetStructureElements.sql
 */

import 'dotenv/config';
import { BaseError, errorMessage } from '@sysml-sql/core';
import { createProgram } from './program.js';

async function main(): Promise<void> {
  try {
    await createProgram().parseAsync(process.argv);
  } catch (error) {
    const message = error instanceof BaseError ? error.toActionableMessage() : `Error: ${errorMessage(error)}`;
    process.stderr.write(`${message}\n`);
    process.exitCode = 1;
  }
}

void main();
