#!/usr/bin/env node

import { createProgram } from './program';

const program = createProgram();

process.on('unhandledRejection', (reason) => {
  console.error('❌ Unhandled promise rejection:', reason);
  process.exit(1);
});

program.parseAsync().catch((error: unknown) => {
  console.error('❌ Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
