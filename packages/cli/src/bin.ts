#!/usr/bin/env node
import { main } from './index.js';

main().catch((error: unknown) => {
  process.stderr.write(`[abiseed] ${String(error)}\n`);
  process.exitCode = 1;
});
