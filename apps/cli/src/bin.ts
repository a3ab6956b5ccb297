#!/usr/bin/env node

import { createProcessIO, run } from './index.js';

process.exitCode = await run(process.argv.slice(2), createProcessIO());
