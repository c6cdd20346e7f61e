#!/usr/bin/env node

import { getConfig } from '../config/index.js';
import { createMonitoringContext } from '../monitoring/index.js';
import { createMonitorProgram } from './monitor-program.js';

const program = createMonitorProgram({
  openContext: () => createMonitoringContext(getConfig()),
});

await program.parseAsync();
