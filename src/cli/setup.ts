#!/usr/bin/env node
/**
 * tradedeck-setup
 *
 * Usage: tradedeck-setup [setup|migrate-config|setup-domains|start|verify|status|logs|ssl|monitoring|help]
 */

import { buildSetupProgram } from './setup-program.js';
import { runMain } from './shared.js';

void runMain(() => buildSetupProgram().parseAsync(process.argv));
