#!/usr/bin/env node
/**
 * tradedeck-domains
 *
 * Usage: tradedeck-domains [setup|remove|check|verify|help]
 */

import { buildDomainsProgram } from './domains-program.js';
import { runMain } from './shared.js';

void runMain(() => buildDomainsProgram().parseAsync(process.argv));
