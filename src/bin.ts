#!/usr/bin/env node
/**
 * paper-sync CLI entry point
 *
 * Usage:
 *   paper-sync              # continuous mode
 *   paper-sync --once       # single cycle
 *   node dist/bin.js --help
 *
 * @module bin
 */

import './index.js';
