#!/usr/bin/env node
/**
 * platform-release CLI entrypoint
 *
 * Imports and runs the CLI module, which handles its own argument parsing.
 */

import './cli.js';
