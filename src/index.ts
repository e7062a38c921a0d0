#!/usr/bin/env node
/**
 * pro-sync CLI entrypoint
 */

// Import and execute CLI - the CLI handles its own argument parsing
import './cli.js';
