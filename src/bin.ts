#!/usr/bin/env node
/**
 * Directory Summarizer MCP Server - CLI Entry Point
 *
 * Bin entry point for global npm installation; runs the stdio server.
 *
 * Usage:
 *   directory-summarizer-mcp            # after npm install -g
 *   node dist/index.js                  # direct invocation
 *
 * @module bin
 */

import './index.js';
