/**
 * crossql API server - Main Entry Point
 */

import { startServer } from './server.js';

await startServer();
