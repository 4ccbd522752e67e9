/**
 * WireViz render service
 * Main entry point
 */

import 'dotenv/config';
import { startServer } from './server.js';

startServer();
