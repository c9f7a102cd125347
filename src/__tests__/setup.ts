import { initLogger } from '../utils/logger.js';

// Quiet, synchronous logging for the whole suite.
initLogger({ level: 'error', jsonLogs: true });
