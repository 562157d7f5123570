import { initLogger } from '../utils/logger.js';

// Quiet, synchronous logging for tests
initLogger({ level: 'error', jsonLogs: true });
