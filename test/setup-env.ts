import { logger } from '../src/shared/logger/logger';

// Keep test output readable; assertions never depend on log lines.
logger.silent = true;
