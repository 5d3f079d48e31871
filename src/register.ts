/**
 * Entry point for `node --import calltrace/register app.js`.
 *
 * Settings come from the CALLTRACE_* environment variables.
 */

import { startTracing } from './session.js';
import { logger } from './logger.js';

const session = startTracing();
logger.debug(`Recording calls to ${session.store.path}`);
