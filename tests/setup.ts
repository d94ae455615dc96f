import { setLogHandler } from '../src/logger';

// Keep test output readable; tests that assert on logs install their own handler.
setLogHandler(() => undefined);
