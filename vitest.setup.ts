import { configureLogger } from 'core-service';

// Entries still reach subscribers; only stdout/stderr output is suppressed
configureLogger({ level: 'debug', silent: true });
