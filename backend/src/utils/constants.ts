/** Shared constants for magic numbers and names used across the backend. */

/** Current project file format version. */
export const PROJECT_FILE_VERSION = 1;

/** Project file name inside a project directory. */
export const PROJECT_FILENAME = 'project.json';

/** Per-project working directory for logs and exports. */
export const PROJECT_CONFIG_DIR = '.pipeflow';

/** Default minimum log level. */
export const DEFAULT_LOG_LEVEL = 'info';

/** Default HTTP port for the server. */
export const DEFAULT_PORT = 8700;

/** Maximum number of items accepted in one project file. */
export const MAX_PROJECT_ITEMS = 1000;

/** Characters that turn a file name into a wildcard pattern. */
export const WILDCARD_CHARS = ['*', '?', '['] as const;

/** Log data strings longer than this are abbreviated in the text log. */
export const LOG_VALUE_CAP = 200;
