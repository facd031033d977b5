export const VERSION = '0.1.0';

export const CACHE_RELATIVE_PATH = '.claude/cache/session.json';

// tasks shown before collapsing the rest into "... and N more"
export const PENDING_TASK_LIMIT = 5;
