/**
 * Keep structured log lines out of test output unless a suite opts in.
 */
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
