// Keep test output bounded; runner log lines are noise under vitest.
if (!process.env.EXTREMA_LOG_STDOUT) {
  process.env.EXTREMA_LOG_STDOUT = "0";
}
