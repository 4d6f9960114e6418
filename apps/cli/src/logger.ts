import bunyan from "bunyan";
import type { LogLevelString } from "bunyan";

/** stdout carries boards and summaries, so logs go to stderr. */
export function createLogger(level: LogLevelString = "info"): bunyan {
  return bunyan.createLogger({
    name: "ttt-mcts",
    level,
    stream: process.stderr,
  });
}
