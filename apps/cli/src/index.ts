import dotenv from "dotenv";
dotenv.config({ quiet: true });

import { program } from "commander";
import { registerConfigCommand } from "./commands/config";
import { registerPlayCommand } from "./commands/play";
import { registerSelfPlayCommand } from "./commands/selfplay";
import { registerVerifyCommand } from "./commands/verify";
import { reportError } from "./commands/reportError";

program
  .name("ttt-mcts")
  .description("Tic-tac-toe self-play with Monte Carlo tree search")
  .version("0.1.0", "-v, --version");

registerSelfPlayCommand(program);
registerVerifyCommand(program);
registerPlayCommand(program);
registerConfigCommand(program);

program.parseAsync(process.argv).catch(reportError);
