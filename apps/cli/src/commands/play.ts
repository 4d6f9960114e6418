import { Interface, createInterface } from "node:readline";
import { Command } from "commander";
import { Rng, createRng } from "@ttt-mcts/core";
import { MonteCarloTreeSearch } from "@ttt-mcts/mcts";
import {
  BoardState,
  Player,
  TicTacToeModule,
  applyMove,
  findAction,
  getOutcome,
  initialState,
  isLegalMove,
} from "@ttt-mcts/game-tictactoe";
import { resolveConfig, setCliOverride } from "../config";
import { reportError } from "./reportError";

export interface Prompter {
  /** Resolves to null once input is closed */
  ask(prompt: string): Promise<string | null>;
  close(): void;
}

export function createPrompter(
  rl: Interface = createInterface({ input: process.stdin, output: process.stdout }),
): Prompter {
  let closed = false;
  rl.once("close", () => {
    closed = true;
  });

  return {
    ask(prompt: string): Promise<string | null> {
      if (closed) return Promise.resolve(null);
      return new Promise((resolve) => {
        const onClose = () => resolve(null);
        rl.once("close", onClose);
        rl.question(prompt, (answer) => {
          rl.off("close", onClose);
          resolve(answer);
        });
      });
    },
    close() {
      if (!closed) rl.close();
    },
  };
}

export interface PlayOptions {
  human: Player;
  simulations: number;
  explorationWeight: number;
  rng: Rng;
  prompter: Prompter;
  print: (line: string) => void;
}

/**
 * Human against the engine on the terminal. Returns the final state, or
 * null if the human quit.
 */
export async function playAgainstEngine(opts: PlayOptions): Promise<BoardState | null> {
  const { ui } = TicTacToeModule;
  const engine = new MonteCarloTreeSearch({
    game: TicTacToeModule,
    explorationWeight: opts.explorationWeight,
    rng: opts.rng,
  });
  let state = initialState();
  let moveNumber = 1;

  const engineSide = ui.playerLabels.filter((label) => label !== opts.human).join(", ");
  opts.print(`You are ${opts.human}, the engine plays ${engineSide}. ${ui.inputHint}, or q to quit.`);

  while (!state.terminal) {
    opts.print(ui.renderBoard(state));

    if (state.turn === opts.human) {
      const progress = ui.maxTurns === null ? `${moveNumber}` : `${moveNumber}/${ui.maxTurns}`;
      const answer = await opts.prompter.ask(`Move ${progress} ${state.turn} > `);
      if (answer === null || answer.trim().toLowerCase() === "q") {
        return null;
      }
      const index = ui.parseInput(answer);
      if (index === null) {
        opts.print(`Invalid move "${answer.trim()}". ${ui.inputHint}.`);
        continue;
      }
      if (!isLegalMove(state, index)) {
        opts.print(`${ui.formatMove(index)} is taken.`);
        continue;
      }
      state = applyMove(state, index);
    } else {
      engine.runSimulations(state, opts.simulations);
      const next = engine.selectMove(state);
      opts.print(`Engine plays ${ui.formatMove(findAction(state, next))}`);
      state = next;
    }
    moveNumber++;
  }

  opts.print(ui.renderBoard(state));
  const outcome = getOutcome(state);
  opts.print(ui.renderStatus(state) ?? (outcome.draw ? "Draw" : outcome.reason));
  return state;
}

export function registerPlayCommand(program: Command): void {
  program
    .command("play")
    .description("Play a game against the engine")
    .option("--as <player>", "Side to play (X moves first)", "X")
    .option("-s, --simulations <count>", "MCTS rollouts before each engine move")
    .option("--seed <seed>", "Seed for the engine")
    .action(async (opts: { as: string; simulations?: string; seed?: string }) => {
      const side = opts.as.toUpperCase();
      if (side !== "X" && side !== "O") {
        console.error(
          `Unknown side: "${opts.as}". Use ${TicTacToeModule.ui.playerLabels.join(" or ")}.`,
        );
        process.exit(1);
      }

      const prompter = createPrompter();
      try {
        if (opts.simulations !== undefined) setCliOverride("simulations", opts.simulations);
        if (opts.seed !== undefined) setCliOverride("seed", opts.seed);
        const config = await resolveConfig();

        const final = await playAgainstEngine({
          human: side,
          simulations: config.simulations,
          explorationWeight: config.explorationWeight,
          rng: createRng(config.seed),
          prompter,
          print: (line) => console.log(line),
        });
        if (final === null) {
          console.log("Bye.");
        }
      } catch (err: unknown) {
        reportError(err);
      } finally {
        prompter.close();
      }
    });
}
