import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Command } from "commander";
import type Logger from "bunyan";
import { createRng } from "@ttt-mcts/core";
import { DatasetRecorder, SelfPlayDriver, SelfPlayResult } from "@ttt-mcts/engine";
import { MonteCarloTreeSearch } from "@ttt-mcts/mcts";
import { BoardState, TicTacToeModule } from "@ttt-mcts/game-tictactoe";
import { ConfigData, resolveConfig, setCliOverride } from "../config";
import { createLogger } from "../logger";
import { reportError } from "./reportError";

export interface SelfPlayIO {
  logger: Logger;
  /** Print each board after every move */
  verbose: boolean;
  print: (line: string) => void;
}

export interface SelfPlayReport {
  result: SelfPlayResult;
  outputPath: string;
  digest: string;
}

/**
 * Generate a dataset by MCTS self-play on tic-tac-toe and write it once,
 * after the last game.
 */
export async function runSelfPlay(config: ConfigData, io: SelfPlayIO): Promise<SelfPlayReport> {
  const recorder = new DatasetRecorder();
  const driver = new SelfPlayDriver<BoardState>({
    game: TicTacToeModule,
    createEngine: (rng) =>
      new MonteCarloTreeSearch({
        game: TicTacToeModule,
        explorationWeight: config.explorationWeight,
        rng,
      }),
    recorder,
    simulations: config.simulations,
    games: config.games,
    randomMoveRate: config.randomMoveRate,
    rng: createRng(config.seed),
    logger: io.logger,
    onMove: io.verbose
      ? (event) => {
          io.print(event.board);
          if (event.status) io.print(event.status);
          io.print("");
        }
      : undefined,
  });

  const result = driver.run();

  const outputPath = resolve(config.output);
  await writeFile(outputPath, recorder.serialize(), "utf-8");
  const digest = recorder.digest();
  io.logger.info({ output: outputPath, records: recorder.size, digest }, "Dataset written");

  return { result, outputPath, digest };
}

export function formatSummary(report: SelfPlayReport): string[] {
  const { result } = report;
  const wins = Object.entries(result.wins)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([label, count]) => `${label} ${count}`);
  return [
    `Played ${result.gamesCompleted} games (wins: ${wins.join(", ") || "none"}, draws: ${result.draws})`,
    `Wrote ${result.records} records to ${report.outputPath}`,
    `Digest: ${report.digest}`,
  ];
}

export function registerSelfPlayCommand(program: Command): void {
  program
    .command("selfplay")
    .description("Generate a training dataset by MCTS self-play")
    .option("-n, --games <count>", "Number of games to play")
    .option("-s, --simulations <count>", "MCTS rollouts before each move")
    .option("-e, --exploration <weight>", "UCT exploration weight")
    .option("-r, --random-rate <p>", "Probability of a forced random move")
    .option("--seed <seed>", "Seed for reproducible runs")
    .option("-o, --output <file>", "Dataset file to write")
    .option("-q, --quiet", "Do not print boards")
    .action(async (opts: {
      games?: string;
      simulations?: string;
      exploration?: string;
      randomRate?: string;
      seed?: string;
      output?: string;
      quiet?: boolean;
    }) => {
      try {
        if (opts.games !== undefined) setCliOverride("games", opts.games);
        if (opts.simulations !== undefined) setCliOverride("simulations", opts.simulations);
        if (opts.exploration !== undefined) setCliOverride("explorationWeight", opts.exploration);
        if (opts.randomRate !== undefined) setCliOverride("randomMoveRate", opts.randomRate);
        if (opts.seed !== undefined) setCliOverride("seed", opts.seed);
        if (opts.output !== undefined) setCliOverride("output", opts.output);

        const config = await resolveConfig();
        const report = await runSelfPlay(config, {
          logger: createLogger(config.logLevel),
          verbose: !opts.quiet,
          print: (line) => console.log(line),
        });
        for (const line of formatSummary(report)) {
          console.log(line);
        }
      } catch (err: unknown) {
        reportError(err);
      }
    });
}
