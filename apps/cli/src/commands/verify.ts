import { readFile } from "node:fs/promises";
import { Command } from "commander";
import { DatasetFormatError, DatasetRecorder, parseDatasetDocument } from "@ttt-mcts/engine";
import { TicTacToeModule, decodeTurn } from "@ttt-mcts/game-tictactoe";
import { reportError } from "./reportError";

export interface VerifyReport {
  records: number;
  /** Records per mover, keyed by player label */
  byPlayer: Record<string, number>;
  digest: string;
}

/**
 * Read a dataset file back and check every record against the rules.
 * Throws DatasetFormatError on the first problem.
 */
export async function verifyDataset(path: string): Promise<VerifyReport> {
  const text = await readFile(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new DatasetFormatError(`${path} is not valid JSON: ${reason}`);
  }

  const recorder = DatasetRecorder.fromDocument(parseDatasetDocument(raw));
  const byPlayer: Record<string, number> = {};

  for (let i = 0; i < recorder.size; i++) {
    const record = recorder.getRecord(i);
    if (!record) break;
    const reason = TicTacToeModule.validateRecord(record);
    if (reason !== null) {
      throw new DatasetFormatError(`Record ${i}: ${reason}`);
    }
    const label = decodeTurn(record.turn);
    byPlayer[label] = (byPlayer[label] ?? 0) + 1;
  }

  return { records: recorder.size, byPlayer, digest: recorder.digest() };
}

export function registerVerifyCommand(program: Command): void {
  program
    .command("verify")
    .description("Check a dataset file record by record")
    .argument("<file>", "Dataset JSON file")
    .action(async (file: string) => {
      try {
        const report = await verifyDataset(file);
        const players = Object.entries(report.byPlayer)
          .map(([label, count]) => `${label} ${count}`)
          .join(", ");
        console.log(`${file}: ${report.records} valid records (${players || "empty"})`);
        console.log(`Digest: ${report.digest}`);
      } catch (err: unknown) {
        reportError(err);
      }
    });
}
