import { contentDigest } from "@ttt-mcts/core";
import { TrainingRecord } from "./interfaces/ISelfPlayGame";

/** On-disk layout: three parallel arrays, one entry per recorded move. */
export interface DatasetDocument {
  State: string[][];
  Turn: string[];
  Action: number[];
}

export class DatasetFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatasetFormatError";
  }
}

/**
 * Accumulates training records across games and serializes them once at the
 * end of a batch. Everything stays in memory; single writer only.
 */
export class DatasetRecorder {
  private states: string[][] = [];
  private turns: string[] = [];
  private actions: number[] = [];

  static fromDocument(doc: DatasetDocument): DatasetRecorder {
    const recorder = new DatasetRecorder();
    for (let i = 0; i < doc.Action.length; i++) {
      recorder.record({ state: doc.State[i], turn: doc.Turn[i], action: doc.Action[i] });
    }
    return recorder;
  }

  record(record: TrainingRecord): void {
    this.states.push([...record.state]);
    this.turns.push(record.turn);
    this.actions.push(record.action);
  }

  get size(): number {
    return this.actions.length;
  }

  getRecord(index: number): TrainingRecord | undefined {
    if (index < 0 || index >= this.actions.length) return undefined;
    return {
      state: [...this.states[index]],
      turn: this.turns[index],
      action: this.actions[index],
    };
  }

  toDocument(): DatasetDocument {
    return {
      State: this.states.map((s) => [...s]),
      Turn: [...this.turns],
      Action: [...this.actions],
    };
  }

  serialize(): string {
    return JSON.stringify(this.toDocument(), null, 2) + "\n";
  }

  /** keccak256 of the canonical document, for comparing seeded runs */
  digest(): string {
    return contentDigest(this.toDocument());
  }
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

/**
 * Validate a parsed JSON value as a dataset document. Throws
 * DatasetFormatError naming the first problem found.
 */
export function parseDatasetDocument(raw: unknown): DatasetDocument {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    throw new DatasetFormatError("Dataset must be a JSON object");
  }
  const State: unknown = "State" in raw ? raw.State : undefined;
  const Turn: unknown = "Turn" in raw ? raw.Turn : undefined;
  const Action: unknown = "Action" in raw ? raw.Action : undefined;

  if (!Array.isArray(State)) throw new DatasetFormatError('Missing "State" array');
  if (!Array.isArray(Turn)) throw new DatasetFormatError('Missing "Turn" array');
  if (!Array.isArray(Action)) throw new DatasetFormatError('Missing "Action" array');

  if (State.length !== Turn.length || Turn.length !== Action.length) {
    throw new DatasetFormatError(
      `Arrays differ in length: State=${State.length} Turn=${Turn.length} Action=${Action.length}`
    );
  }

  const states: string[][] = [];
  const turns: string[] = [];
  const actions: number[] = [];

  for (let i = 0; i < Action.length; i++) {
    const state: unknown = State[i];
    const turn: unknown = Turn[i];
    const action: unknown = Action[i];
    if (!isStringArray(state)) {
      throw new DatasetFormatError(`State[${i}] must be an array of strings`);
    }
    if (typeof turn !== "string") {
      throw new DatasetFormatError(`Turn[${i}] must be a string`);
    }
    if (typeof action !== "number" || !Number.isInteger(action)) {
      throw new DatasetFormatError(`Action[${i}] must be an integer`);
    }
    states.push(state);
    turns.push(turn);
    actions.push(action);
  }

  return { State: states, Turn: turns, Action: actions };
}
